import { z } from "zod";
import type { LongLivedToken, ShortLivedToken, TokenBroker, TokenUpgrader } from "../adapters/base.ts";
import { missingClientSettings, type InstagramSettings } from "../config/settings.ts";
import { computeExpiresAt } from "../credentials/credential.ts";
import { err, ok, type PipelineError, type Result } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import { redactBody, redactUrl } from "../logging/redaction.ts";
import { META_DIALOG_BASE, type MetaGraphClient } from "./meta-graph.ts";

export const INSTAGRAM_SCOPES = [
  "instagram_basic",
  "instagram_content_publish",
  "pages_read_engagement",
  "pages_show_list",
  "business_management"
];

/** Graph falls back to this lifetime (60 days) when the upgrade omits `expires_in`. */
export const DEFAULT_LONG_LIVED_EXPIRES_IN = 60 * 24 * 60 * 60;

const INSTAGRAM_SETTING_NAMES = {
  clientId: "INSTAGRAM_APP_ID",
  clientSecret: "INSTAGRAM_APP_SECRET",
  redirectUri: "INSTAGRAM_REDIRECT_URI"
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional()
});

export class InstagramTokenBroker implements TokenBroker, TokenUpgrader {
  private readonly settings: InstagramSettings;
  private readonly graph: MetaGraphClient;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: { settings: InstagramSettings; graph: MetaGraphClient; logger: Logger; now?: () => Date }) {
    this.settings = deps.settings;
    this.graph = deps.graph;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  missingSettings() {
    return missingClientSettings(this.settings, INSTAGRAM_SETTING_NAMES);
  }

  configurationError(): PipelineError | null {
    const missing = this.missingSettings();
    if (missing.length === 0) return null;

    return {
      code: "CONFIGURATION_ERROR",
      platform: "instagram",
      missing,
      message: `Missing Instagram config. Set ${missing.join(", ")}.`
    };
  }

  buildAuthorizationUrl(state: string): Result<string> {
    const configError = this.configurationError();
    if (configError) return err(configError);

    const query = new URLSearchParams({
      client_id: this.settings.clientId,
      redirect_uri: this.settings.redirectUri,
      state,
      scope: INSTAGRAM_SCOPES.join(","),
      response_type: "code"
    });

    return ok(`${META_DIALOG_BASE}/${this.graph.graphVersion}/dialog/oauth?${query.toString()}`);
  }

  async exchangeCode(code: string): Promise<Result<ShortLivedToken>> {
    const configError = this.configurationError();
    if (configError) return err(configError);

    const query = {
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      redirect_uri: this.settings.redirectUri,
      code
    };
    const response = await this.graph.get("/oauth/access_token", query, tokenResponseSchema);

    if (!response.ok) {
      this.logger.error("Instagram token exchange failed", {
        request: redactUrl(this.graph.url("/oauth/access_token", query)),
        status: response.status,
        body: redactBody(response.rawBody)
      });
      return err({
        code: "EXCHANGE_ERROR",
        message: `Failed to get access token from Instagram: ${response.message}`,
        status: response.status,
        rawBody: response.rawBody
      });
    }

    return ok({
      accessToken: response.data.access_token,
      tokenType: response.data.token_type ?? "bearer",
      expiresIn: response.data.expires_in ?? null,
      refreshToken: null
    });
  }

  /** Swaps a short-lived user token (about an hour) for a long-lived one. */
  async upgradeToken(token: ShortLivedToken): Promise<Result<LongLivedToken>> {
    const configError = this.configurationError();
    if (configError) return err(configError);

    const query = {
      grant_type: "fb_exchange_token",
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      fb_exchange_token: token.accessToken
    };
    const response = await this.graph.get("/oauth/access_token", query, tokenResponseSchema);

    if (!response.ok) {
      this.logger.error("Instagram long-lived token exchange failed", {
        request: redactUrl(this.graph.url("/oauth/access_token", query)),
        status: response.status,
        body: redactBody(response.rawBody)
      });
      return err({
        code: "UPGRADE_ERROR",
        message: `Failed to upgrade Instagram token: ${response.message}`,
        status: response.status,
        rawBody: response.rawBody
      });
    }

    const expiresIn = response.data.expires_in ?? DEFAULT_LONG_LIVED_EXPIRES_IN;

    return ok({
      accessToken: response.data.access_token,
      tokenType: response.data.token_type ?? "bearer",
      expiresIn,
      expiresAt: computeExpiresAt(expiresIn, this.now())
    });
  }
}
