import { z } from "zod";
import type { ShortLivedToken, TokenBroker } from "../adapters/base.ts";
import { missingClientSettings, type LinkedInSettings } from "../config/settings.ts";
import { err, ok, type PipelineError, type Result } from "../errors.ts";
import { formBody, requestJson, type FetchLike, type HttpOutcome } from "../http/json-request.ts";
import type { Logger } from "../logging/logger.ts";
import { redactBody } from "../logging/redaction.ts";
import type { DiagnosticEntry } from "../types.ts";

export const LINKEDIN_AUTHORIZE_URL = "https://www.linkedin.com/oauth/v2/authorization";
export const LINKEDIN_TOKEN_URL = "https://www.linkedin.com/oauth/v2/accessToken";
export const LINKEDIN_USERINFO_URL = "https://api.linkedin.com/v2/userinfo";
export const LINKEDIN_UGC_POSTS_URL = "https://api.linkedin.com/v2/ugcPosts";

export const LINKEDIN_SCOPES = ["openid", "profile", "w_member_social"];

const LINKEDIN_SETTING_NAMES = {
  clientId: "LINKEDIN_CLIENT_ID",
  clientSecret: "LINKEDIN_CLIENT_SECRET",
  redirectUri: "LINKEDIN_REDIRECT_URI"
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  refresh_token_expires_in: z.number().optional()
});

const userInfoSchema = z.object({
  sub: z.string().optional(),
  name: z.string().optional()
});

const ugcPostResponseSchema = z.object({ id: z.string().optional() });

export type LinkedInShare = {
  authorId: string;
  text: string;
  articleUrl: string | null;
  thumbnailUrl: string | null;
};

export type LinkedInMember = {
  memberId: string;
  name: string | null;
};

export class LinkedInTokenBroker implements TokenBroker {
  private readonly settings: LinkedInSettings;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(deps: { settings: LinkedInSettings; fetchImpl: FetchLike; logger: Logger }) {
    this.settings = deps.settings;
    this.fetchImpl = deps.fetchImpl;
    this.logger = deps.logger;
  }

  missingSettings() {
    return missingClientSettings(this.settings, LINKEDIN_SETTING_NAMES);
  }

  configurationError(): PipelineError | null {
    const missing = this.missingSettings();
    if (missing.length === 0) return null;

    return {
      code: "CONFIGURATION_ERROR",
      platform: "linkedin",
      missing,
      message: `Missing LinkedIn config. Set ${missing.join(", ")}.`
    };
  }

  buildAuthorizationUrl(state: string): Result<string> {
    const configError = this.configurationError();
    if (configError) return err(configError);

    const query = new URLSearchParams({
      response_type: "code",
      client_id: this.settings.clientId,
      redirect_uri: this.settings.redirectUri,
      state,
      scope: LINKEDIN_SCOPES.join(" ")
    });

    return ok(`${LINKEDIN_AUTHORIZE_URL}?${query.toString()}`);
  }

  async exchangeCode(code: string): Promise<Result<ShortLivedToken>> {
    const configError = this.configurationError();
    if (configError) return err(configError);

    const response = await requestJson(
      this.fetchImpl,
      LINKEDIN_TOKEN_URL,
      formBody({
        grant_type: "authorization_code",
        code,
        client_id: this.settings.clientId,
        client_secret: this.settings.clientSecret,
        redirect_uri: this.settings.redirectUri
      }),
      tokenResponseSchema
    );

    if (!response.ok) {
      this.logger.error("LinkedIn token exchange failed", { status: response.status, body: redactBody(response.rawBody) });
      return err({
        code: "EXCHANGE_ERROR",
        message: `Failed to get access token from LinkedIn: ${response.message}`,
        status: response.status,
        rawBody: response.rawBody
      });
    }

    return ok({
      accessToken: response.data.access_token,
      tokenType: "bearer",
      expiresIn: response.data.expires_in ?? null,
      refreshToken: response.data.refresh_token ?? null
    });
  }
}

function bearer(accessToken: string) {
  return {
    authorization: `Bearer ${accessToken}`,
    accept: "application/json"
  };
}

/** Looks up the member id (`sub`) behind a token; the author of every share. */
export async function fetchLinkedInMember(
  fetchImpl: FetchLike,
  accessToken: string,
  logger: Logger
): Promise<{ ok: true; member: LinkedInMember; trail: DiagnosticEntry[] } | { ok: false; trail: DiagnosticEntry[]; message: string; reason: "request_failed" | "not_linked" }> {
  const response = await requestJson(
    fetchImpl,
    LINKEDIN_USERINFO_URL,
    { method: "GET", headers: bearer(accessToken) },
    userInfoSchema
  );
  const request = "GET /v2/userinfo";

  if (!response.ok) {
    logger.error("Failed to get LinkedIn member info", { status: response.status, body: redactBody(response.rawBody) });
    return {
      ok: false,
      reason: "request_failed",
      message: `Failed to get LinkedIn member ID: ${response.message}`,
      trail: [{ step: "userinfo", request, status: response.status, summary: redactBody(response.rawBody) }]
    };
  }

  if (!response.data.sub) {
    return {
      ok: false,
      reason: "not_linked",
      message: "LinkedIn userinfo did not include a member id. Check that the openid scope was granted.",
      trail: [{ step: "userinfo", request, status: response.status, summary: "Response had no sub claim." }]
    };
  }

  return {
    ok: true,
    member: { memberId: response.data.sub, name: response.data.name ?? null },
    trail: [{ step: "userinfo", request, status: response.status, summary: `Member ID: ${response.data.sub}` }]
  };
}

export function buildUgcPost(share: LinkedInShare) {
  const media = share.articleUrl
    ? [
        {
          status: "READY",
          originalUrl: share.articleUrl,
          ...(share.thumbnailUrl ? { thumbnails: [{ url: share.thumbnailUrl }] } : {})
        }
      ]
    : [];

  return {
    author: `urn:li:person:${share.authorId}`,
    lifecycleState: "PUBLISHED",
    specificContent: {
      "com.linkedin.ugc.ShareContent": {
        shareCommentary: { text: share.text },
        shareMediaCategory: share.articleUrl ? "ARTICLE" : "NONE",
        ...(media.length > 0 ? { media } : {})
      }
    },
    visibility: {
      "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC"
    }
  };
}

export async function createUgcPost(
  fetchImpl: FetchLike,
  accessToken: string,
  share: LinkedInShare
): Promise<HttpOutcome<{ postId: string | null }>> {
  const response = await requestJson(
    fetchImpl,
    LINKEDIN_UGC_POSTS_URL,
    {
      method: "POST",
      headers: {
        ...bearer(accessToken),
        "content-type": "application/json",
        "x-restli-protocol-version": "2.0.0"
      },
      body: JSON.stringify(buildUgcPost(share))
    },
    ugcPostResponseSchema
  );

  if (!response.ok) {
    return response;
  }

  return {
    ok: true,
    status: response.status,
    headers: response.headers,
    data: { postId: response.headers.get("x-restli-id") ?? response.data.id ?? null }
  };
}
