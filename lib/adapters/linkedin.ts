import type { LinkedInSettings } from "../config/settings.ts";
import { computeExpiresAt, hasValidToken } from "../credentials/credential.ts";
import { describeUnknownError, type Result } from "../errors.ts";
import type { FetchLike } from "../http/json-request.ts";
import {
  createUgcPost,
  fetchLinkedInMember,
  LINKEDIN_SCOPES,
  LinkedInTokenBroker
} from "../integrations/linkedin.ts";
import type { Logger } from "../logging/logger.ts";
import { redactBody } from "../logging/redaction.ts";
import { composeCaption, MAX_HASHTAGS } from "../publish/caption.ts";
import { PublishStateMachine } from "../publish/state-machine.ts";
import type { Credential, PublishJob, ResolvedPublishJob } from "../types.ts";
import {
  failedResult,
  type AdapterValidationResult,
  type ConnectOutcome,
  type PlatformAdapter,
  type PublishResult,
  type ShortLivedToken
} from "./base.ts";

export const LINKEDIN_MAX_COMMENTARY = 3000;

export type LinkedInAdapterDeps = {
  settings: LinkedInSettings;
  logger: Logger;
  fetchImpl?: FetchLike;
  now?: () => Date;
};

/**
 * Member shares through `ugcPosts`. The login identity is the author, so no
 * account resolution chain is needed and publishing is a single request.
 */
export class LinkedInAdapter implements PlatformAdapter {
  readonly platform = "linkedin" as const;

  private readonly settings: LinkedInSettings;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly broker: LinkedInTokenBroker;
  private readonly now: () => Date;

  constructor(deps: LinkedInAdapterDeps) {
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.now = deps.now ?? (() => new Date());
    this.broker = new LinkedInTokenBroker({ settings: deps.settings, fetchImpl: this.fetchImpl, logger: deps.logger });
  }

  isConfigured() {
    return Boolean(this.settings.clientId && this.settings.clientSecret);
  }

  hasValidToken(credential: Credential | null, now: Date = this.now()) {
    return credential?.platform === this.platform && hasValidToken(credential, now);
  }

  buildAuthorizationUrl(state: string) {
    return this.broker.buildAuthorizationUrl(state);
  }

  exchangeCode(code: string): Promise<Result<ShortLivedToken>> {
    return this.broker.exchangeCode(code);
  }

  async connect(code: string): Promise<ConnectOutcome> {
    const configError = this.broker.configurationError();
    if (configError) {
      return { ok: false, error: configError, trail: [] };
    }

    const token = await this.broker.exchangeCode(code);
    if (!token.ok) {
      return { ok: false, error: token.error, trail: [] };
    }

    const member = await fetchLinkedInMember(this.fetchImpl, token.value.accessToken, this.logger);
    if (!member.ok) {
      return {
        ok: false,
        error: { code: "RESOLUTION_ERROR", reason: member.reason, message: member.message, trail: member.trail },
        trail: member.trail
      };
    }

    this.logger.info("LinkedIn OAuth completed", { memberId: member.member.memberId });

    return {
      ok: true,
      credential: {
        platform: this.platform,
        accessToken: token.value.accessToken,
        refreshToken: token.value.refreshToken,
        expiresAt: token.value.expiresIn !== null ? computeExpiresAt(token.value.expiresIn, this.now()) : null,
        accountId: member.member.memberId,
        accountName: member.member.name,
        scopes: [...LINKEDIN_SCOPES]
      },
      trail: member.trail
    };
  }

  validateJob(job: PublishJob): AdapterValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const hashtags = job.hashtags ?? [];

    if (job.mode === "carousel") {
      errors.push("LinkedIn member shares do not support carousels.");
    }

    if (job.content.length > 1) {
      errors.push("LinkedIn shares accept at most one image.");
    }

    if (composeCaption(job.caption, hashtags).length > LINKEDIN_MAX_COMMENTARY) {
      errors.push(`LinkedIn commentary is limited to ${LINKEDIN_MAX_COMMENTARY} characters.`);
    }

    if (hashtags.length > MAX_HASHTAGS) {
      warnings.push(`Only ${MAX_HASHTAGS} hashtags are recommended.`);
    }

    if (!job.caption.trim() && job.content.length === 0 && !job.linkUrl) {
      errors.push("Caption, image or link is required.");
    }

    return { valid: errors.length === 0, warnings, errors };
  }

  async publish(credential: Credential, job: ResolvedPublishJob): Promise<PublishResult> {
    const machine = new PublishStateMachine(this.now);

    if (!this.isConfigured()) {
      return failedResult(
        {
          code: "CONFIGURATION_ERROR",
          platform: this.platform,
          missing: this.broker.missingSettings(),
          message: "LinkedIn Client ID and Secret not configured."
        },
        machine.history,
        machine.fail("FAILED")
      );
    }

    if (!this.hasValidToken(credential) || !credential.accountId) {
      this.logger.warn("Publish attempted without a valid LinkedIn credential");
      return failedResult(
        { code: "NOT_CONNECTED", platform: this.platform, message: "LinkedIn is not connected. Please authorize first." },
        machine.history,
        machine.fail("FAILED")
      );
    }

    if (job.mode === "carousel") {
      return failedResult(
        { code: "UNSUPPORTED_CONTENT", platform: this.platform, message: "LinkedIn member shares do not support carousels." },
        machine.history,
        machine.fail("FAILED")
      );
    }

    const [imageUrl = null] = job.mediaUrls;
    const articleUrl = job.linkUrl ?? imageUrl;

    try {
      const response = await createUgcPost(this.fetchImpl, credential.accessToken, {
        authorId: credential.accountId,
        text: composeCaption(job.caption, job.hashtags),
        articleUrl,
        thumbnailUrl: job.linkUrl ? imageUrl : null
      });

      if (!response.ok) {
        this.logger.error("LinkedIn post failed", { status: response.status, body: redactBody(response.rawBody) });
        return failedResult(
          {
            code: "PUBLISH_ERROR",
            message: `LinkedIn API error: ${response.message}`,
            status: response.status,
            rawBody: response.rawBody
          },
          machine.history,
          machine.fail("FAILED")
        );
      }

      // No container step: the share is live as soon as the request succeeds.
      machine.transition("CREATED");
      machine.transition("READY");
      machine.transition("PUBLISHED");
      this.logger.info("Successfully posted to LinkedIn", { postId: response.data.postId });

      return { success: true, postId: response.data.postId, state: "PUBLISHED", history: machine.history };
    } catch (error) {
      this.logger.error("Unexpected error posting to LinkedIn", { message: describeUnknownError(error) });
      return failedResult(
        { code: "PUBLISH_ERROR", message: describeUnknownError(error), status: null, rawBody: "" },
        machine.history,
        machine.fail("FAILED")
      );
    }
  }
}
