import type { InstagramSettings, PollPolicy } from "../config/settings.ts";
import { hasValidToken } from "../credentials/credential.ts";
import { describeUnknownError, type Result } from "../errors.ts";
import type { FetchLike } from "../http/json-request.ts";
import { InstagramAccountResolver } from "../integrations/instagram-accounts.ts";
import { InstagramContainerApi } from "../integrations/instagram-containers.ts";
import { INSTAGRAM_SCOPES, InstagramTokenBroker } from "../integrations/instagram-oauth.ts";
import { MetaGraphClient } from "../integrations/meta-graph.ts";
import type { Logger } from "../logging/logger.ts";
import { redactToken } from "../logging/redaction.ts";
import {
  CAROUSEL_MAX_ITEMS,
  CAROUSEL_MIN_ITEMS,
  MediaContainerOrchestrator,
  type ChildCreationMode
} from "../media/orchestrator.ts";
import type { Sleep } from "../media/poll.ts";
import { composeCaption, MAX_CAPTION_LENGTH, MAX_HASHTAGS } from "../publish/caption.ts";
import type { Credential, PublishJob, ResolvedPublishJob } from "../types.ts";
import {
  failedResult,
  type AdapterValidationResult,
  type ConnectOptions,
  type ConnectOutcome,
  type PlatformAdapter,
  type PublishOptions,
  type PublishResult,
  type ShortLivedToken
} from "./base.ts";

export type InstagramAdapterDeps = {
  settings: InstagramSettings;
  poll: PollPolicy;
  logger: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  childCreation?: ChildCreationMode;
};

/** Publishes through the Graph API media-container flow on a Page-linked Instagram Business account. */
export class InstagramAdapter implements PlatformAdapter {
  readonly platform = "instagram" as const;

  private readonly settings: InstagramSettings;
  private readonly poll: PollPolicy;
  private readonly logger: Logger;
  private readonly graph: MetaGraphClient;
  private readonly broker: InstagramTokenBroker;
  private readonly resolver: InstagramAccountResolver;
  private readonly sleep: Sleep | undefined;
  private readonly now: () => Date;
  private readonly childCreation: ChildCreationMode;

  constructor(deps: InstagramAdapterDeps) {
    this.settings = deps.settings;
    this.poll = deps.poll;
    this.logger = deps.logger;
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
    this.childCreation = deps.childCreation ?? "sequential";
    this.graph = new MetaGraphClient(deps.settings.graphVersion, deps.fetchImpl ?? fetch);
    this.broker = new InstagramTokenBroker({ settings: deps.settings, graph: this.graph, logger: deps.logger, now: this.now });
    this.resolver = new InstagramAccountResolver({ graph: this.graph, logger: deps.logger });
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

  async connect(code: string, options: ConnectOptions = {}): Promise<ConnectOutcome> {
    const configError = this.broker.configurationError();
    if (configError) {
      return { ok: false, error: configError, trail: [] };
    }

    const shortLived = await this.broker.exchangeCode(code);
    if (!shortLived.ok) {
      return { ok: false, error: shortLived.error, trail: [] };
    }

    const longLived = await this.broker.upgradeToken(shortLived.value);
    if (!longLived.ok) {
      return { ok: false, error: longLived.error, trail: [] };
    }

    const resolution = await this.resolver.resolve(longLived.value.accessToken, options);
    if (!resolution.ok) {
      return { ok: false, error: resolution.error, trail: resolution.trail };
    }

    this.logger.info("Instagram connected", {
      accountId: resolution.account.accountId,
      token: redactToken(longLived.value.accessToken),
      expiresAt: longLived.value.expiresAt
    });

    return {
      ok: true,
      credential: {
        platform: this.platform,
        accessToken: longLived.value.accessToken,
        refreshToken: null,
        expiresAt: longLived.value.expiresAt,
        accountId: resolution.account.accountId,
        accountName: resolution.account.accountName,
        scopes: [...INSTAGRAM_SCOPES]
      },
      trail: resolution.trail
    };
  }

  validateJob(job: PublishJob): AdapterValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const hashtags = job.hashtags ?? [];

    if (composeCaption(job.caption, hashtags).length > MAX_CAPTION_LENGTH) {
      errors.push(`Instagram captions are limited to ${MAX_CAPTION_LENGTH} characters.`);
    }

    if (hashtags.length > MAX_HASHTAGS) {
      errors.push(`Instagram allows at most ${MAX_HASHTAGS} hashtags.`);
    }

    if (job.mode === "single" && job.content.length !== 1) {
      errors.push("Instagram single posts require exactly one image.");
    }

    if (job.mode === "carousel" && (job.content.length < CAROUSEL_MIN_ITEMS || job.content.length > CAROUSEL_MAX_ITEMS)) {
      errors.push(`Carousel requires ${CAROUSEL_MIN_ITEMS}-${CAROUSEL_MAX_ITEMS} images.`);
    }

    for (const [index, item] of job.content.entries()) {
      if (item.kind === "url" && !/^https?:\/\//i.test(item.url)) {
        errors.push(`Item ${index + 1} must be a public http(s) image URL.`);
      }
    }

    if (job.linkUrl) {
      warnings.push("Instagram captions do not render links; the link URL is ignored.");
    }

    return { valid: errors.length === 0, warnings, errors };
  }

  async publish(credential: Credential, job: ResolvedPublishJob, options: PublishOptions = {}): Promise<PublishResult> {
    if (!this.isConfigured()) {
      return failedResult({
        code: "CONFIGURATION_ERROR",
        platform: this.platform,
        missing: this.broker.missingSettings(),
        message: "Instagram App ID and Secret not configured."
      });
    }

    if (!this.hasValidToken(credential) || !credential.accountId) {
      this.logger.warn("Publish attempted without a valid Instagram credential");
      return failedResult({
        code: "NOT_CONNECTED",
        platform: this.platform,
        message: "Instagram is not connected. Please authorize first."
      });
    }

    const orchestrator = new MediaContainerOrchestrator({
      api: new InstagramContainerApi({
        graph: this.graph,
        accountId: credential.accountId,
        accessToken: credential.accessToken
      }),
      policy: this.poll,
      logger: this.logger,
      sleep: this.sleep,
      now: this.now,
      childCreation: this.childCreation
    });
    const caption = composeCaption(job.caption, job.hashtags);

    try {
      if (job.mode === "carousel") {
        return await orchestrator.publishCarousel(job.mediaUrls, caption, options);
      }

      const [imageUrl] = job.mediaUrls;
      if (!imageUrl || job.mediaUrls.length > 1) {
        return failedResult({
          code: "VALIDATION_ERROR",
          message: "Instagram single posts require exactly one image.",
          issues: ["Instagram single posts require exactly one image."]
        });
      }

      return await orchestrator.publishSingle(imageUrl, caption, options);
    } catch (error) {
      this.logger.error("Unexpected error posting to Instagram", { message: describeUnknownError(error) });
      return failedResult({
        code: "PUBLISH_ERROR",
        message: describeUnknownError(error),
        status: null,
        rawBody: ""
      });
    }
  }
}

