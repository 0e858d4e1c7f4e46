import type { PlatformAdapter, PublishOptions, PublishResult } from "../adapters/base.ts";
import { failedResult } from "../adapters/base.ts";
import { publishJobSchema } from "../api/schemas.ts";
import type { PipelineError } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import { materializeContent, type ImageRenderer } from "../media/content.ts";
import type { Credential, PublishJob } from "../types.ts";

export type PublishFailureCategory =
  | "validation"
  | "configuration"
  | "authorization"
  | "provider"
  | "timeout"
  | "internal";

export type PublishFailure = {
  code: string;
  message: string;
  userMessage: string;
  retryable: boolean;
  category: PublishFailureCategory;
};

export type PublishJobParams = {
  adapter: PlatformAdapter;
  credential: Credential | null;
  job: PublishJob;
  renderer: ImageRenderer | null;
  logger: Logger;
  options?: PublishOptions;
};

function validationFailure(issues: string[]): PipelineError {
  return { code: "VALIDATION_ERROR", message: issues.join("; "), issues };
}

/**
 * Validates a job, renders any card descriptors into public URLs, and hands it to
 * the adapter. Every rejection before `adapter.publish` happens without a
 * platform request.
 */
export async function publishJob(params: PublishJobParams): Promise<PublishResult> {
  const { adapter, credential, renderer, logger } = params;

  const parsed = publishJobSchema.safeParse(params.job);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "job"}: ${issue.message}`);
    logger.warn("Rejected publish job", { platform: adapter.platform, issues });
    return failedResult(validationFailure(issues));
  }

  const job = parsed.data;
  const validation = adapter.validateJob(job);

  for (const warning of validation.warnings) {
    logger.warn(warning, { platform: adapter.platform });
  }

  if (!validation.valid) {
    logger.warn("Job is not valid for the target platform", { platform: adapter.platform, errors: validation.errors });
    return failedResult(validationFailure(validation.errors));
  }

  if (!adapter.isConfigured()) {
    return failedResult({
      code: "CONFIGURATION_ERROR",
      platform: adapter.platform,
      missing: [],
      message: `${adapter.platform} client id and secret are not configured.`
    });
  }

  if (!credential || !adapter.hasValidToken(credential)) {
    logger.warn("No valid credential for publish", { platform: adapter.platform });
    return failedResult({
      code: "NOT_CONNECTED",
      platform: adapter.platform,
      message: `${adapter.platform} is not connected. Please authorize first.`
    });
  }

  const mediaUrls = await materializeContent(job.content, renderer, logger);
  if (!mediaUrls.ok) {
    return failedResult(mediaUrls.error);
  }

  return adapter.publish(
    credential,
    {
      caption: job.caption,
      hashtags: job.hashtags,
      linkUrl: job.linkUrl ?? null,
      mode: job.mode,
      mediaUrls: mediaUrls.value
    },
    params.options
  );
}

function getFailureCategory(error: PipelineError): PublishFailureCategory {
  switch (error.code) {
    case "VALIDATION_ERROR":
    case "UNSUPPORTED_CONTENT":
      return "validation";
    case "CONFIGURATION_ERROR":
      return "configuration";
    case "AUTHORIZATION_ERROR":
    case "EXCHANGE_ERROR":
    case "UPGRADE_ERROR":
    case "RESOLUTION_ERROR":
    case "NOT_CONNECTED":
      return "authorization";
    case "CONTAINER_ERROR":
    case "PUBLISH_ERROR":
      return "provider";
    case "TIMEOUT_ERROR":
      return "timeout";
    case "RENDER_ERROR":
      return "internal";
  }
}

function getUserSafeFailureMessage(category: PublishFailureCategory) {
  switch (category) {
    case "validation":
      return "This post is not valid for the selected platform.";
    case "configuration":
      return "Publishing is not configured for this platform.";
    case "authorization":
      return "The platform connection needs to be re-authorized.";
    case "provider":
      return "The platform rejected this publish attempt.";
    case "timeout":
      return "The platform is still processing the media. Try the whole post again later.";
    case "internal":
      return "The publish attempt failed unexpectedly.";
  }
}

function isRetryable(error: PipelineError) {
  if (error.code === "TIMEOUT_ERROR" || error.code === "RENDER_ERROR") {
    return true;
  }

  if (error.code === "CONTAINER_ERROR" || error.code === "PUBLISH_ERROR") {
    return error.status === null || error.status === 429 || error.status >= 500;
  }

  return false;
}

export function categorizePublishFailure(error: PipelineError): PublishFailure {
  const category = getFailureCategory(error);

  return {
    code: error.code,
    message: error.message,
    userMessage: getUserSafeFailureMessage(category),
    retryable: isRetryable(error),
    category
  };
}

export function failureHttpStatus(error: PipelineError) {
  if (error.code === "NOT_CONNECTED") {
    return 409;
  }

  switch (getFailureCategory(error)) {
    case "validation":
      return 422;
    case "configuration":
      return 503;
    case "authorization":
      return 401;
    case "provider":
      return 502;
    case "timeout":
      return 504;
    case "internal":
      return 500;
  }
}
