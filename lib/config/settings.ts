import { z } from "zod";
import { parseLogLevel, type LogLevel } from "../logging/logger.ts";

export const DEFAULT_GRAPH_VERSION = "v22.0";
export const DEFAULT_POLL_MAX_ATTEMPTS = 30;
export const DEFAULT_POLL_DELAY_MS = 2000;

export type OAuthStatePolicy = "strict" | "lenient";

export type OAuthClientSettings = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

export type InstagramSettings = OAuthClientSettings & {
  graphVersion: string;
};

export type LinkedInSettings = OAuthClientSettings;

export type PollPolicy = {
  maxAttempts: number;
  delayMs: number;
};

export type PipelineSettings = {
  instagram: InstagramSettings;
  linkedin: LinkedInSettings;
  poll: PollPolicy;
  oauthStatePolicy: OAuthStatePolicy;
  rendererBaseUrl: string | null;
  logLevel: LogLevel;
};

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? "");

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : Number(value)),
    z.number().int().positive().default(fallback)
  );

const envSchema = z.object({
  INSTAGRAM_APP_ID: optionalText,
  INSTAGRAM_APP_SECRET: optionalText,
  INSTAGRAM_REDIRECT_URI: optionalText,
  META_GRAPH_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, "META_GRAPH_VERSION must look like v22.0")
    .optional(),
  LINKEDIN_CLIENT_ID: optionalText,
  LINKEDIN_CLIENT_SECRET: optionalText,
  LINKEDIN_REDIRECT_URI: optionalText,
  PUBLISH_POLL_MAX_ATTEMPTS: positiveInt(DEFAULT_POLL_MAX_ATTEMPTS),
  PUBLISH_POLL_DELAY_MS: positiveInt(DEFAULT_POLL_DELAY_MS),
  OAUTH_STATE_POLICY: z.enum(["strict", "lenient"]).optional(),
  RENDERER_BASE_URL: z.string().url().optional().or(z.literal("")),
  LOG_LEVEL: z.string().optional()
});

export class SettingsError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/**
 * Reads pipeline settings from an env-like record. Missing client credentials are
 * allowed here; adapters report them as not configured.
 */
export function loadPipelineSettings(env: Record<string, string | undefined> = process.env): PipelineSettings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    instagram: {
      clientId: values.INSTAGRAM_APP_ID,
      clientSecret: values.INSTAGRAM_APP_SECRET,
      redirectUri: values.INSTAGRAM_REDIRECT_URI,
      graphVersion: values.META_GRAPH_VERSION ?? DEFAULT_GRAPH_VERSION
    },
    linkedin: {
      clientId: values.LINKEDIN_CLIENT_ID,
      clientSecret: values.LINKEDIN_CLIENT_SECRET,
      redirectUri: values.LINKEDIN_REDIRECT_URI
    },
    poll: {
      maxAttempts: values.PUBLISH_POLL_MAX_ATTEMPTS,
      delayMs: values.PUBLISH_POLL_DELAY_MS
    },
    oauthStatePolicy: values.OAUTH_STATE_POLICY ?? "strict",
    rendererBaseUrl: values.RENDERER_BASE_URL ? values.RENDERER_BASE_URL : null,
    logLevel: parseLogLevel(values.LOG_LEVEL)
  };
}

export function missingClientSettings(
  settings: OAuthClientSettings,
  names: { clientId: string; clientSecret: string; redirectUri: string }
) {
  const missing: string[] = [];
  if (!settings.clientId) missing.push(names.clientId);
  if (!settings.clientSecret) missing.push(names.clientSecret);
  if (!settings.redirectUri) missing.push(names.redirectUri);
  return missing;
}
