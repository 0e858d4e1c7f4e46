import type { PipelineError, Result } from "../errors.ts";
import type { PublishStateChange } from "../publish/state-machine.ts";
import type {
  Credential,
  DiagnosticEntry,
  Platform,
  PublishJob,
  ResolvedPublishJob
} from "../types.ts";

export type AdapterValidationResult = {
  valid: boolean;
  warnings: string[];
  errors: string[];
};

export type ShortLivedToken = {
  accessToken: string;
  tokenType: string;
  expiresIn: number | null;
  refreshToken: string | null;
};

export type LongLivedToken = {
  accessToken: string;
  tokenType: string;
  expiresIn: number;
  expiresAt: string;
};

export type PublishResult =
  | {
      success: true;
      postId: string | null;
      state: "PUBLISHED";
      history: readonly PublishStateChange[];
    }
  | {
      success: false;
      error: PipelineError;
      state: "FAILED" | "TIMEOUT";
      history: readonly PublishStateChange[];
    };

export type ConnectOutcome =
  | { ok: true; credential: Credential; trail: DiagnosticEntry[] }
  | { ok: false; error: PipelineError; trail: DiagnosticEntry[] };

export type ConnectOptions = {
  /** Publish through this page instead of the first manageable one. */
  pageId?: string | null;
};

export type PublishOptions = {
  deadline?: Date | null;
};

export interface TokenBroker {
  buildAuthorizationUrl(state: string): Result<string>;
  exchangeCode(code: string): Promise<Result<ShortLivedToken>>;
}

export interface TokenUpgrader {
  upgradeToken(token: ShortLivedToken): Promise<Result<LongLivedToken>>;
}

export type ResolvedAccount = {
  accountId: string;
  accountName: string | null;
  pageId: string | null;
};

export type ResolutionOutcome =
  | { ok: true; account: ResolvedAccount; trail: DiagnosticEntry[] }
  | {
      ok: false;
      error: Extract<PipelineError, { code: "RESOLUTION_ERROR" }>;
      trail: DiagnosticEntry[];
    };

export interface AccountResolver {
  resolve(accessToken: string, options?: ConnectOptions): Promise<ResolutionOutcome>;
}

export interface PlatformAdapter {
  readonly platform: Platform;
  isConfigured(): boolean;
  hasValidToken(credential: Credential | null, now?: Date): boolean;
  buildAuthorizationUrl(state: string): Result<string>;
  exchangeCode(code: string): Promise<Result<ShortLivedToken>>;
  /** Turns an authorization code into a publish-ready credential. Never persists it. */
  connect(code: string, options?: ConnectOptions): Promise<ConnectOutcome>;
  validateJob(job: PublishJob): AdapterValidationResult;
  publish(credential: Credential, job: ResolvedPublishJob, options?: PublishOptions): Promise<PublishResult>;
}

export function failedResult(
  error: PipelineError,
  history: readonly PublishStateChange[] = [],
  state: "FAILED" | "TIMEOUT" = "FAILED"
): PublishResult {
  return { success: false, error, state, history };
}
