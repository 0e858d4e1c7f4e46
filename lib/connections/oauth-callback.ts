import type { ConnectOptions, PlatformAdapter } from "../adapters/base.ts";
import type { OAuthStatePolicy } from "../config/settings.ts";
import type { CredentialStore } from "../credentials/store.ts";
import type { PipelineError } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import type { AuthorizationRequest, Credential, DiagnosticEntry } from "../types.ts";
import { parseAuthorizationRequest, validateOAuthCallback, type OAuthCallbackParams } from "./oauth-state.ts";

export type OAuthCallbackOutcome =
  | {
      ok: true;
      credential: Credential;
      trail: DiagnosticEntry[];
      stateVerified: boolean;
      warnings: string[];
    }
  | { ok: false; error: PipelineError; trail: DiagnosticEntry[] };

export type CompleteOAuthCallbackParams = {
  adapter: PlatformAdapter;
  pending: AuthorizationRequest | null;
  callback: OAuthCallbackParams;
  policy: OAuthStatePolicy;
  logger: Logger;
  now?: Date;
} & ConnectOptions;

/**
 * Validates the callback against the pending request, then lets the adapter
 * exchange the code and resolve the account. Storing the credential is the
 * caller's job.
 */
export async function completeOAuthCallback(params: CompleteOAuthCallbackParams): Promise<OAuthCallbackOutcome> {
  const { adapter, logger } = params;

  const validation = validateOAuthCallback({
    pending: params.pending,
    callback: params.callback,
    expectedPlatform: adapter.platform,
    policy: params.policy,
    logger,
    now: params.now
  });

  if (!validation.ok) {
    return { ok: false, error: validation.error, trail: [] };
  }

  const connected = await adapter.connect(validation.code, { pageId: params.pageId });

  if (!connected.ok) {
    logger.error("OAuth connection failed", { platform: adapter.platform, code: connected.error.code });
    return connected;
  }

  logger.info("OAuth connection completed", {
    platform: adapter.platform,
    accountId: connected.credential.accountId,
    stateVerified: validation.stateVerified
  });

  return {
    ok: true,
    credential: connected.credential,
    trail: connected.trail,
    stateVerified: validation.stateVerified,
    warnings: validation.warnings
  };
}

/** Meta reports a denial as `error_reason`, LinkedIn as `error`. */
export function readOAuthCallbackQuery(query: URLSearchParams): OAuthCallbackParams {
  return {
    code: query.get("code"),
    state: query.get("state"),
    error: query.get("error") ?? query.get("error_reason"),
    errorDescription: query.get("error_description")
  };
}

export type OAuthRedirectParams = Omit<CompleteOAuthCallbackParams, "pending" | "callback"> & {
  store: CredentialStore;
  pendingCookie: string | null | undefined;
  query: URLSearchParams;
};

/**
 * Handles the browser redirect back from the provider. The redirect carries no
 * credentials of its own: the http-only pending-request cookie set when the flow
 * started, and the state it holds, are what tie the callback to that start.
 * A connected credential is saved before returning.
 */
export async function connectFromOAuthRedirect(params: OAuthRedirectParams): Promise<OAuthCallbackOutcome> {
  const { store, pendingCookie, query, ...rest } = params;

  const outcome = await completeOAuthCallback({
    ...rest,
    pending: parseAuthorizationRequest(pendingCookie),
    callback: readOAuthCallbackQuery(query)
  });

  if (outcome.ok) {
    await store.save(outcome.credential);
  }

  return outcome;
}
