import type { Credential } from "../types.ts";

/**
 * A credential can publish only when it carries both an access token and a
 * resolved account id, and its expiry (if any) is still ahead of `now`.
 */
export function hasValidToken(credential: Credential | null | undefined, now: Date = new Date()) {
  if (!credential?.accessToken || !credential.accountId) {
    return false;
  }

  if (!credential.expiresAt) {
    return true;
  }

  const expiresAt = new Date(credential.expiresAt);
  if (Number.isNaN(expiresAt.getTime())) {
    return false;
  }

  return expiresAt.getTime() > now.getTime();
}

export function computeExpiresAt(expiresInSeconds: number, now: Date = new Date()) {
  return new Date(now.getTime() + expiresInSeconds * 1000).toISOString();
}

/** Connection summary safe to return to clients: no token material. */
export function describeCredential(credential: Credential | null, now: Date = new Date()) {
  return {
    connected: hasValidToken(credential, now),
    accountId: credential?.accountId ?? null,
    accountName: credential?.accountName ?? null,
    expiresAt: credential?.expiresAt ?? null,
    scopes: credential?.scopes ?? []
  };
}
