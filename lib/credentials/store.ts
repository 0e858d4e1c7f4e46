import { z } from "zod";
import type { TokenCipher } from "../security/encryption.ts";
import type { Credential, Platform } from "../types.ts";

export interface CredentialStore {
  load(platform: Platform): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
}

export const credentialRowSchema = z.object({
  platform: z.enum(["instagram", "linkedin"]),
  account_id: z.string().nullable(),
  account_name: z.string().nullable(),
  access_token_enc: z.string().min(1),
  refresh_token_enc: z.string().nullable(),
  expires_at: z.string().nullable(),
  scopes: z.array(z.string()).default([]),
  updated_at: z.string()
});

export type CredentialRow = z.infer<typeof credentialRowSchema>;

export function credentialToRow(credential: Credential, cipher: TokenCipher, now: Date = new Date()): CredentialRow {
  return {
    platform: credential.platform,
    account_id: credential.accountId ?? null,
    account_name: credential.accountName ?? null,
    access_token_enc: cipher.encrypt(credential.accessToken),
    refresh_token_enc: credential.refreshToken ? cipher.encrypt(credential.refreshToken) : null,
    expires_at: credential.expiresAt ?? null,
    scopes: credential.scopes ?? [],
    updated_at: now.toISOString()
  };
}

/** Returns null for rows that do not match the table shape. Decryption failures throw. */
export function credentialFromRow(row: unknown, cipher: TokenCipher): Credential | null {
  const parsed = credentialRowSchema.safeParse(row);
  if (!parsed.success) {
    return null;
  }

  const value = parsed.data;

  return {
    platform: value.platform,
    accessToken: cipher.decrypt(value.access_token_enc),
    refreshToken: value.refresh_token_enc ? cipher.decrypt(value.refresh_token_enc) : null,
    expiresAt: value.expires_at,
    accountId: value.account_id,
    accountName: value.account_name,
    scopes: value.scopes
  };
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly credentials = new Map<Platform, Credential>();

  async load(platform: Platform) {
    const credential = this.credentials.get(platform);
    return credential ? { ...credential } : null;
  }

  async save(credential: Credential) {
    this.credentials.set(credential.platform, { ...credential });
  }
}
