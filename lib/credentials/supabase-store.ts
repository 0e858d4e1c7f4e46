import type { SupabaseClient } from "@supabase/supabase-js";
import type { Logger } from "../logging/logger.ts";
import type { TokenCipher } from "../security/encryption.ts";
import type { Credential, Platform } from "../types.ts";
import { credentialFromRow, credentialToRow, type CredentialStore } from "./store.ts";

export const CREDENTIALS_TABLE = "platform_credentials";

const CREDENTIAL_COLUMNS =
  "platform, account_id, account_name, access_token_enc, refresh_token_enc, expires_at, scopes, updated_at";

export class CredentialStoreError extends Error {
  code: string;
  status: number;

  constructor(code: string, message: string, status = 500) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

/** One credential per platform, tokens encrypted at rest. */
export class SupabaseCredentialStore implements CredentialStore {
  private readonly client: SupabaseClient;
  private readonly cipher: TokenCipher;
  private readonly logger: Logger;

  constructor(deps: { client: SupabaseClient; cipher: TokenCipher; logger: Logger }) {
    this.client = deps.client;
    this.cipher = deps.cipher;
    this.logger = deps.logger;
  }

  async load(platform: Platform): Promise<Credential | null> {
    const { data, error } = await this.client
      .from(CREDENTIALS_TABLE)
      .select(CREDENTIAL_COLUMNS)
      .eq("platform", platform)
      .maybeSingle();

    if (error) {
      this.logger.error("Failed to read stored credential", { platform, message: error.message });
      throw new CredentialStoreError("CREDENTIAL_READ_FAILED", error.message);
    }

    if (!data) {
      return null;
    }

    const credential = credentialFromRow(data, this.cipher);
    if (!credential) {
      this.logger.warn("Stored credential row has an unexpected shape", { platform });
    }

    return credential;
  }

  async save(credential: Credential) {
    const { error } = await this.client
      .from(CREDENTIALS_TABLE)
      .upsert(credentialToRow(credential, this.cipher), { onConflict: "platform" });

    if (error) {
      this.logger.error("Failed to save credential", { platform: credential.platform, message: error.message });
      throw new CredentialStoreError("CREDENTIAL_WRITE_FAILED", error.message);
    }
  }
}
