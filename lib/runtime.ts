import { createAdapterRegistry, type AdapterRegistry } from "./adapters/index.ts";
import { loadPipelineSettings, type PipelineSettings } from "./config/settings.ts";
import { InMemoryCredentialStore, type CredentialStore } from "./credentials/store.ts";
import { SupabaseCredentialStore } from "./credentials/supabase-store.ts";
import { Logger } from "./logging/logger.ts";
import { UrlTemplateRenderer, type ImageRenderer } from "./media/content.ts";
import { createTokenCipher } from "./security/encryption.ts";
import { getSupabaseServiceClient } from "./supabase.ts";

export type PipelineRuntime = {
  settings: PipelineSettings;
  registry: AdapterRegistry;
  store: CredentialStore;
  renderer: ImageRenderer | null;
  logger: Logger;
};

// Survives between requests in one server process when no database is configured.
const localStore = new InMemoryCredentialStore();

function createCredentialStore(env: Record<string, string | undefined>, logger: Logger): CredentialStore {
  if (!env.SUPABASE_URL) {
    logger.warn("SUPABASE_URL is not set; credentials are kept in memory for this process only");
    return localStore;
  }

  return new SupabaseCredentialStore({
    client: getSupabaseServiceClient(env),
    cipher: createTokenCipher(env.TOKEN_ENCRYPTION_KEY),
    logger: logger.child("store")
  });
}

/** Builds everything a route handler needs from the environment of the current request. */
export function createPipelineRuntime(env: Record<string, string | undefined> = process.env): PipelineRuntime {
  const settings = loadPipelineSettings(env);
  const logger = new Logger({ level: settings.logLevel, context: "pipeline" });

  return {
    settings,
    registry: createAdapterRegistry(settings, { logger }),
    store: createCredentialStore(env, logger),
    renderer: settings.rendererBaseUrl ? new UrlTemplateRenderer(settings.rendererBaseUrl) : null,
    logger
  };
}
