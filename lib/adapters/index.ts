import type { PipelineSettings } from "../config/settings.ts";
import type { FetchLike } from "../http/json-request.ts";
import { Logger } from "../logging/logger.ts";
import type { ChildCreationMode } from "../media/orchestrator.ts";
import type { Sleep } from "../media/poll.ts";
import type { Platform } from "../types.ts";
import type { PlatformAdapter } from "./base.ts";
import { InstagramAdapter } from "./instagram.ts";
import { LinkedInAdapter } from "./linkedin.ts";

export type AdapterRegistry = Record<Platform, PlatformAdapter>;

export type AdapterRuntime = {
  logger?: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  childCreation?: ChildCreationMode;
};

export function createAdapterRegistry(settings: PipelineSettings, runtime: AdapterRuntime = {}): AdapterRegistry {
  const logger = runtime.logger ?? new Logger({ level: settings.logLevel, context: "publish" });

  return {
    instagram: new InstagramAdapter({
      settings: settings.instagram,
      poll: settings.poll,
      logger: logger.child("instagram"),
      fetchImpl: runtime.fetchImpl,
      sleep: runtime.sleep,
      now: runtime.now,
      childCreation: runtime.childCreation
    }),
    linkedin: new LinkedInAdapter({
      settings: settings.linkedin,
      logger: logger.child("linkedin"),
      fetchImpl: runtime.fetchImpl,
      now: runtime.now
    })
  };
}

export function getAdapter(registry: AdapterRegistry, platform: Platform): PlatformAdapter {
  return registry[platform];
}
