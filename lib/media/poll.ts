import { setTimeout as delay } from "node:timers/promises";
import type { PollPolicy } from "../config/settings.ts";
import type { Logger } from "../logging/logger.ts";
import type { ApiFailure, ContainerStatusReading, MediaContainerApi } from "./container-api.ts";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export type PollOutcome =
  | { kind: "ready"; attempts: number }
  | { kind: "failed"; attempts: number; detail: string | null }
  | { kind: "timeout"; attempts: number }
  | { kind: "error"; attempts: number; failure: ApiFailure };

export type PollOptions = {
  policy: PollPolicy;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  deadline?: Date | null;
  onReading?: (reading: ContainerStatusReading, attempt: number) => void;
};

/**
 * Polls one container until it is ready, fails, or the attempt budget (or the
 * job deadline) runs out. The delay is flat; there is no wait after the last attempt.
 */
export async function pollUntilReady(
  api: MediaContainerApi,
  containerId: string,
  options: PollOptions
): Promise<PollOutcome> {
  const { policy, logger } = options;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const deadline = options.deadline ?? null;

  let attempts = 0;

  while (attempts < policy.maxAttempts) {
    if (deadline && now().getTime() >= deadline.getTime()) {
      logger.warn("Job deadline reached while polling", { containerId, attempts });
      return { kind: "timeout", attempts };
    }

    attempts += 1;
    const reading = await api.readStatus(containerId);

    if (!reading.ok) {
      logger.error("Container status check failed", {
        containerId,
        attempt: attempts,
        status: reading.error.status,
        message: reading.error.message
      });
      return { kind: "error", attempts, failure: reading.error };
    }

    options.onReading?.(reading.value, attempts);
    const { signal, rawStatus, detail } = reading.value;

    if (signal === "ready") {
      logger.info("Container ready", { containerId, attempt: attempts, status: rawStatus });
      return { kind: "ready", attempts };
    }

    if (signal === "absent") {
      // TODO: confirm per media type that a missing status_code really means no async processing.
      logger.info("No status field returned; treating container as ready", { containerId, attempt: attempts });
      return { kind: "ready", attempts };
    }

    if (signal === "failed") {
      logger.error("Container processing failed", { containerId, attempt: attempts, status: rawStatus, detail });
      return { kind: "failed", attempts, detail };
    }

    if (signal === "unknown") {
      logger.warn("Unknown container status; still waiting", { containerId, attempt: attempts, status: rawStatus });
    } else {
      logger.debug("Container still processing", { containerId, attempt: attempts });
    }

    if (attempts < policy.maxAttempts) {
      await sleep(policy.delayMs);
    }
  }

  logger.error("Container did not become ready within the polling budget", {
    containerId,
    maxAttempts: policy.maxAttempts
  });
  return { kind: "timeout", attempts };
}
