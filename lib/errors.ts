import type { DiagnosticEntry, Platform } from "./types.ts";

export type AuthorizationFailureReason =
  | "denied"
  | "missing_code"
  | "state_missing"
  | "state_mismatch"
  | "state_expired"
  | "platform_mismatch";

export type ResolutionFailureReason = "no_accounts" | "not_linked" | "page_not_found" | "request_failed";

export type ContainerStage = "create" | "status" | "publish";

export type PipelineError =
  | { code: "CONFIGURATION_ERROR"; message: string; platform: Platform; missing: string[] }
  | { code: "AUTHORIZATION_ERROR"; message: string; reason: AuthorizationFailureReason }
  | { code: "EXCHANGE_ERROR"; message: string; status: number | null; rawBody: string }
  | { code: "UPGRADE_ERROR"; message: string; status: number | null; rawBody: string }
  | {
      code: "RESOLUTION_ERROR";
      message: string;
      reason: ResolutionFailureReason;
      trail: DiagnosticEntry[];
    }
  | {
      code: "CONTAINER_ERROR";
      message: string;
      stage: ContainerStage;
      status: number | null;
      rawBody: string;
      containerId?: string;
      itemIndex?: number;
    }
  | { code: "TIMEOUT_ERROR"; message: string; containerId: string; attempts: number }
  | { code: "PUBLISH_ERROR"; message: string; status: number | null; rawBody: string }
  | { code: "VALIDATION_ERROR"; message: string; issues: string[] }
  | { code: "NOT_CONNECTED"; message: string; platform: Platform }
  | { code: "RENDER_ERROR"; message: string; itemIndex: number }
  | { code: "UNSUPPORTED_CONTENT"; message: string; platform: Platform };

export type Result<T, E = PipelineError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err(error: PipelineError): { ok: false; error: PipelineError } {
  return { ok: false, error };
}

export function describeUnknownError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
