import { NextResponse } from "next/server";
import type { PipelineError } from "../errors.ts";
import { failureHttpStatus } from "../publish/service.ts";

export function ok<T>(data: T, status = 200) {
  return NextResponse.json({ data }, { status });
}

export function fail(code: string, message: string, status = 400, details?: unknown) {
  return NextResponse.json(
    {
      error: {
        code,
        message,
        details: details ?? null
      }
    },
    { status }
  );
}

/** Error envelope for a pipeline failure; `code` and `message` are lifted out of the details. */
export function failWithPipelineError(error: PipelineError, extra?: Record<string, unknown>) {
  const { code, message, ...details } = error;
  return fail(code, message, failureHttpStatus(error), { ...details, ...extra });
}
