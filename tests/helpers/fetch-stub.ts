import type { FetchLike } from "../../lib/http/json-request.ts";
import { Logger, type LogSink } from "../../lib/logging/logger.ts";

export type RecordedRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | null;
};

export type ScriptedResponse =
  | { status?: number; body?: unknown; headers?: Record<string, string> }
  | Error;

/** Replays queued responses in order and records every request it receives. */
export function createFetchStub(responses: ScriptedResponse[] = []) {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (input, init = {}) => {
    const method = init.method ?? "GET";
    requests.push({
      method,
      url: input,
      headers: Object.fromEntries(new Headers(init.headers).entries()),
      body: typeof init.body === "string" ? init.body : null
    });

    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${method} ${input}`);
    }

    if (next instanceof Error) {
      throw next;
    }

    const text = next.body === undefined ? "" : typeof next.body === "string" ? next.body : JSON.stringify(next.body);
    return new Response(text, { status: next.status ?? 200, headers: next.headers });
  };

  return {
    fetchImpl,
    requests,
    pending: () => queue.length
  };
}

export function formOf(request: RecordedRequest | undefined) {
  return new URLSearchParams(request?.body ?? "");
}

export function jsonOf(request: RecordedRequest | undefined): unknown {
  return JSON.parse(request?.body ?? "null");
}

export function createRecordingLogger(context?: string) {
  const lines: unknown[][] = [];
  const record = (...args: unknown[]) => {
    lines.push(args);
  };
  const sink: LogSink = { debug: record, info: record, warn: record, error: record };

  return {
    logger: new Logger({ level: "debug", context, sink }),
    lines,
    output: () => lines.map((args) => JSON.stringify(args)).join("\n")
  };
}

export function createSleepRecorder() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
}

export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");
