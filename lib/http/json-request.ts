import type { z } from "zod";
import { describeUnknownError } from "../errors.ts";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpSuccess<T> = {
  ok: true;
  status: number;
  data: T;
  headers: Headers;
};

export type HttpFailure = {
  ok: false;
  /** `null` when the request never produced a response. */
  status: number | null;
  rawBody: string;
  message: string;
};

export type HttpOutcome<T> = HttpSuccess<T> | HttpFailure;

type PlatformErrorBody = {
  error?: { message?: unknown } | string;
  message?: unknown;
  error_description?: unknown;
};

function extractErrorMessage(parsed: unknown, status: number) {
  if (parsed && typeof parsed === "object") {
    const body: PlatformErrorBody = parsed;
    if (body.error && typeof body.error === "object" && typeof body.error.message === "string") {
      return body.error.message;
    }
    if (typeof body.error_description === "string") {
      return body.error_description;
    }
    if (typeof body.message === "string") {
      return body.message;
    }
    if (typeof body.error === "string") {
      return body.error;
    }
  }

  return `Request failed with status ${status}.`;
}

function parseJsonText(text: string): unknown {
  if (!text) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Performs one request and decodes the JSON body with `schema`. Network failures,
 * non-2xx statuses and bodies that do not match the schema all come back as
 * `HttpFailure` with the raw body preserved.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  schema: S
): Promise<HttpOutcome<z.output<S>>> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    const message = describeUnknownError(error);
    return { ok: false, status: null, rawBody: message, message: `Network error: ${message}` };
  }

  const rawBody = await response.text().catch(() => "");
  const parsed = parseJsonText(rawBody);

  if (!response.ok) {
    return {
      ok: false,
      status: response.status,
      rawBody,
      message: extractErrorMessage(parsed, response.status)
    };
  }

  const decoded = schema.safeParse(parsed);
  if (!decoded.success) {
    return {
      ok: false,
      status: response.status,
      rawBody,
      message: `Unexpected response shape: ${decoded.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join(", ")}`
    };
  }

  return {
    ok: true,
    status: response.status,
    data: decoded.data,
    headers: response.headers
  };
}

export function formBody(fields: Record<string, string>) {
  return {
    method: "POST",
    headers: {
      "content-type": "application/x-www-form-urlencoded",
      accept: "application/json"
    },
    body: new URLSearchParams(fields).toString()
  } satisfies RequestInit;
}
