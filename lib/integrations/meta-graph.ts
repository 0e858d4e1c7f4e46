import type { z } from "zod";
import { formBody, requestJson, type FetchLike, type HttpOutcome } from "../http/json-request.ts";

export const META_DIALOG_BASE = "https://www.facebook.com";
export const META_GRAPH_BASE = "https://graph.facebook.com";

/** Thin Graph API client bound to one API version. */
export class MetaGraphClient {
  readonly graphVersion: string;
  private readonly fetchImpl: FetchLike;

  constructor(graphVersion: string, fetchImpl: FetchLike) {
    this.graphVersion = graphVersion;
    this.fetchImpl = fetchImpl;
  }

  url(path: string, params: Record<string, string> = {}) {
    const normalizedPath = path.startsWith("/") ? path : `/${path}`;
    const query = new URLSearchParams(params).toString();
    const base = `${META_GRAPH_BASE}/${this.graphVersion}${normalizedPath}`;
    return query ? `${base}?${query}` : base;
  }

  get<S extends z.ZodTypeAny>(path: string, params: Record<string, string>, schema: S): Promise<HttpOutcome<z.output<S>>> {
    return requestJson(this.fetchImpl, this.url(path, params), { method: "GET", headers: { accept: "application/json" } }, schema);
  }

  postForm<S extends z.ZodTypeAny>(path: string, form: Record<string, string>, schema: S): Promise<HttpOutcome<z.output<S>>> {
    return requestJson(this.fetchImpl, this.url(path), formBody(form), schema);
  }
}
