import { z } from "zod";
import type { Result } from "../errors.ts";
import type { HttpOutcome } from "../http/json-request.ts";
import type {
  ApiFailure,
  ContainerCreateRequest,
  ContainerStatusReading,
  MediaContainerApi,
  PollSignal
} from "../media/container-api.ts";
import type { MetaGraphClient } from "./meta-graph.ts";

const idResponseSchema = z.object({ id: z.string().min(1) });

const statusResponseSchema = z.object({
  id: z.string().optional(),
  status_code: z.string().optional(),
  status: z.string().optional()
});

export function interpretStatusCode(statusCode: string | undefined): PollSignal {
  switch (statusCode) {
    case undefined:
      return "absent";
    case "FINISHED":
    case "PUBLISHED":
      return "ready";
    case "ERROR":
    case "EXPIRED":
      return "failed";
    case "IN_PROGRESS":
      return "processing";
    default:
      return "unknown";
  }
}

function toResult<T, V>(outcome: HttpOutcome<T>, pick: (data: T) => V): Result<V, ApiFailure> {
  if (!outcome.ok) {
    return { ok: false, error: { status: outcome.status, rawBody: outcome.rawBody, message: outcome.message } };
  }
  return { ok: true, value: pick(outcome.data) };
}

/** Instagram Graph media containers for one business account and token. */
export class InstagramContainerApi implements MediaContainerApi {
  private readonly graph: MetaGraphClient;
  private readonly accountId: string;
  private readonly accessToken: string;

  constructor(deps: { graph: MetaGraphClient; accountId: string; accessToken: string }) {
    this.graph = deps.graph;
    this.accountId = deps.accountId;
    this.accessToken = deps.accessToken;
  }

  async createContainer(request: ContainerCreateRequest) {
    const form: Record<string, string> =
      request.kind === "image"
        ? { image_url: request.imageUrl, caption: request.caption }
        : request.kind === "carousel_item"
          ? { image_url: request.imageUrl, is_carousel_item: "true" }
          : { media_type: "CAROUSEL", children: request.children.join(","), caption: request.caption };

    const response = await this.graph.postForm(
      `/${this.accountId}/media`,
      { ...form, access_token: this.accessToken },
      idResponseSchema
    );
    return toResult(response, (data) => ({ id: data.id }));
  }

  async readStatus(containerId: string) {
    const response = await this.graph.get(
      `/${containerId}`,
      { fields: "status_code,status", access_token: this.accessToken },
      statusResponseSchema
    );
    return toResult(
      response,
      (data): ContainerStatusReading => ({
        signal: interpretStatusCode(data.status_code),
        rawStatus: data.status_code ?? null,
        detail: data.status ?? null
      })
    );
  }

  async publishContainer(containerId: string) {
    const response = await this.graph.postForm(
      `/${this.accountId}/media_publish`,
      { creation_id: containerId, access_token: this.accessToken },
      idResponseSchema
    );
    return toResult(response, (data) => ({ postId: data.id }));
  }
}
