import type { Result } from "../errors.ts";
import type { HttpFailure } from "../http/json-request.ts";

export type ContainerCreateRequest =
  | { kind: "image"; imageUrl: string; caption: string }
  | { kind: "carousel_item"; imageUrl: string }
  | { kind: "carousel"; children: string[]; caption: string };

/**
 * How a single status read should steer the poll loop.
 * `absent` means the platform returned no status field at all.
 */
export type PollSignal = "ready" | "failed" | "processing" | "unknown" | "absent";

export type ContainerStatusReading = {
  signal: PollSignal;
  rawStatus: string | null;
  detail: string | null;
};

export type ApiFailure = Omit<HttpFailure, "ok">;

/** Server-side operations on media containers for one publishing account. */
export interface MediaContainerApi {
  createContainer(request: ContainerCreateRequest): Promise<Result<{ id: string }, ApiFailure>>;
  readStatus(containerId: string): Promise<Result<ContainerStatusReading, ApiFailure>>;
  publishContainer(containerId: string): Promise<Result<{ postId: string }, ApiFailure>>;
}
