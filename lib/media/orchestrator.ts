import { failedResult, type PublishOptions, type PublishResult } from "../adapters/base.ts";
import type { PollPolicy } from "../config/settings.ts";
import type { ContainerStage, PipelineError, Result } from "../errors.ts";
import type { Logger } from "../logging/logger.ts";
import { redactBody } from "../logging/redaction.ts";
import { PublishStateMachine } from "../publish/state-machine.ts";
import type { MediaContainer } from "../types.ts";
import type { ApiFailure, MediaContainerApi } from "./container-api.ts";
import { pollUntilReady, type Sleep } from "./poll.ts";

export const CAROUSEL_MIN_ITEMS = 2;
export const CAROUSEL_MAX_ITEMS = 10;

export type ChildCreationMode = "sequential" | "concurrent";

export type OrchestratorDeps = {
  api: MediaContainerApi;
  policy: PollPolicy;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  childCreation?: ChildCreationMode;
};

function containerError(
  stage: ContainerStage,
  failure: ApiFailure,
  extra: { containerId?: string; itemIndex?: number } = {}
): PipelineError {
  const subject = extra.itemIndex !== undefined ? `carousel item ${extra.itemIndex + 1}` : "media container";
  const verb = stage === "create" ? "create" : stage === "status" ? "check status of" : "publish";

  return {
    code: "CONTAINER_ERROR",
    message: `Failed to ${verb} ${subject}: ${failure.message}`,
    stage,
    status: failure.status,
    rawBody: failure.rawBody,
    ...extra
  };
}

/**
 * Runs the create → poll → publish sequence for one job. Containers live only for
 * the duration of the call; nothing is cleaned up on failure.
 */
export class MediaContainerOrchestrator {
  private readonly api: MediaContainerApi;
  private readonly policy: PollPolicy;
  private readonly logger: Logger;
  private readonly sleep: Sleep | undefined;
  private readonly now: () => Date;
  private readonly childCreation: ChildCreationMode;

  constructor(deps: OrchestratorDeps) {
    this.api = deps.api;
    this.policy = deps.policy;
    this.logger = deps.logger;
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
    this.childCreation = deps.childCreation ?? "sequential";
  }

  async publishSingle(imageUrl: string, caption: string, options: PublishOptions = {}): Promise<PublishResult> {
    const machine = new PublishStateMachine(this.now);

    this.logger.info("Creating media container");
    const created = await this.api.createContainer({ kind: "image", imageUrl, caption });

    if (!created.ok) {
      this.logger.error("Media container creation failed", {
        status: created.error.status,
        body: redactBody(created.error.rawBody)
      });
      return failedResult(containerError("create", created.error), machine.history, machine.fail("FAILED"));
    }

    const container: MediaContainer = { id: created.value.id, status: "CREATED", parentId: null };
    machine.transition("CREATED");
    this.logger.info("Created media container", { containerId: container.id });

    return this.pollAndPublish(container, machine, options);
  }

  async publishCarousel(imageUrls: string[], caption: string, options: PublishOptions = {}): Promise<PublishResult> {
    const machine = new PublishStateMachine(this.now);

    if (imageUrls.length < CAROUSEL_MIN_ITEMS || imageUrls.length > CAROUSEL_MAX_ITEMS) {
      const message = `Carousel requires ${CAROUSEL_MIN_ITEMS}-${CAROUSEL_MAX_ITEMS} images, got ${imageUrls.length}.`;
      this.logger.warn("Rejected carousel before creation", { itemCount: imageUrls.length });
      return failedResult({ code: "VALIDATION_ERROR", message, issues: [message] }, machine.history, machine.fail("FAILED"));
    }

    const children = await this.createChildren(imageUrls);
    if (!children.ok) {
      return failedResult(children.error, machine.history, machine.fail("FAILED"));
    }

    this.logger.info("Creating carousel container", { itemCount: children.value.length });
    const parent = await this.api.createContainer({
      kind: "carousel",
      children: children.value.map((child) => child.id),
      caption
    });

    if (!parent.ok) {
      this.logger.error("Carousel container creation failed", {
        status: parent.error.status,
        body: redactBody(parent.error.rawBody)
      });
      return failedResult(containerError("create", parent.error), machine.history, machine.fail("FAILED"));
    }

    const container: MediaContainer = { id: parent.value.id, status: "CREATED", parentId: null };
    machine.transition("CREATED");
    this.logger.info("Created carousel container", { containerId: container.id });

    // Children are covered by the parent's readiness once referenced.
    return this.pollAndPublish(container, machine, options);
  }

  private async createChildren(imageUrls: string[]): Promise<Result<MediaContainer[]>> {
    if (this.childCreation === "concurrent") {
      const results = await Promise.all(
        imageUrls.map((imageUrl) => this.api.createContainer({ kind: "carousel_item", imageUrl }))
      );
      const children: MediaContainer[] = [];
      for (const [index, result] of results.entries()) {
        if (!result.ok) {
          return { ok: false, error: this.childFailure(index, result.error) };
        }
        children.push({ id: result.value.id, status: "CREATED", parentId: null });
      }
      return { ok: true, value: children };
    }

    const children: MediaContainer[] = [];
    for (const [index, imageUrl] of imageUrls.entries()) {
      this.logger.debug("Creating carousel item container", { itemIndex: index });
      const result = await this.api.createContainer({ kind: "carousel_item", imageUrl });

      if (!result.ok) {
        return { ok: false, error: this.childFailure(index, result.error) };
      }

      children.push({ id: result.value.id, status: "CREATED", parentId: null });
      this.logger.info("Created carousel item", { itemIndex: index, containerId: result.value.id });
    }

    return { ok: true, value: children };
  }

  private childFailure(index: number, failure: ApiFailure) {
    this.logger.error("Failed to create carousel item", {
      itemIndex: index,
      status: failure.status,
      body: redactBody(failure.rawBody)
    });
    return containerError("create", failure, { itemIndex: index });
  }

  private async pollAndPublish(
    container: MediaContainer,
    machine: PublishStateMachine,
    options: PublishOptions
  ): Promise<PublishResult> {
    const outcome = await pollUntilReady(this.api, container.id, {
      policy: this.policy,
      logger: this.logger,
      sleep: this.sleep,
      now: this.now,
      deadline: options.deadline ?? null,
      onReading: (reading) => {
        if (reading.signal === "processing" || reading.signal === "unknown") {
          container.status = "PROCESSING";
          machine.transition("PROCESSING");
        }
      }
    });

    if (outcome.kind === "error") {
      return failedResult(
        containerError("status", outcome.failure, { containerId: container.id }),
        machine.history,
        machine.fail("FAILED")
      );
    }

    if (outcome.kind === "failed") {
      container.status = "FAILED";
      const detail = outcome.detail ?? "ERROR";
      return failedResult(
        {
          code: "CONTAINER_ERROR",
          message: `Media container failed to process: ${detail}`,
          stage: "status",
          status: null,
          rawBody: detail,
          containerId: container.id
        },
        machine.history,
        machine.fail("FAILED")
      );
    }

    if (outcome.kind === "timeout") {
      return failedResult(
        {
          code: "TIMEOUT_ERROR",
          message: "Media container failed to process in time. Please try again.",
          containerId: container.id,
          attempts: outcome.attempts
        },
        machine.history,
        machine.fail("TIMEOUT")
      );
    }

    container.status = "READY";
    machine.transition("READY");

    this.logger.info("Publishing media container", { containerId: container.id });
    const published = await this.api.publishContainer(container.id);

    if (!published.ok) {
      this.logger.error("Publishing media container failed", {
        containerId: container.id,
        status: published.error.status,
        body: redactBody(published.error.rawBody)
      });
      return failedResult(
        containerError("publish", published.error, { containerId: container.id }),
        machine.history,
        machine.fail("FAILED")
      );
    }

    machine.transition("PUBLISHED");
    this.logger.info("Published media container", { containerId: container.id, postId: published.value.postId });

    return { success: true, postId: published.value.postId, state: "PUBLISHED", history: machine.history };
  }
}
