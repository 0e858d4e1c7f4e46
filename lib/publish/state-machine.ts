export type PublishState = "PENDING" | "CREATED" | "PROCESSING" | "READY" | "PUBLISHED" | "FAILED" | "TIMEOUT";

export type TerminalPublishState = "PUBLISHED" | "FAILED" | "TIMEOUT";

const TRANSITIONS: Record<PublishState, readonly PublishState[]> = {
  PENDING: ["CREATED", "FAILED"],
  CREATED: ["PROCESSING", "READY", "FAILED", "TIMEOUT"],
  PROCESSING: ["PROCESSING", "READY", "FAILED", "TIMEOUT"],
  READY: ["PUBLISHED", "FAILED"],
  PUBLISHED: [],
  FAILED: [],
  TIMEOUT: []
};

export type PublishStateChange = {
  from: PublishState;
  to: PublishState;
  at: string;
};

export class InvalidTransitionError extends Error {
  constructor(from: PublishState, to: PublishState) {
    super(`Illegal publish state transition ${from} -> ${to}.`);
    this.name = "InvalidTransitionError";
  }
}

/** Lifecycle of one publish job, from before the first container exists to a terminal state. */
export class PublishStateMachine {
  private current: PublishState = "PENDING";
  private readonly changes: PublishStateChange[] = [];
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  get state() {
    return this.current;
  }

  get history(): readonly PublishStateChange[] {
    return this.changes;
  }

  canTransition(to: PublishState) {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: PublishState) {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }

    // PROCESSING -> PROCESSING is a repeated poll, not a state change worth recording.
    if (to !== this.current) {
      this.changes.push({ from: this.current, to, at: this.clock().toISOString() });
    }
    this.current = to;
  }

  /** Ends the job; returns the terminal state actually reached. */
  fail(to: "FAILED" | "TIMEOUT"): "FAILED" | "TIMEOUT" {
    this.transition(to);
    return to;
  }
}
