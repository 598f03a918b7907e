export type RelayStage =
  | "checkpoint-get"
  | "current-time"
  | "open"
  | "read"
  | "checkpoint-stage"
  | "checkpoint-flush";

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Unrecoverable failure of a relay run. The caller owns restart policy.
 */
export class RelayError extends Error {
  readonly stage: RelayStage;

  constructor(stage: RelayStage, message: string, cause: unknown) {
    super(`${message}: ${describeCause(cause)}`, { cause });
    this.name = "RelayError";
    this.stage = stage;
  }
}

export class RunCancelledError extends Error {
  constructor() {
    super("relay run cancelled");
    this.name = "RunCancelledError";
  }
}

export class ConversionError extends Error {
  readonly eventKey: number;

  constructor(eventKey: number, message: string, cause?: unknown) {
    super(
      cause === undefined
        ? `convert event ${eventKey}: ${message}`
        : `convert event ${eventKey}: ${message}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = "ConversionError";
    this.eventKey = eventKey;
  }
}

export class DeliveryError extends Error {
  readonly eventKey: number;

  constructor(eventKey: number, cause: unknown) {
    super(`send event ${eventKey}: ${describeCause(cause)}`, { cause });
    this.name = "DeliveryError";
    this.eventKey = eventKey;
  }
}

export function isRunCancelled(error: unknown): error is RunCancelledError {
  return error instanceof RunCancelledError;
}
