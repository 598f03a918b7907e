import { setTimeout as delay } from "node:timers/promises";

import { createBackoffController, type BackoffController } from "../backoff";
import { RelayError, RunCancelledError, type RelayStage } from "../errors";
import type { RelayLogger } from "../logger";
import type { Checkpoint, CheckpointConfig, RemoteEvent } from "../types";
import { resolveBegin, type BeginResolution } from "./checkpointResolver";
import type {
  CheckpointStore,
  EnvelopeSink,
  RemoteEventSource,
  RemoteEventStream
} from "./contracts";
import { dispatchEvents } from "./dispatch";
import type { ConvertOptions } from "./eventConverter";

export const MAX_EVENTS_BATCH = 100;

export type RelayState = "POLLING" | "DISPATCHING" | "CHECKPOINTING" | "STOPPED";

export type CancellableSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RelayBatchDetails {
  received: number;
  delivered: number;
  lastDeliveredKey: number | null;
}

export interface RelayHooks {
  onStateChange?: (state: RelayState) => void;
  onBatch?: (details: RelayBatchDetails) => void;
  onFlush?: (checkpoint: Checkpoint) => void;
}

export interface RelayContext {
  source: RemoteEventSource;
  sink: EnvelopeSink;
  store: CheckpointStore;
  logger: RelayLogger;
  checkpointKey: string;
  checkpointConfig: CheckpointConfig;
  convert: ConvertOptions;
  now?: () => number;
  sleep?: CancellableSleep;
  backoff?: BackoffController;
  hooks?: RelayHooks;
}

export async function sleepCancellable(
  ms: number,
  signal: AbortSignal
): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      throw new RunCancelledError();
    }

    throw error;
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new RunCancelledError();
  }
}

async function runStage<T>(
  stage: RelayStage,
  message: string,
  signal: AbortSignal,
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (signal.aborted || error instanceof RunCancelledError) {
      throw new RunCancelledError();
    }

    throw new RelayError(stage, message, error);
  }
}

function logResolution(
  logger: RelayLogger,
  resolution: BeginResolution,
  maxReplayAgeMs: number
): void {
  const beginTimestamp = resolution.beginTime.toISOString();

  switch (resolution.kind) {
    case "fresh":
      logger.info({ beginTimestamp }, "no valid checkpoint found, starting at current source time");
      return;
    case "resume":
      logger.info(
        { beginTimestamp, eventKey: resolution.checkpoint.lastEventKey },
        "resuming event stream from checkpoint"
      );
      return;
    case "clamped":
      logger.warn(
        {
          maxReplayAgeMs,
          checkpointTimestamp: resolution.checkpoint.lastEventTimestamp.toISOString(),
          beginTimestamp
        },
        "potential data loss: last event timestamp in checkpoint is older than the replay window"
      );
      return;
  }
}

function buildCheckpoint(
  sourceIdentity: string,
  event: RemoteEvent,
  writtenAtMs: number
): Checkpoint {
  return {
    sourceIdentity,
    lastEventKey: event.key,
    lastEventType: event.type,
    lastEventTimestamp: event.createdTime,
    writtenAt: new Date(writtenAtMs)
  };
}

async function pollAndDispatch(
  context: RelayContext,
  stream: RemoteEventStream,
  signal: AbortSignal,
  previous: Checkpoint | null
): Promise<never> {
  const { logger, store, checkpointKey, hooks } = context;
  const now = context.now ?? Date.now;
  const sleep = context.sleep ?? sleepCancellable;
  const backoff = context.backoff ?? createBackoffController();
  const flushPeriodMs = context.checkpointConfig.flushPeriodMs;

  let staged: Checkpoint | null = null;
  let flushedKey: number | null = previous?.lastEventKey ?? null;
  let lastFlushAtMs = now();

  while (true) {
    throwIfCancelled(signal);

    if (now() - lastFlushAtMs >= flushPeriodMs) {
      lastFlushAtMs = now();

      if (staged !== null && staged.lastEventKey !== flushedKey) {
        const checkpoint: Checkpoint = staged;
        hooks?.onStateChange?.("CHECKPOINTING");
        logger.debug({ eventKey: checkpoint.lastEventKey }, "creating checkpoint");
        await runStage("checkpoint-flush", "save checkpoint", signal, () =>
          store.flush()
        );
        flushedKey = checkpoint.lastEventKey;
        hooks?.onFlush?.(checkpoint);
      } else {
        logger.debug("skipping checkpoint: no new events since last checkpoint");
      }
    }

    hooks?.onStateChange?.("POLLING");
    const events = await runStage("read", "read events from source", signal, () =>
      stream.readNext(MAX_EVENTS_BATCH, signal)
    );

    if (events.length === 0) {
      const backoffMs = backoff.next();
      logger.debug({ backoffMs }, "backing off retrieving events: no new events received");
      await sleep(backoffMs, signal);
      continue;
    }

    hooks?.onStateChange?.("DISPATCHING");
    const { successCount, error } = await dispatchEvents(events, {
      sink: context.sink,
      convert: context.convert,
      logger,
      signal
    });

    hooks?.onBatch?.({
      received: events.length,
      delivered: successCount,
      lastDeliveredKey: successCount > 0 ? events[successCount - 1].key : null
    });

    if (error) {
      logger.error(
        { err: error, delivered: successCount, total: events.length },
        "send events: batch aborted at first failure"
      );
    }

    if (successCount === 0) {
      continue;
    }

    const checkpoint = buildCheckpoint(
      context.convert.sourceIdentity,
      events[successCount - 1],
      now()
    );
    await runStage("checkpoint-stage", "set checkpoint", signal, () =>
      store.stage(checkpointKey, checkpoint)
    );
    staged = checkpoint;
    backoff.reset();
  }
}

/**
 * Reads the remote event stream from the resolved begin time and relays every
 * event to the sink until `signal` aborts or a fatal error occurs. Progress is
 * staged after each batch with at least one acknowledged event and flushed to
 * the store at most once per flush period.
 *
 * Never resolves: rejects with {@link RunCancelledError} on cancellation and
 * with {@link RelayError} on any unrecoverable failure.
 */
export async function runRelay(
  context: RelayContext,
  signal: AbortSignal
): Promise<never> {
  const { logger, checkpointConfig } = context;

  try {
    throwIfCancelled(signal);

    const previous = await runStage(
      "checkpoint-get",
      "retrieve checkpoint",
      signal,
      () => context.store.get(context.checkpointKey)
    );
    const sourceNow = await runStage(
      "current-time",
      "get current time from source",
      signal,
      () => context.source.currentTime(signal)
    );

    const resolution = resolveBegin(
      sourceNow,
      previous,
      checkpointConfig.maxReplayAgeMs
    );
    logResolution(logger, resolution, checkpointConfig.maxReplayAgeMs);

    const stream = await runStage("open", "create event collector", signal, () =>
      context.source.open(resolution.beginTime, signal)
    );

    try {
      return await pollAndDispatch(context, stream, signal, previous);
    } finally {
      await stream.close().catch((error: unknown) => {
        logger.warn({ err: error }, "failed to close event stream");
      });
    }
  } finally {
    context.hooks?.onStateChange?.("STOPPED");
  }
}
