import type { RelayBatchDetails } from "./pollDispatchLoop";

export interface ProgressLoggerOptions {
  intervalMs: number;
  log: (message: string) => void;
  now?: () => number;
}

export interface ProgressLogger {
  onBatch: (details: RelayBatchDetails) => void;
  onFlush: (eventKey: number) => void;
  flush: () => void;
}

export function createProgressLogger(
  options: ProgressLoggerOptions
): ProgressLogger {
  const now = options.now ?? Date.now;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let batches = 0;
  let received = 0;
  let delivered = 0;
  let failedBatches = 0;
  let flushes = 0;
  let lastDeliveredKey: number | null = null;
  let lastFlushedKey: number | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const deliveredPerSecond = delivered / elapsedSeconds;

    options.log(
      `relay progress (batches=${batches}, received=${received}, delivered=${delivered}, failedBatches=${failedBatches}, eps=${deliveredPerSecond.toFixed(1)}, flushes=${flushes}, lastKey=${lastDeliveredKey ?? "null"}, flushedKey=${lastFlushedKey ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onBatch(details: RelayBatchDetails): void {
      batches += 1;
      received += details.received;
      delivered += details.delivered;
      if (details.delivered < details.received) {
        failedBatches += 1;
      }
      if (details.lastDeliveredKey !== null) {
        lastDeliveredKey = details.lastDeliveredKey;
      }
      maybeLog(false);
    },
    onFlush(eventKey: number): void {
      flushes += 1;
      lastFlushedKey = eventKey;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
