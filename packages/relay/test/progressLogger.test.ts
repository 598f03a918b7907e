import { describe, expect, it } from "vitest";

import { createProgressLogger } from "../src/relay/progressLogger";

describe("createProgressLogger", () => {
  it("logs at configured intervals using aggregated counters", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 1000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.onBatch({ received: 100, delivered: 100, lastDeliveredKey: 100 });
    logger.onFlush(100);
    expect(messages).toHaveLength(0);

    nowMs = 2000;
    logger.onBatch({ received: 50, delivered: 20, lastDeliveredKey: 120 });

    expect(messages).toEqual([
      "relay progress (batches=2, received=150, delivered=120, failedBatches=1, eps=60.0, flushes=1, lastKey=120, flushedKey=100)"
    ]);
  });

  it("keeps the last delivered key across batches with no deliveries", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 1000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.onBatch({ received: 3, delivered: 3, lastDeliveredKey: 9 });
    nowMs = 1000;
    logger.onBatch({ received: 2, delivered: 0, lastDeliveredKey: null });

    expect(messages[0]).toContain("lastKey=9,");
    expect(messages[0]).toContain("failedBatches=1,");
  });

  it("flushes a final progress line on demand", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 5000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    nowMs = 250;
    logger.flush();

    expect(messages).toEqual([
      "relay progress (batches=0, received=0, delivered=0, failedBatches=0, eps=0.0, flushes=0, lastKey=null, flushedKey=null)"
    ]);
  });
});
