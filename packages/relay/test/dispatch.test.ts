import { describe, expect, it, vi } from "vitest";

import { ConversionError, DeliveryError, RunCancelledError } from "../src/errors";
import { dispatchEvents } from "../src/relay/dispatch";
import type { OutboundEnvelope } from "../src/types";
import { createFakeSink, createTestLogger, remoteEvent } from "./fakes";

const convert = {
  sourceIdentity: "vcenter.test",
  apiVersion: "8.0.2.0",
  encoding: "application/json" as const
};

function batch(keys: number[]) {
  return keys.map((key) => remoteEvent(key));
}

describe("dispatchEvents", () => {
  it("sends every event in order on full success", async () => {
    const { sink, sent } = createFakeSink();

    const result = await dispatchEvents(batch([10, 11, 12]), {
      sink,
      convert,
      logger: createTestLogger()
    });

    expect(result).toEqual({ successCount: 3, error: null });
    expect(sent.map((envelope) => envelope.id)).toEqual(["10", "11", "12"]);
  });

  it("stops at the k-th nack and never sends the rest", async () => {
    const { sink, sent } = createFakeSink([3]);

    const result = await dispatchEvents(batch([1, 2, 3, 4, 5]), {
      sink,
      convert,
      logger: createTestLogger()
    });

    expect(result.successCount).toBe(2);
    expect(result.error).toBeInstanceOf(DeliveryError);
    expect(result.error?.message).toBe("send event 3: sink rejected 3");
    expect(sent.map((envelope) => envelope.id)).toEqual(["1", "2", "3"]);
  });

  it("reports zero successes when the first event is rejected", async () => {
    const { sink } = createFakeSink([1]);

    const result = await dispatchEvents(batch([1, 2]), {
      sink,
      convert,
      logger: createTestLogger()
    });

    expect(result.successCount).toBe(0);
    expect(sink.send).toHaveBeenCalledTimes(1);
  });

  it("stops at a conversion failure before sending that event", async () => {
    const { sink, sent } = createFakeSink();
    const events = [
      remoteEvent(1),
      remoteEvent(2, { payload: { count: BigInt(1) } }),
      remoteEvent(3)
    ];

    const result = await dispatchEvents(events, {
      sink,
      convert,
      logger: createTestLogger()
    });

    expect(result.successCount).toBe(1);
    expect(result.error).toBeInstanceOf(ConversionError);
    expect(sent.map((envelope) => envelope.id)).toEqual(["1"]);
  });

  it("treats a throwing sink as a nack", async () => {
    const sink = {
      send: vi.fn(async (_envelope: OutboundEnvelope) => {
        throw new Error("connection reset");
      })
    };

    const result = await dispatchEvents(batch([8, 9]), {
      sink,
      convert,
      logger: createTestLogger()
    });

    expect(result.successCount).toBe(0);
    expect(result.error?.message).toBe("send event 8: connection reset");
  });

  it("propagates cancellation instead of reporting a nack", async () => {
    const controller = new AbortController();
    const sink = {
      send: vi.fn(async (_envelope: OutboundEnvelope) => {
        controller.abort();
        return { ack: false as const, error: new Error("aborted") };
      })
    };

    await expect(
      dispatchEvents(batch([1, 2]), {
        sink,
        convert,
        logger: createTestLogger(),
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(sink.send).toHaveBeenCalledTimes(1);
  });
});
