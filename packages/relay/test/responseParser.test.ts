import { describe, expect, it } from "vitest";

import {
  parseApiVersion,
  parseCollectorId,
  parseCurrentTime,
  parseEventBatch,
  parseRemoteEvent
} from "../src/api/responseParser";

function rawEvent(key: unknown, overrides: Record<string, unknown> = {}) {
  return {
    key,
    createdTime: "2026-03-01T11:59:00.000Z",
    type: "VmPoweredOffEvent",
    class: "event",
    payload: { entity: "vm-01" },
    ...overrides
  };
}

describe("parseRemoteEvent", () => {
  it("parses a valid event", () => {
    expect(parseRemoteEvent(rawEvent(12))).toEqual({
      key: 12,
      createdTime: new Date("2026-03-01T11:59:00.000Z"),
      type: "VmPoweredOffEvent",
      eventClass: "event",
      payload: { entity: "vm-01" }
    });
  });

  it("accepts numeric string keys and the eventClass spelling", () => {
    const parsed = parseRemoteEvent(
      rawEvent("40", { class: undefined, eventClass: "eventex", payload: undefined })
    );

    expect(parsed.key).toBe(40);
    expect(parsed.eventClass).toBe("eventex");
    expect(parsed.payload).toBeNull();
  });

  it("rejects non-integer keys", () => {
    expect(() => parseRemoteEvent(rawEvent("4a"))).toThrow("key must be an integer");
    expect(() => parseRemoteEvent(rawEvent(1.5))).toThrow("key must be an integer");
    expect(() => parseRemoteEvent(rawEvent(""))).toThrow("key must be an integer");
    expect(() => parseRemoteEvent(rawEvent("   "))).toThrow("key must be an integer");
  });

  it("rejects missing type and unparseable timestamps", () => {
    expect(() => parseRemoteEvent(rawEvent(1, { type: "" }))).toThrow("missing type");
    expect(() => parseRemoteEvent(rawEvent(1, { createdTime: "yesterday" }))).toThrow(
      "createdTime is not a timestamp: yesterday"
    );
  });
});

describe("parseEventBatch", () => {
  it("parses events in key order", () => {
    const parsed = parseEventBatch({ events: [rawEvent(3), rawEvent(5)] });

    expect(parsed.map((event) => event.key)).toEqual([3, 5]);
  });

  it("accepts an empty batch", () => {
    expect(parseEventBatch({ events: [] })).toEqual([]);
  });

  it("throws when events is not an array", () => {
    expect(() => parseEventBatch({ events: {} })).toThrow("events must be an array");
  });

  it("rejects keys that do not increase", () => {
    expect(() => parseEventBatch({ events: [rawEvent(5), rawEvent(5)] })).toThrow(
      "event keys out of order (5 then 5)"
    );
  });
});

describe("source metadata", () => {
  it("parses the current time", () => {
    expect(parseCurrentTime({ currentTime: "2026-03-01T12:00:00.000Z" })).toEqual(
      new Date("2026-03-01T12:00:00.000Z")
    );
  });

  it("parses collector ids and API versions", () => {
    expect(parseCollectorId({ collectorId: "c-1" })).toBe("c-1");
    expect(parseApiVersion({ apiVersion: "8.0.2.0" })).toBe("8.0.2.0");
    expect(() => parseCollectorId({ collectorId: "" })).toThrow(
      "collectorId must be a non-empty string"
    );
  });
});
