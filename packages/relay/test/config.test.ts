import { afterEach, describe, expect, it } from "vitest";

import {
  loadConfig,
  parseCheckpointConfig,
  sourceIdentityFromUrl
} from "../src/config";

const touchedVariables = [
  "CHECKPOINT_CONFIG",
  "PAYLOAD_ENCODING",
  "SINK_URL",
  "K_SINK",
  "SOURCE_TIMEOUT_MS"
];
const originalValues = new Map(
  touchedVariables.map((name) => [name, process.env[name]])
);

afterEach(() => {
  for (const [name, value] of originalValues) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});

describe("loadConfig", () => {
  it("uses safe defaults", () => {
    for (const name of touchedVariables) {
      delete process.env[name];
    }

    const config = loadConfig();

    expect(config.checkpoint).toEqual({ maxReplayAgeMs: 300_000, flushPeriodMs: 10_000 });
    expect(config.payloadEncoding).toBe("application/json");
    expect(config.checkpointKey).toBe("checkpoint");
    expect(config.sinkUrl).toBe("http://localhost:8080");
    expect(config.sourceTimeoutMs).toBe(10000);
  });

  it("accepts the XML payload encoding case-insensitively", () => {
    process.env.PAYLOAD_ENCODING = "Application/XML";

    expect(loadConfig().payloadEncoding).toBe("application/xml");
  });

  it("rejects an unsupported payload encoding", () => {
    process.env.PAYLOAD_ENCODING = "text/csv";

    expect(() => loadConfig()).toThrow("Unsupported PAYLOAD_ENCODING: text/csv");
  });

  it("falls back to K_SINK for the sink address", () => {
    delete process.env.SINK_URL;
    process.env.K_SINK = "http://broker.test/default";

    expect(loadConfig().sinkUrl).toBe("http://broker.test/default");
  });

  it("rejects invalid integers", () => {
    process.env.SOURCE_TIMEOUT_MS = "soon";

    expect(() => loadConfig()).toThrow("Invalid integer for SOURCE_TIMEOUT_MS: soon");
  });
});

describe("parseCheckpointConfig", () => {
  it("reads seconds into milliseconds", () => {
    expect(parseCheckpointConfig('{"maxAgeSeconds":3600,"periodSeconds":30}')).toEqual({
      maxReplayAgeMs: 3_600_000,
      flushPeriodMs: 30_000
    });
  });

  it("keeps an explicit zero replay window", () => {
    expect(parseCheckpointConfig('{"maxAgeSeconds":0}').maxReplayAgeMs).toBe(0);
  });

  it("rejects a zero flush period", () => {
    expect(() => parseCheckpointConfig('{"periodSeconds":0}')).toThrow(
      "periodSeconds must be positive"
    );
  });

  it("rejects negative and fractional values", () => {
    expect(() => parseCheckpointConfig('{"maxAgeSeconds":-1}')).toThrow(
      "maxAgeSeconds must be a non-negative integer"
    );
    expect(() => parseCheckpointConfig('{"periodSeconds":1.5}')).toThrow(
      "periodSeconds must be a non-negative integer"
    );
  });

  it("rejects documents that are not JSON objects", () => {
    expect(() => parseCheckpointConfig("[]")).toThrow("expected a JSON object");
    expect(() => parseCheckpointConfig("{")).toThrow("Invalid checkpoint config");
  });
});

describe("sourceIdentityFromUrl", () => {
  it("uses the host of the source URL", () => {
    expect(sourceIdentityFromUrl("https://vcenter.test:8443/api/v1")).toBe("vcenter.test:8443");
  });
});
