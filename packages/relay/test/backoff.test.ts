import { describe, expect, it } from "vitest";

import {
  computeExponentialBackoffMs,
  computePollBackoffMs,
  createBackoffController
} from "../src/backoff";

describe("createBackoffController", () => {
  it("doubles from one second and caps at five seconds", () => {
    const backoff = createBackoffController();

    const delays = [1, 2, 3, 4, 5, 6].map(() => backoff.next());

    expect(delays).toEqual([1000, 2000, 4000, 5000, 5000, 5000]);
  });

  it("starts over at one second after reset", () => {
    const backoff = createBackoffController();

    backoff.next();
    backoff.next();
    backoff.next();
    backoff.reset();

    expect(backoff.next()).toBe(1000);
    expect(backoff.next()).toBe(2000);
  });

  it("honors a custom policy", () => {
    const backoff = createBackoffController({ minMs: 100, maxMs: 1000, factor: 3 });

    expect([backoff.next(), backoff.next(), backoff.next()]).toEqual([100, 300, 900]);
    expect(backoff.next()).toBe(1000);
  });
});

describe("computePollBackoffMs", () => {
  it("stays at the cap for very long idle streaks", () => {
    expect(computePollBackoffMs(2000)).toBe(5000);
  });
});

describe("computeExponentialBackoffMs", () => {
  it("computes exponential delay with bounded jitter", () => {
    expect(computeExponentialBackoffMs(2, 100, 1000, () => 0)).toBe(200);
    expect(computeExponentialBackoffMs(2, 100, 1000, () => 0.99)).toBe(240);
  });

  it("caps delay at max", () => {
    expect(computeExponentialBackoffMs(10, 100, 500, () => 0.99)).toBe(500);
  });
});
