import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FETCH_RETRY_BACKOFF_CONFIG,
  STREAM_RECONNECT_BACKOFF_CONFIG,
  calculateBackoffMs,
} from "./backoff";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should cap at maxDelay", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 5000,
      multiplier: 2,
      jitterFactor: 0,
    };

    expect(calculateBackoffMs(2, config)).toBe(4000);
    expect(calculateBackoffMs(3, config)).toBe(5000);
    expect(calculateBackoffMs(10, config)).toBe(5000);
  });

  it("should add jitter", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 60000,
      multiplier: 2,
      jitterFactor: 0.1,
    };

    // 1000 * 0.1 * 0.5 = 50
    expect(calculateBackoffMs(0, config)).toBe(1050);
  });

  it("should double stream reconnect delays from 100ms up to 30s", () => {
    const delays = Array.from({ length: 11 }, (_, attempt) =>
      calculateBackoffMs(attempt, STREAM_RECONNECT_BACKOFF_CONFIG),
    );

    expect(delays).toEqual([
      100, 200, 400, 800, 1600, 3200, 6400, 12800, 25600, 30000, 30000,
    ]);
  });

  it("should produce the fixed fetch retry sequence", () => {
    const delays = [0, 1, 2, 3].map((attempt) =>
      calculateBackoffMs(attempt, FETCH_RETRY_BACKOFF_CONFIG),
    );

    expect(delays).toEqual([500, 1000, 2000, 4000]);
  });
});
