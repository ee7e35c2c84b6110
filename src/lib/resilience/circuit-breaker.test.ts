import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CircuitOpenError, createCircuitBreaker } from "./circuit-breaker";

const failingFn = async (): Promise<string> => {
  throw new Error("failure");
};

describe("createCircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start in CLOSED state", () => {
    const breaker = createCircuitBreaker();
    expect(breaker.getState()).toBe("CLOSED");
    expect(breaker.isOpen()).toBe(false);
  });

  it("should execute successful functions", async () => {
    const breaker = createCircuitBreaker();
    await expect(breaker.execute(async () => "success")).resolves.toBe("success");
  });

  it("should open after consecutive failures", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 30000 });

    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    }

    await expect(breaker.execute(failingFn)).rejects.toThrow(CircuitOpenError);
    expect(breaker.getState()).toBe("OPEN");
    expect(breaker.isOpen()).toBe(true);
  });

  it("should reset failure count on success", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 30000 });

    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    await breaker.execute(async () => "success");
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");

    expect(breaker.getState()).toBe("CLOSED");
  });

  it("should only count errors accepted by isFailure", async () => {
    const breaker = createCircuitBreaker({
      failureThreshold: 1,
      resetTimeoutMs: 30000,
      isFailure: (error) => error.message === "network",
    });

    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    expect(breaker.isOpen()).toBe(false);

    await expect(
      breaker.execute(async () => {
        throw new Error("network");
      }),
    ).rejects.toThrow("network");
    expect(breaker.isOpen()).toBe(true);
  });

  it("should half-open after the reset timeout when not latched", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 2, resetTimeoutMs: 1000 });

    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");

    await vi.advanceTimersByTimeAsync(1000);

    await expect(breaker.execute(async () => "success")).resolves.toBe("success");
    expect(breaker.getState()).toBe("CLOSED");
  });

  it("should stay open after the reset timeout when latchOnBreak is set", async () => {
    const breaker = createCircuitBreaker({
      failureThreshold: 2,
      resetTimeoutMs: 1000,
      latchOnBreak: true,
    });

    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");

    await vi.advanceTimersByTimeAsync(5000);

    await expect(breaker.execute(async () => "success")).rejects.toThrow(CircuitOpenError);
    expect(breaker.isOpen()).toBe(true);
  });

  it("should latch open when tripped", async () => {
    const breaker = createCircuitBreaker({
      failureThreshold: Number.POSITIVE_INFINITY,
      resetTimeoutMs: 1000,
    });
    const states: string[] = [];
    breaker.onStateChange((state) => states.push(state));

    breaker.trip();
    breaker.trip();

    expect(breaker.isOpen()).toBe(true);
    expect(breaker.getState()).toBe("OPEN");
    expect(states).toEqual(["OPEN"]);
    await expect(breaker.execute(async () => "success")).rejects.toThrow(CircuitOpenError);
  });

  it("should allow unsubscribing from state changes", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 1000 });
    const states: string[] = [];
    const unsubscribe = breaker.onStateChange((state) => states.push(state));

    unsubscribe();
    await expect(breaker.execute(failingFn)).rejects.toThrow("failure");

    expect(states).toEqual([]);
  });
});
