import { describe, expect, it } from "vitest";

import { parseEnv } from "./env";

describe("parseEnv", () => {
  it("should apply defaults to an empty environment", () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe("development");
    expect(env.LOG_LEVEL).toBeUndefined();
    expect(env.EXECUTION_STRATEGY).toBeUndefined();
    expect(env.MAX_SPREAD_PCT).toBeUndefined();
  });

  it("should coerce numeric executor settings", () => {
    const env = parseEnv({
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
      EXECUTION_STRATEGY: "best-price",
      MAX_SPREAD_PCT: "0.02",
      MIN_REPRICE_THRESHOLD_PCT: "0.001",
      REPRICE_OVERRIDE_AFTER_SECONDS: "45",
      ORDER_TIMEOUT_MS: "120000",
      WS_STALENESS_WINDOW_MS: "15000",
      MAX_WS_RECONNECT_ATTEMPTS: "0",
      MAX_CONCURRENT_ORDERS_PER_EXCHANGE: "4",
    });

    expect(env).toMatchObject({
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
      EXECUTION_STRATEGY: "best-price",
      MAX_SPREAD_PCT: 0.02,
      MIN_REPRICE_THRESHOLD_PCT: 0.001,
      REPRICE_OVERRIDE_AFTER_SECONDS: 45,
      ORDER_TIMEOUT_MS: 120000,
      WS_STALENESS_WINDOW_MS: 15000,
      MAX_WS_RECONNECT_ATTEMPTS: 0,
      MAX_CONCURRENT_ORDERS_PER_EXCHANGE: 4,
    });
  });

  it("should fail when LOG_LEVEL is not a known level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("should fail when EXECUTION_STRATEGY is unknown", () => {
    expect(() => parseEnv({ EXECUTION_STRATEGY: "slow" })).toThrow();
  });

  it("should fail when MAX_SPREAD_PCT is above 1", () => {
    expect(() => parseEnv({ MAX_SPREAD_PCT: "1.5" })).toThrow();
  });

  it("should fail when MAX_SPREAD_PCT is not a number", () => {
    expect(() => parseEnv({ MAX_SPREAD_PCT: "wide" })).toThrow();
  });

  it("should fail when MAX_CONCURRENT_ORDERS_PER_EXCHANGE is zero", () => {
    expect(() => parseEnv({ MAX_CONCURRENT_ORDERS_PER_EXCHANGE: "0" })).toThrow();
  });

  it("should fail when MAX_WS_RECONNECT_ATTEMPTS is fractional", () => {
    expect(() => parseEnv({ MAX_WS_RECONNECT_ATTEMPTS: "2.5" })).toThrow();
  });
});
