import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

/** Env vars arrive as strings; numeric ones are coerced before range checks. */
const numberFromString = v.pipe(v.string(), v.transform(Number), v.number());

export const envSchema = v.object({
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Executor
  EXECUTION_STRATEGY: v.optional(v.picklist(["fast", "best-price"])),
  MAX_SPREAD_PCT: v.optional(v.pipe(numberFromString, v.minValue(0), v.maxValue(1))),
  MIN_REPRICE_THRESHOLD_PCT: v.optional(v.pipe(numberFromString, v.minValue(0))),
  REPRICE_OVERRIDE_AFTER_SECONDS: v.optional(v.pipe(numberFromString, v.minValue(0))),
  ORDER_TIMEOUT_MS: v.optional(v.pipe(numberFromString, v.minValue(1))),
  WS_STALENESS_WINDOW_MS: v.optional(v.pipe(numberFromString, v.minValue(1))),
  MAX_WS_RECONNECT_ATTEMPTS: v.optional(v.pipe(numberFromString, v.integer(), v.minValue(0))),
  MAX_CONCURRENT_ORDERS_PER_EXCHANGE: v.optional(
    v.pipe(numberFromString, v.integer(), v.minValue(1)),
  ),
});

export type Env = v.InferOutput<typeof envSchema>;
