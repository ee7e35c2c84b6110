/**
 * Executor configuration schema and defaults.
 */

import * as v from "valibot";

import { config } from "@/lib/config";

export type ExecutionStrategy = "fast" | "best-price";

export const executionStrategySchema = v.picklist(["fast", "best-price"]);

export const ExecutorConfigSchema = v.object({
  /** fast quotes at the top of the book; best-price starts deeper and walks in over time. */
  execution: executionStrategySchema,
  /** Maximum (ask - bid) / bid at which a maker order is placed. */
  maxSpreadPct: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
  /** Minimum relative price move that justifies a cancel/replace. */
  minRepricePct: v.optional(v.pipe(v.number(), v.minValue(0)), 0),
  /** Seconds after which any price move justifies a cancel/replace. 0 disables. */
  repriceOverrideAfterSeconds: v.optional(v.pipe(v.number(), v.minValue(0)), 0),
  /** Per-order deadline before falling back to a market order. */
  timeoutMs: v.optional(v.pipe(v.number(), v.gtValue(0)), 300_000),
  /** Maximum silence on the order stream before a REST status check. */
  wsStalenessWindowMs: v.optional(v.pipe(v.number(), v.gtValue(0)), 30_000),
  /** Consecutive stream reconnect failures before the circuit opens. 0 means unlimited. */
  maxWsReconnectAttempts: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 5),
  maxConcurrentOrdersPerExchange: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 10),
});

export type ExecutorConfig = v.InferOutput<typeof ExecutorConfigSchema>;

export type ExecutorConfigInput = v.InferInput<typeof ExecutorConfigSchema>;

export const parseExecutorConfig = (input: unknown): ExecutorConfig =>
  v.parse(ExecutorConfigSchema, input);

export const isExecutorConfig = (value: unknown): value is ExecutorConfig =>
  v.is(ExecutorConfigSchema, value);

/**
 * Build an executor config from environment settings, with explicit overrides
 * taking precedence. Unset environment values fall back to schema defaults.
 *
 * @throws {ValiError} If `execution` or `maxSpreadPct` is set nowhere, or a value is out of range
 */
export const loadExecutorConfig = (overrides: Partial<ExecutorConfigInput> = {}): ExecutorConfig => {
  const fromEnv = Object.fromEntries(
    Object.entries(config.executor).filter(([, value]) => value !== undefined),
  );
  return parseExecutorConfig({ ...fromEnv, ...overrides });
};
