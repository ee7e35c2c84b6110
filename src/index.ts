/**
 * Venue Order Executor
 *
 * Places batches of orders across trading venues, resting maker orders over
 * REST or streaming transports and falling back to market orders on timeout.
 */

export * from "./adapters";
export * from "./domains/order";
export * from "./worker/execution";

export { createLogger, logger } from "./lib/logger";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger";
export { CircuitOpenError, createCircuitBreaker } from "./lib/resilience";
export type { CircuitBreaker, CircuitBreakerConfig, CircuitBreakerState } from "./lib/resilience";
export { sleep } from "./lib/async/sleep";
export type { Sleep } from "./lib/async/sleep";
