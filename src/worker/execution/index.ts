/**
 * Order execution engine module exports.
 *
 * - Batch routing across venues with per-venue sessions
 * - REST (polling) and stream (push) executors with market fallback
 * - Reprice policies and rejection classification
 * - Order lifecycle events with log and summary sinks
 */

// Config
export {
  ExecutorConfigSchema,
  executionStrategySchema,
  isExecutorConfig,
  loadExecutorConfig,
  parseExecutorConfig,
} from "./config";
export type { ExecutionStrategy, ExecutorConfig, ExecutorConfigInput } from "./config";

// Reports
export { executionReportSchema, isExecutionReport, isTerminalStatus } from "./types";
export type { ExecutionReport, OrderBookState } from "./types";

// Errors
export {
  OrderCreationError,
  OrderExecutorError,
  OrderFetchError,
  OrderTimeoutError,
  OrderValidationError,
  StreamCircuitOpenError,
  StreamingNotSupportedError,
} from "./errors";

// Events and sinks
export { ORDER_STATES, createOrderEventBus, orderStateSchema } from "./events";
export type { EventSink, OrderEvent, OrderEventBus, OrderEventName, OrderState } from "./events";
export { SUMMARY_HEADER, createLogSink, createTelegramSink } from "./sinks";
export type { TelegramSink } from "./sinks";

// Policies
export {
  alwaysReprice,
  createCompositeRepricePolicy,
  createElapsedOverrideRepricePolicy,
  createMinChangeRepricePolicy,
  createRepricePolicy,
  priceChangePct,
} from "./reprice-policy";
export type { RepricePolicy, RepriceThresholds } from "./reprice-policy";
export {
  DEFAULT_REJECTION_CLASSIFIER_CONFIG,
  createRejectionClassifier,
  defaultRejectionClassifier,
} from "./rejection-classifier";
export type {
  RejectionClass,
  RejectionClassifier,
  RejectionClassifierConfig,
} from "./rejection-classifier";

// Pricing
export { analyzeOrderBook, bestPriceIndex, spreadPct } from "./pricing";

// Sessions
export { PREWARM_TIMEOUT_MS, createExchangeSession, createStreamCircuit } from "./session";
export type { ExchangeSession, ExchangeSessionOptions } from "./session";

// Executors
export type { OrderExecutor, OrderExecutorDeps } from "./executor-context";
export { createRestOrderExecutor } from "./rest-executor";
export type { RestOrderExecutor } from "./rest-executor";
export { createStreamOrderExecutor } from "./stream-executor";
export type { StreamOrderExecutorDeps } from "./stream-executor";

// Routing
export { createOrderRouter } from "./router";
export type { ExecuteOrderFn, OrderRouter, OrderRouterDeps } from "./router";
export { createOrderExecutor } from "./order-executor";
export type { BatchOrderExecutor, OrderExecutorOptions, SummaryNotifier } from "./order-executor";
