import { env } from "./env/env";

export const config = {
  server: {
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
  },
  executor: {
    execution: env.EXECUTION_STRATEGY,
    maxSpreadPct: env.MAX_SPREAD_PCT,
    minRepricePct: env.MIN_REPRICE_THRESHOLD_PCT,
    repriceOverrideAfterSeconds: env.REPRICE_OVERRIDE_AFTER_SECONDS,
    timeoutMs: env.ORDER_TIMEOUT_MS,
    wsStalenessWindowMs: env.WS_STALENESS_WINDOW_MS,
    maxWsReconnectAttempts: env.MAX_WS_RECONNECT_ATTEMPTS,
    maxConcurrentOrdersPerExchange: env.MAX_CONCURRENT_ORDERS_PER_EXCHANGE,
  },
} as const;
