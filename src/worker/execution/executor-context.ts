/**
 * Dependencies and helpers shared by the REST and stream executors.
 */

import type { Venue, VenueOrder } from "@/adapters/types";
import type { OrderRequest } from "@/domains/order/types";
import { sleep as defaultSleep } from "@/lib/async/sleep";
import type { Sleep } from "@/lib/async/sleep";
import type { Logger } from "@/lib/logger/logger";

import type { ExecutorConfig } from "./config";
import type { OrderEvent, OrderEventBus, OrderEventName, OrderState } from "./events";
import { defaultRejectionClassifier } from "./rejection-classifier";
import type { RejectionClassifier } from "./rejection-classifier";
import { createRepricePolicy, priceChangePct } from "./reprice-policy";
import type { RepricePolicy } from "./reprice-policy";
import type { ExchangeSession } from "./session";
import type { ExecutionReport } from "./types";

/** Poll interval while the order is young. */
const FAST_POLL_INTERVAL_MS = 200;
/** Poll interval once the order has been open for `FAST_POLL_WINDOW_MS`. */
const SLOW_POLL_INTERVAL_MS = 1_000;
const FAST_POLL_WINDOW_MS = 10_000;

export interface OrderExecutor {
  /**
   * Place `request` on `venue` and follow it to a terminal status.
   * The session, when given, supplies the venue's stream circuit.
   */
  execute: (venue: Venue, request: OrderRequest, session?: ExchangeSession) => Promise<ExecutionReport>;
}

export interface OrderExecutorDeps {
  config: ExecutorConfig;
  logger: Logger;
  eventBus?: OrderEventBus;
  classifier?: RejectionClassifier;
  /** Defaults to the policy for the config's reprice thresholds */
  repricePolicy?: RepricePolicy;
  sleep?: Sleep;
  now?: () => number;
}

export interface ExecutorContext {
  config: ExecutorConfig;
  logger: Logger;
  eventBus: OrderEventBus | null;
  classifier: RejectionClassifier;
  repricePolicy: RepricePolicy;
  sleep: Sleep;
  now: () => number;
}

export const createExecutorContext = (deps: OrderExecutorDeps): ExecutorContext => ({
  config: deps.config,
  logger: deps.logger,
  eventBus: deps.eventBus ?? null,
  classifier: deps.classifier ?? defaultRejectionClassifier,
  repricePolicy: deps.repricePolicy ?? createRepricePolicy(deps.config),
  sleep: deps.sleep ?? defaultSleep,
  now: deps.now ?? Date.now,
});

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const pollIntervalMs = (elapsedMs: number): number =>
  elapsedMs < FAST_POLL_WINDOW_MS ? FAST_POLL_INTERVAL_MS : SLOW_POLL_INTERVAL_MS;

// --- Events ---

export interface OrderEventParams {
  request: OrderRequest;
  orderId: string | null;
  state: OrderState;
  eventName: OrderEventName;
  /** Submission time; latency defaults to the time since then */
  startedAt: number | null;
  latencyMs?: number | null;
  fillPrice?: number | null;
  fillQty?: number | null;
  context?: Record<string, unknown>;
}

export const makeEvent = (timestampMs: number, params: OrderEventParams): OrderEvent => {
  const { request, startedAt } = params;
  const latencyMs =
    params.latencyMs !== undefined
      ? params.latencyMs
      : startedAt !== null
        ? Math.max(0, timestampMs - startedAt)
        : null;

  return {
    orderId: params.orderId,
    exchangeId: request.exchangeId,
    symbol: request.symbol,
    side: request.side,
    state: params.state,
    timestampMs,
    eventName: params.eventName,
    latencyMs,
    fillPrice: params.fillPrice ?? null,
    fillQty: params.fillQty ?? null,
    ...(params.context && { context: params.context }),
  };
};

export const emitEvent = (ctx: ExecutorContext, params: OrderEventParams): void => {
  ctx.eventBus?.emit(makeEvent(ctx.now(), params));
};

/**
 * Emit the fill event an order status calls for: complete for CLOSED,
 * partial for an open order with some quantity filled.
 */
export const emitFillProgress = (
  ctx: ExecutorContext,
  request: OrderRequest,
  order: VenueOrder,
  startedAt: number,
): void => {
  const fillPrice = order.average ?? order.lastTradePrice ?? order.price;
  if (order.status === "CLOSED") {
    emitEvent(ctx, {
      request,
      orderId: order.id,
      state: "FILLED",
      eventName: "order_fill_complete",
      startedAt,
      fillPrice,
      fillQty: order.filled,
    });
  } else if (order.status === "OPEN" && order.filled > 0) {
    emitEvent(ctx, {
      request,
      orderId: order.id,
      state: "PARTIALLY_FILLED",
      eventName: "order_fill_partial",
      startedAt,
      fillPrice,
      fillQty: order.filled,
    });
  }
};

// --- Reports ---

/**
 * Build the report for a venue order. Filled quantity is clamped to the
 * ordered amount so `filled + remaining == amount` always holds.
 */
export const buildExecutionReport = (
  order: VenueOrder,
  exchangeId: string,
  submittedAt: number,
  now: number,
): ExecutionReport => {
  const filled = Math.min(Math.max(order.filled, 0), order.amount);
  return {
    id: order.id,
    symbol: order.symbol,
    status: order.status,
    amount: order.amount,
    filled,
    remaining: order.amount - filled,
    averagePrice: order.average ?? (filled > 0 ? order.price : null),
    lastPrice: order.lastTradePrice,
    exchangeId,
    fillLatencyMs: Math.max(0, now - submittedAt),
    timestamp: order.timestamp,
  };
};

// --- Venue housekeeping ---

/**
 * Cancel `orderId` (when given) and any other open order on `symbol`.
 * Failures are logged and swallowed.
 */
export const cancelPendingOrders = async (
  ctx: ExecutorContext,
  venue: Venue,
  symbol: string,
  orderId: string | null,
): Promise<void> => {
  const cancel = async (id: string): Promise<void> => {
    try {
      await venue.client.cancelOrder(id, symbol);
      ctx.logger.debug("Cancelled order", { exchangeId: venue.id, symbol, orderId: id });
    } catch (error) {
      ctx.logger.debug("Cancel failed", {
        exchangeId: venue.id,
        symbol,
        orderId: id,
        error: errorMessage(error),
      });
    }
  };

  if (orderId !== null) {
    await cancel(orderId);
  }

  try {
    const openOrders = await venue.client.fetchOpenOrders(symbol);
    for (const order of openOrders) {
      if (order.id !== orderId) {
        await cancel(order.id);
      }
    }
  } catch (error) {
    ctx.logger.warn("Failed to fetch open orders for cleanup", {
      exchangeId: venue.id,
      symbol,
      error: errorMessage(error),
    });
  }
};

export interface RepriceCheck {
  request: OrderRequest;
  orderId: string;
  startedAt: number;
  oldPrice: number;
  newPrice: number;
  elapsedSeconds: number;
}

/**
 * Ask the reprice policy whether to move a resting order, and emit
 * `order_repriced` or `order_reprice_suppressed` accordingly.
 */
export const checkShouldReprice = (ctx: ExecutorContext, check: RepriceCheck): boolean => {
  const { request, orderId, startedAt, oldPrice, newPrice, elapsedSeconds } = check;
  const allowed = ctx.repricePolicy.shouldReprice(oldPrice, newPrice, elapsedSeconds);

  emitEvent(ctx, {
    request,
    orderId,
    state: allowed ? "UPDATING_ORDER" : "MONITORING_ORDER",
    eventName: allowed ? "order_repriced" : "order_reprice_suppressed",
    startedAt,
    context: {
      oldPrice,
      newPrice,
      changePct: priceChangePct(oldPrice, newPrice),
      thresholdPct: ctx.config.minRepricePct,
    },
  });

  return allowed;
};
