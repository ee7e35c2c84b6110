/**
 * Request/response order executor.
 *
 * Maker orders run a small state machine:
 *
 *   CREATING_ORDER -> MONITORING_ORDER -> UPDATING_ORDER -> WAIT_UNTIL_ORDER_CANCELLED -> CREATING_ORDER
 *
 * until the order fills or the per-order timeout passes, at which point any
 * resting order is cancelled and the remainder goes out as a market order.
 */

import type { Venue, VenueOrder } from "@/adapters/types";
import { validateOrderRequest } from "@/domains/order/validation";
import type { OrderRequest } from "@/domains/order/types";
import {
  FETCH_RETRY_BACKOFF_CONFIG,
  MAX_FETCH_FAILURES,
  calculateBackoffMs,
} from "@/lib/resilience/backoff";

import { OrderCreationError, OrderFetchError, OrderTimeoutError, OrderValidationError } from "./errors";
import {
  buildExecutionReport,
  cancelPendingOrders,
  checkShouldReprice,
  createExecutorContext,
  emitEvent,
  emitFillProgress,
  errorMessage,
  pollIntervalMs,
} from "./executor-context";
import type { ExecutorContext, OrderExecutor, OrderExecutorDeps } from "./executor-context";
import { analyzeOrderBook } from "./pricing";
import type { ExecutionReport, OrderBookState } from "./types";

const TAKER_CREATE_MAX_ATTEMPTS = 3;

type MakerState =
  | { name: "CREATING_ORDER" }
  | { name: "MONITORING_ORDER"; orderId: string }
  | { name: "UPDATING_ORDER"; orderId: string }
  | { name: "WAIT_UNTIL_ORDER_CANCELLED" };

interface MakerRun {
  venue: Venue;
  request: OrderRequest;
  startedAt: number;
  /** Order currently resting on the book, cancelled on exit */
  restingOrderId: string | null;
}

export interface RestOrderExecutor extends OrderExecutor {
  executeMakerOrder: (venue: Venue, request: OrderRequest) => Promise<ExecutionReport>;
  executeTakerOrder: (venue: Venue, request: OrderRequest) => Promise<ExecutionReport>;
}

/**
 * Fatal creation failures: emit `order_failed`, fail the pairing and throw.
 * Transient ones are logged and left to the caller to retry.
 */
export const handleCreateFailure = (
  ctx: ExecutorContext,
  run: { venue: Venue; request: OrderRequest; startedAt: number },
  error: unknown,
): void => {
  const { venue, request, startedAt } = run;
  if (ctx.classifier.classify(error) !== "FATAL") {
    ctx.logger.warn("Failed to create limit order", {
      exchangeId: venue.id,
      symbol: request.symbol,
      error: errorMessage(error),
    });
    return;
  }

  ctx.logger.error(
    "Order rejected by venue",
    error instanceof Error ? error : undefined,
    { exchangeId: venue.id, symbol: request.symbol },
  );
  request.pairing.notifyFailed();
  emitEvent(ctx, {
    request,
    orderId: null,
    state: "FAILED",
    eventName: "order_failed",
    startedAt,
    context: { reason: errorMessage(error) },
  });
  throw new OrderCreationError(
    `Order for ${request.symbol} rejected: ${errorMessage(error)}`,
    true,
    error,
  );
};

const isRecoverable = (error: unknown): boolean =>
  !(error instanceof OrderValidationError) &&
  !(error instanceof OrderCreationError && error.fatal);

export const createRestOrderExecutor = (deps: OrderExecutorDeps): RestOrderExecutor => {
  const ctx = createExecutorContext(deps);
  const { config, logger } = ctx;

  /**
   * Sleep out the backoff for a failed status fetch. Throws once the streak
   * reaches `MAX_FETCH_FAILURES`.
   */
  const backOffAfterFetchFailure = async (
    venue: Venue,
    orderId: string,
    failures: number,
    error: unknown,
  ): Promise<void> => {
    const delayMs = calculateBackoffMs(failures - 1, FETCH_RETRY_BACKOFF_CONFIG);
    logger.warn("Failed to fetch order status", {
      exchangeId: venue.id,
      orderId,
      attempt: failures,
      delayMs,
      error: errorMessage(error),
    });
    await ctx.sleep(delayMs);
    if (failures >= MAX_FETCH_FAILURES) {
      throw new OrderFetchError(orderId, failures, error);
    }
  };

  const fetchBookState = async (
    venue: Venue,
    request: OrderRequest,
    current: OrderBookState | null,
    elapsedSeconds: number,
  ): Promise<OrderBookState | null> => {
    try {
      const book = await venue.client.fetchOrderBook(request.symbol);
      return analyzeOrderBook(book, request.side, current, elapsedSeconds, config.execution);
    } catch (error) {
      logger.warn("Failed to fetch order book", {
        exchangeId: venue.id,
        symbol: request.symbol,
        error: errorMessage(error),
      });
      return null;
    }
  };

  /**
   * Runs the maker state machine. Resolves with the fill report, or `null`
   * once the timeout passes.
   */
  const runMakerLoop = async (run: MakerRun): Promise<ExecutionReport | null> => {
    const { venue, request, startedAt } = run;
    const { symbol, side } = request;
    let state: MakerState = { name: "CREATING_ORDER" };
    let bookState: OrderBookState | null = null;
    let fetchFailures = 0;

    while (ctx.now() - startedAt < config.timeoutMs) {
      const elapsedMs = ctx.now() - startedAt;
      const elapsedSeconds = elapsedMs / 1000;
      const interval = pollIntervalMs(elapsedMs);

      switch (state.name) {
        case "CREATING_ORDER": {
          const target = await fetchBookState(venue, request, null, elapsedSeconds);
          if (!target) {
            break;
          }
          if (target.spreadPct > config.maxSpreadPct) {
            logger.debug("Spread too wide", {
              exchangeId: venue.id,
              symbol,
              spreadPct: target.spreadPct,
              maxSpreadPct: config.maxSpreadPct,
            });
            break;
          }

          try {
            const order = await venue.client.createLimitOrder({
              symbol,
              side,
              amount: request.amount,
              price: target.bestPrice,
              params: { ...request.params },
            });
            run.restingOrderId = order.id;
            bookState = target;
            fetchFailures = 0;
            logger.info("Created limit order", {
              exchangeId: venue.id,
              symbol,
              orderId: order.id,
              price: target.bestPrice,
            });
            emitEvent(ctx, {
              request,
              orderId: order.id,
              state: "SUBMITTED",
              eventName: "order_submitted",
              startedAt,
            });
            state = { name: "MONITORING_ORDER", orderId: order.id };
          } catch (error) {
            handleCreateFailure(ctx, run, error);
          }
          break;
        }

        case "MONITORING_ORDER": {
          const { orderId }: { orderId: string } = state;
          let order: VenueOrder;
          try {
            order = await venue.client.fetchOrder(orderId, symbol);
            fetchFailures = 0;
          } catch (error) {
            fetchFailures += 1;
            await backOffAfterFetchFailure(venue, orderId, fetchFailures, error);
            continue;
          }

          if (order.status === "CLOSED") {
            run.restingOrderId = null;
            emitFillProgress(ctx, request, order, startedAt);
            logger.info("Limit order filled", { exchangeId: venue.id, symbol, orderId });
            return buildExecutionReport(order, venue.id, startedAt, ctx.now());
          }

          if (order.status !== "OPEN") {
            logger.warn("Limit order ended without a fill", {
              exchangeId: venue.id,
              symbol,
              orderId,
              status: order.status,
            });
            run.restingOrderId = null;
            bookState = null;
            emitEvent(ctx, {
              request,
              orderId,
              state: "FAILED",
              eventName: "order_failed",
              startedAt,
              context: { status: order.status },
            });
            state = { name: "CREATING_ORDER" };
            continue;
          }

          emitFillProgress(ctx, request, order, startedAt);

          const next = await fetchBookState(venue, request, bookState, elapsedSeconds);
          if (
            next &&
            bookState &&
            checkShouldReprice(ctx, {
              request,
              orderId,
              startedAt,
              oldPrice: bookState.bestPrice,
              newPrice: next.bestPrice,
              elapsedSeconds,
            })
          ) {
            bookState = next;
            state = { name: "UPDATING_ORDER", orderId };
          }
          break;
        }

        case "UPDATING_ORDER": {
          await cancelPendingOrders(ctx, venue, symbol, state.orderId);
          run.restingOrderId = null;
          state = { name: "WAIT_UNTIL_ORDER_CANCELLED" };
          break;
        }

        case "WAIT_UNTIL_ORDER_CANCELLED": {
          await ctx.sleep(interval);
          state = { name: "CREATING_ORDER" };
          break;
        }
      }

      await ctx.sleep(interval);
    }

    return null;
  };

  const pollUntilClosed = async (
    venue: Venue,
    request: OrderRequest,
    orderId: string,
    startedAt: number,
  ): Promise<ExecutionReport> => {
    let failures = 0;

    while (true) {
      const elapsedMs = ctx.now() - startedAt;
      if (elapsedMs >= config.timeoutMs) {
        throw new OrderTimeoutError(request.symbol, config.timeoutMs);
      }

      let order: VenueOrder;
      try {
        order = await venue.client.fetchOrder(orderId, request.symbol);
      } catch (error) {
        failures += 1;
        await backOffAfterFetchFailure(venue, orderId, failures, error);
        continue;
      }
      failures = 0;

      if (order.status === "CLOSED") {
        emitFillProgress(ctx, request, order, startedAt);
        logger.info("Market order filled", {
          exchangeId: venue.id,
          symbol: request.symbol,
          orderId,
        });
        return buildExecutionReport(order, venue.id, startedAt, ctx.now());
      }
      if (order.status !== "OPEN") {
        throw new OrderCreationError(`Market order ${orderId} was ${order.status}`, false);
      }

      emitFillProgress(ctx, request, order, startedAt);
      await ctx.sleep(pollIntervalMs(elapsedMs));
    }
  };

  const executeTakerOrder = async (venue: Venue, request: OrderRequest): Promise<ExecutionReport> => {
    validateOrderRequest(request);
    const { symbol, side } = request;
    const startedAt = ctx.now();

    await cancelPendingOrders(ctx, venue, symbol, null);
    logger.info("Starting market order", { exchangeId: venue.id, symbol, side, amount: request.amount });

    let attempt = 0;
    while (true) {
      if (ctx.now() - startedAt >= config.timeoutMs) {
        throw new OrderTimeoutError(symbol, config.timeoutMs);
      }

      let order: VenueOrder;
      try {
        order = await venue.client.createMarketOrder({
          symbol,
          side,
          amount: request.amount,
          params: { ...request.params },
        });
      } catch (error) {
        attempt += 1;
        const fatal = ctx.classifier.classify(error) === "FATAL";
        logger.warn("Market order attempt failed", {
          exchangeId: venue.id,
          symbol,
          attempt,
          fatal,
          error: errorMessage(error),
        });
        if (fatal || attempt >= TAKER_CREATE_MAX_ATTEMPTS) {
          if (fatal) {
            request.pairing.notifyFailed();
          }
          emitEvent(ctx, {
            request,
            orderId: null,
            state: "FAILED",
            eventName: "order_failed",
            startedAt,
            context: { reason: errorMessage(error), attempts: attempt },
          });
          throw new OrderCreationError(
            `Market order for ${symbol} failed after ${attempt} attempts: ${errorMessage(error)}`,
            fatal,
            error,
          );
        }
        await ctx.sleep(pollIntervalMs(ctx.now() - startedAt));
        continue;
      }

      emitEvent(ctx, {
        request,
        orderId: order.id,
        state: "SUBMITTED",
        eventName: "order_submitted",
        startedAt,
      });

      try {
        return await pollUntilClosed(venue, request, order.id, startedAt);
      } catch (error) {
        emitEvent(ctx, {
          request,
          orderId: order.id,
          state: "FAILED",
          eventName: "order_failed",
          startedAt,
          context: { reason: errorMessage(error) },
        });
        throw error;
      }
    }
  };

  const executeMakerOrder = async (venue: Venue, request: OrderRequest): Promise<ExecutionReport> => {
    validateOrderRequest(request);
    const run: MakerRun = { venue, request, startedAt: ctx.now(), restingOrderId: null };

    await cancelPendingOrders(ctx, venue, request.symbol, null);
    logger.info("Starting limit order", {
      exchangeId: venue.id,
      symbol: request.symbol,
      side: request.side,
      amount: request.amount,
    });

    try {
      const report = await runMakerLoop(run);
      if (report) {
        return report;
      }
      logger.info("Limit order timed out, switching to market order", {
        exchangeId: venue.id,
        symbol: request.symbol,
        timeoutMs: config.timeoutMs,
      });
      emitEvent(ctx, {
        request,
        orderId: run.restingOrderId,
        state: "TIMED_OUT",
        eventName: "order_timeout_fallback",
        startedAt: run.startedAt,
      });
    } catch (error) {
      if (!isRecoverable(error)) {
        throw error;
      }
      logger.warn("Limit order interrupted, switching to market order", {
        exchangeId: venue.id,
        symbol: request.symbol,
        error: errorMessage(error),
      });
    } finally {
      await cancelPendingOrders(ctx, venue, request.symbol, run.restingOrderId);
      run.restingOrderId = null;
    }

    return executeTakerOrder(venue, request);
  };

  return {
    execute: (venue, request) =>
      request.execution === "TAKER" || request.orderType === "MARKET"
        ? executeTakerOrder(venue, request)
        : executeMakerOrder(venue, request),
    executeMakerOrder,
    executeTakerOrder,
  };
};
