/**
 * Push-driven order executor.
 *
 * One maker order is a single event loop that wakes on whichever comes first:
 * the next book snapshot, the next order-status batch, the order deadline, or
 * (while an order rests) the staleness window. Nothing polls on a fixed
 * interval. Order-stream transport errors back off 100ms, 200ms, 400ms, ...
 * and open the venue's stream circuit after `maxWsReconnectAttempts`.
 */

import { isNetworkError } from "@/adapters/errors";
import { getStreamingClient } from "@/adapters/types";
import type { OrderBook, StreamingVenueClient, Venue, VenueOrder } from "@/adapters/types";
import type { OrderRequest } from "@/domains/order/types";
import { validateOrderRequest } from "@/domains/order/validation";
import { sleep as timer } from "@/lib/async/sleep";
import { STREAM_RECONNECT_BACKOFF_CONFIG, calculateBackoffMs } from "@/lib/resilience/backoff";
import { CircuitOpenError } from "@/lib/resilience/circuit-breaker";
import type { CircuitBreaker } from "@/lib/resilience/circuit-breaker";

import { StreamCircuitOpenError, StreamingNotSupportedError } from "./errors";
import {
  buildExecutionReport,
  cancelPendingOrders,
  checkShouldReprice,
  createExecutorContext,
  emitEvent,
  emitFillProgress,
  errorMessage,
} from "./executor-context";
import type { OrderExecutor, OrderExecutorDeps } from "./executor-context";
import { analyzeOrderBook } from "./pricing";
import { createRestOrderExecutor, handleCreateFailure } from "./rest-executor";
import type { RestOrderExecutor } from "./rest-executor";
import { createStreamCircuit } from "./session";
import type { ExchangeSession } from "./session";
import type { ExecutionReport, OrderBookState } from "./types";

type Wake =
  | { kind: "book"; book: OrderBook }
  | { kind: "book-error"; error: unknown }
  | { kind: "orders"; orders: VenueOrder[] }
  | { kind: "orders-error"; error: unknown }
  | { kind: "deadline" }
  | { kind: "stale" }
  | { kind: "cancelled" };

const bookWake = (book: OrderBook): Wake => ({ kind: "book", book });
const bookErrorWake = (error: unknown): Wake => ({ kind: "book-error", error });
const ordersWake = (orders: VenueOrder[]): Wake => ({ kind: "orders", orders });
const ordersErrorWake = (error: unknown): Wake => ({ kind: "orders-error", error });
const deadlineWake = (): Wake => ({ kind: "deadline" });
const staleWake = (): Wake => ({ kind: "stale" });
const cancelledWake = (): Wake => ({ kind: "cancelled" });

interface StalenessTimer {
  /** Restart the window */
  arm: () => void;
  disarm: () => void;
  /** The armed wake, if any, ready to spread into a race */
  pending: () => Promise<Wake>[];
}

const createStalenessTimer = (windowMs: number): StalenessTimer => {
  let armed: { wait: Promise<Wake>; controller: AbortController } | null = null;

  const disarm = (): void => {
    armed?.controller.abort();
    armed = null;
  };

  return {
    arm: () => {
      disarm();
      const controller = new AbortController();
      armed = { controller, wait: timer(windowMs, controller.signal).then(staleWake, cancelledWake) };
    },
    disarm,
    pending: () => (armed ? [armed.wait] : []),
  };
};

interface RestingOrder {
  id: string;
  quote: OrderBookState;
}

interface StreamRun {
  venue: Venue;
  client: StreamingVenueClient;
  request: OrderRequest;
  circuit: CircuitBreaker;
  markCircuitOpen: () => void;
  startedAt: number;
  /** Aborted when the order finishes; stops timers and retries */
  signal: AbortSignal;
  resting: RestingOrder | null;
  /** Quote to place once no order is resting */
  target: OrderBookState | null;
}

export interface StreamOrderExecutorDeps extends OrderExecutorDeps {
  /** Executor for market fallbacks; built from the same deps when omitted */
  restExecutor?: RestOrderExecutor;
}

export const createStreamOrderExecutor = (deps: StreamOrderExecutorDeps): OrderExecutor => {
  const ctx = createExecutorContext(deps);
  const { config, logger } = ctx;
  const rest = deps.restExecutor ?? createRestOrderExecutor(deps);

  /**
   * Next batch of order updates, reconnecting with backoff on network errors.
   *
   * @throws {StreamCircuitOpenError} When the circuit is or becomes open
   */
  const watchOrdersWithBackoff = async (run: StreamRun): Promise<VenueOrder[]> => {
    const { venue, client, request, circuit, signal } = run;
    if (circuit.isOpen()) {
      throw new StreamCircuitOpenError(venue.id, 0);
    }

    let attempt = 0;
    while (true) {
      signal.throwIfAborted();
      try {
        return await circuit.execute(() => client.watchOrders(request.symbol));
      } catch (error) {
        signal.throwIfAborted();
        if (error instanceof CircuitOpenError) {
          throw new StreamCircuitOpenError(venue.id, attempt);
        }
        if (!isNetworkError(error)) {
          throw error;
        }

        attempt += 1;
        const delayMs = calculateBackoffMs(attempt - 1, STREAM_RECONNECT_BACKOFF_CONFIG);
        logger.warn("Order stream disconnected, reconnecting", {
          exchangeId: venue.id,
          symbol: request.symbol,
          attempt,
          delayMs,
          error: errorMessage(error),
        });
        emitEvent(ctx, {
          request,
          orderId: run.resting?.id ?? null,
          state: "MONITORING_ORDER",
          eventName: "ws_reconnect_attempt",
          startedAt: run.startedAt,
          context: { attempt, delayMs },
        });

        if (config.maxWsReconnectAttempts > 0 && attempt >= config.maxWsReconnectAttempts) {
          logger.error("Order stream circuit opening", undefined, {
            exchangeId: venue.id,
            symbol: request.symbol,
            attempts: attempt,
          });
          run.markCircuitOpen();
          emitEvent(ctx, {
            request,
            orderId: run.resting?.id ?? null,
            state: "FAILED",
            eventName: "ws_circuit_open",
            startedAt: run.startedAt,
            context: { attempts: attempt },
          });
          throw new StreamCircuitOpenError(venue.id, attempt);
        }

        await ctx.sleep(delayMs, signal);
      }
    }
  };

  const nextOrders = (run: StreamRun): Promise<Wake> =>
    watchOrdersWithBackoff(run).then(ordersWake, ordersErrorWake);

  /** Apply a batch of order updates. Resolves the report once the resting order fills. */
  const applyOrderUpdates = (run: StreamRun, updates: VenueOrder[]): ExecutionReport | null => {
    const { venue, request, startedAt } = run;
    for (const update of updates) {
      if (!run.resting || update.id !== run.resting.id) {
        continue;
      }

      if (update.status === "CLOSED") {
        run.resting = null;
        emitFillProgress(ctx, request, update, startedAt);
        logger.info("Limit order filled", {
          exchangeId: venue.id,
          symbol: request.symbol,
          orderId: update.id,
        });
        return buildExecutionReport(update, venue.id, startedAt, ctx.now());
      }

      if (update.status !== "OPEN") {
        logger.warn("Limit order ended without a fill", {
          exchangeId: venue.id,
          symbol: request.symbol,
          orderId: update.id,
          status: update.status,
        });
        run.target = run.resting.quote;
        run.resting = null;
        emitEvent(ctx, {
          request,
          orderId: update.id,
          state: "FAILED",
          eventName: "order_failed",
          startedAt,
          context: { status: update.status },
        });
        continue;
      }

      emitFillProgress(ctx, request, update, startedAt);
    }
    return null;
  };

  /**
   * Track the book. With no resting order the result becomes the next quote;
   * with one, a better price goes through the reprice policy and, if allowed,
   * the order is cancelled and its final status confirmed over REST.
   */
  const applyBook = async (
    run: StreamRun,
    book: OrderBook,
    elapsedSeconds: number,
  ): Promise<ExecutionReport | null> => {
    const { venue, request, startedAt } = run;
    const resting = run.resting;
    const next = analyzeOrderBook(
      book,
      request.side,
      resting?.quote ?? null,
      elapsedSeconds,
      config.execution,
    );
    if (!next) {
      return null;
    }
    if (next.spreadPct > config.maxSpreadPct) {
      logger.debug("Spread too wide", {
        exchangeId: venue.id,
        symbol: request.symbol,
        spreadPct: next.spreadPct,
        maxSpreadPct: config.maxSpreadPct,
      });
      return null;
    }
    if (!resting) {
      run.target = next;
      return null;
    }

    const reprice = checkShouldReprice(ctx, {
      request,
      orderId: resting.id,
      startedAt,
      oldPrice: resting.quote.bestPrice,
      newPrice: next.bestPrice,
      elapsedSeconds,
    });
    if (!reprice) {
      return null;
    }

    await cancelPendingOrders(ctx, venue, request.symbol, resting.id);
    run.resting = null;
    run.target = next;

    try {
      const order = await venue.client.fetchOrder(resting.id, request.symbol);
      if (order.status === "CLOSED") {
        run.target = null;
        emitFillProgress(ctx, request, order, startedAt);
        return buildExecutionReport(order, venue.id, startedAt, ctx.now());
      }
    } catch (error) {
      logger.warn("Failed to confirm cancelled order", {
        exchangeId: venue.id,
        orderId: resting.id,
        error: errorMessage(error),
      });
    }
    return null;
  };

  /** REST status check for a resting order the stream has gone quiet on. Never cancels. */
  const checkStaleOrder = async (run: StreamRun): Promise<ExecutionReport | null> => {
    const { venue, request, startedAt, resting } = run;
    if (!resting) {
      return null;
    }

    try {
      const order = await venue.client.fetchOrder(resting.id, request.symbol);
      emitEvent(ctx, {
        request,
        orderId: resting.id,
        state: "MONITORING_ORDER",
        eventName: "ws_staleness_fallback",
        startedAt,
        context: { status: order.status },
      });
      if (order.status === "CLOSED") {
        run.resting = null;
        emitFillProgress(ctx, request, order, startedAt);
        logger.info("Limit order fill confirmed over REST", {
          exchangeId: venue.id,
          symbol: request.symbol,
          orderId: resting.id,
        });
        return buildExecutionReport(order, venue.id, startedAt, ctx.now());
      }
    } catch (error) {
      logger.warn("Staleness check failed", {
        exchangeId: venue.id,
        orderId: resting.id,
        error: errorMessage(error),
      });
    }
    return null;
  };

  const placeOrder = async (run: StreamRun, quote: OrderBookState): Promise<boolean> => {
    const { venue, request, startedAt } = run;
    try {
      const order = await venue.client.createLimitOrder({
        symbol: request.symbol,
        side: request.side,
        amount: request.amount,
        price: quote.bestPrice,
        params: { ...request.params },
      });
      run.resting = { id: order.id, quote };
      run.target = null;
      logger.info("Created limit order", {
        exchangeId: venue.id,
        symbol: request.symbol,
        orderId: order.id,
        price: quote.bestPrice,
      });
      emitEvent(ctx, {
        request,
        orderId: order.id,
        state: "SUBMITTED",
        eventName: "order_submitted",
        startedAt,
      });
      return true;
    } catch (error) {
      handleCreateFailure(ctx, run, error);
      return false;
    }
  };

  /** Resolves with the fill report, or `null` when the deadline passes first. */
  const runEventLoop = async (run: StreamRun): Promise<ExecutionReport | null> => {
    const { client, request, signal, startedAt } = run;
    const { symbol } = request;

    const deadline = timer(config.timeoutMs - (ctx.now() - startedAt), signal).then(
      deadlineWake,
      cancelledWake,
    );
    let bookWait: Promise<Wake> = client.fetchOrderBook(symbol).then(bookWake, bookErrorWake);
    let ordersWait: Promise<Wake> | null = null;
    const staleness = createStalenessTimer(config.wsStalenessWindowMs);
    let bookFailures = 0;

    const watchBook = (delayMs: number): Promise<Wake> =>
      ctx
        .sleep(delayMs, signal)
        .then(() => client.watchOrderBook(symbol))
        .then(bookWake, bookErrorWake);

    try {
      while (true) {
        const wake = await Promise.race([
          deadline,
          bookWait,
          ...(ordersWait ? [ordersWait] : []),
          ...staleness.pending(),
        ]);
        const elapsedSeconds = (ctx.now() - startedAt) / 1000;
        let report: ExecutionReport | null = null;

        switch (wake.kind) {
          case "deadline":
            return null;

          case "cancelled":
            break;

          case "stale":
            staleness.disarm();
            report = await checkStaleOrder(run);
            if (!report && run.resting) {
              staleness.arm();
            }
            break;

          case "book":
            bookFailures = 0;
            bookWait = watchBook(0);
            report = await applyBook(run, wake.book, elapsedSeconds);
            break;

          case "book-error": {
            bookFailures += 1;
            const delayMs = calculateBackoffMs(bookFailures - 1, STREAM_RECONNECT_BACKOFF_CONFIG);
            logger.warn("Order book stream failed", {
              exchangeId: run.venue.id,
              symbol,
              attempt: bookFailures,
              delayMs,
              error: errorMessage(wake.error),
            });
            bookWait = watchBook(delayMs);
            break;
          }

          case "orders":
            ordersWait = nextOrders(run);
            if (run.resting) {
              staleness.arm();
            }
            report = applyOrderUpdates(run, wake.orders);
            break;

          case "orders-error":
            throw wake.error;
        }

        if (report) {
          return report;
        }

        if (!run.resting && run.target && (await placeOrder(run, run.target))) {
          ordersWait ??= nextOrders(run);
          staleness.arm();
        }
        if (!run.resting) {
          staleness.disarm();
        }
      }
    } finally {
      staleness.disarm();
    }
  };

  /** Stop subscriptions and cancel whatever still rests. Never throws. */
  const cleanUp = async (run: StreamRun, controller: AbortController): Promise<void> => {
    const { venue, client, request } = run;
    controller.abort();

    const unsubscribe = async (name: string, unwatch: () => Promise<void> | undefined): Promise<void> => {
      try {
        await unwatch();
      } catch (error) {
        logger.debug("Failed to unsubscribe", {
          exchangeId: venue.id,
          subscription: name,
          error: errorMessage(error),
        });
      }
    };

    await Promise.all([
      unsubscribe("orderBook", () => client.unwatchOrderBook?.(request.symbol)),
      unsubscribe("orders", () => client.unwatchOrders?.(request.symbol)),
    ]);

    if (run.resting) {
      await cancelPendingOrders(ctx, venue, request.symbol, run.resting.id);
    }
  };

  const executeMakerOrder = async (
    venue: Venue,
    client: StreamingVenueClient,
    request: OrderRequest,
    session?: ExchangeSession,
  ): Promise<ExecutionReport> => {
    const controller = new AbortController();
    const circuit = session?.streamCircuit ?? createStreamCircuit();
    const run: StreamRun = {
      venue,
      client,
      request,
      circuit,
      markCircuitOpen: session ? session.markCircuitOpen : circuit.trip,
      startedAt: ctx.now(),
      signal: controller.signal,
      resting: null,
      target: null,
    };

    await cancelPendingOrders(ctx, venue, request.symbol, null);
    logger.info("Starting streamed limit order", {
      exchangeId: venue.id,
      symbol: request.symbol,
      side: request.side,
      amount: request.amount,
    });

    const report = await runEventLoop(run).finally(() => cleanUp(run, controller));
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
      orderId: run.resting?.id ?? null,
      state: "TIMED_OUT",
      eventName: "order_timeout_fallback",
      startedAt: run.startedAt,
    });
    return rest.executeTakerOrder(venue, request);
  };

  return {
    execute: async (venue, request, session) => {
      validateOrderRequest(request);
      const client = getStreamingClient(venue);
      if (!client) {
        throw new StreamingNotSupportedError(venue.id);
      }
      if (session?.isCircuitOpen()) {
        throw new StreamCircuitOpenError(venue.id, 0);
      }
      if (request.execution === "TAKER" || request.orderType === "MARKET") {
        return rest.executeTakerOrder(venue, request);
      }
      return executeMakerOrder(venue, client, request, session);
    },
  };
};
