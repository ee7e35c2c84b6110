/**
 * Batch router.
 *
 * Drops orders for unknown venues, builds one session per venue, pre-warms
 * every session in parallel, then runs every order in parallel under its
 * venue's concurrency limit. One order failing never affects another.
 */

import { hasStreamingSupport } from "@/adapters/types";
import type { Venue } from "@/adapters/types";
import { flattenOrders } from "@/domains/order/types";
import type { OrderRequest, OrdersToExecute } from "@/domains/order/types";

import { StreamCircuitOpenError } from "./errors";
import { createExecutorContext, emitEvent } from "./executor-context";
import type { OrderExecutorDeps } from "./executor-context";
import { createRestOrderExecutor } from "./rest-executor";
import { createExchangeSession } from "./session";
import type { ExchangeSession } from "./session";
import { createStreamOrderExecutor } from "./stream-executor";
import { isTerminalStatus } from "./types";
import type { ExecutionReport } from "./types";

/** Replaces executor selection for every order in the batch. */
export type ExecuteOrderFn = (
  venue: Venue,
  request: OrderRequest,
  session: ExchangeSession,
) => Promise<ExecutionReport | null>;

export interface OrderRouterDeps extends OrderExecutorDeps {
  executeFn?: ExecuteOrderFn;
}

export interface OrderRouter {
  /**
   * Execute a batch and return the reports worth keeping: fills, plus orders
   * that ended in an explicit venue status. Every order's pairing is settled.
   */
  routeAndCollect: (venues: readonly Venue[], orders: OrdersToExecute) => Promise<ExecutionReport[]>;
}

export const createOrderRouter = (deps: OrderRouterDeps): OrderRouter => {
  const ctx = createExecutorContext(deps);
  const { config, logger } = ctx;
  const restExecutor = createRestOrderExecutor(deps);
  const streamExecutor = createStreamOrderExecutor({ ...deps, restExecutor });

  const dropOrphan = (request: OrderRequest): void => {
    logger.warn("No venue for order, skipping", {
      exchangeId: request.exchangeId,
      symbol: request.symbol,
    });
    request.pairing.notifyFailed();
    emitEvent(ctx, {
      request,
      orderId: null,
      state: "CANCELLED",
      eventName: "order_orphaned",
      startedAt: null,
      context: { reason: "unknown venue" },
    });
  };

  const executeOnVenue = async (
    session: ExchangeSession,
    request: OrderRequest,
  ): Promise<ExecutionReport | null> => {
    const { venue } = session;
    await session.ensureMarginInitialized(request.symbol);

    if (deps.executeFn) {
      return deps.executeFn(venue, request, session);
    }

    if (hasStreamingSupport(venue) && !session.isCircuitOpen()) {
      try {
        return await streamExecutor.execute(venue, request, session);
      } catch (error) {
        if (!(error instanceof StreamCircuitOpenError)) {
          throw error;
        }
        logger.warn("Stream circuit open, executing over REST", {
          exchangeId: venue.id,
          symbol: request.symbol,
        });
      }
    }

    return restExecutor.execute(venue, request, session);
  };

  /** Settle the pairing and decide whether the report is kept. */
  const settle = (request: OrderRequest, report: ExecutionReport | null): ExecutionReport | null => {
    if (report?.status === "CLOSED") {
      request.pairing.notifyFilled();
      return report;
    }

    request.pairing.notifyFailed();
    if (report && isTerminalStatus(report.status)) {
      return report;
    }

    logger.warn("Order finished without a terminal status, dropping report", {
      exchangeId: request.exchangeId,
      symbol: request.symbol,
      status: report?.status ?? null,
    });
    return null;
  };

  const runOrder = async (
    session: ExchangeSession,
    request: OrderRequest,
  ): Promise<ExecutionReport | null> => {
    try {
      const report = await session.run(() => executeOnVenue(session, request));
      return settle(request, report);
    } catch (error) {
      logger.error("Order execution failed", error instanceof Error ? error : undefined, {
        exchangeId: request.exchangeId,
        symbol: request.symbol,
        side: request.side,
        amount: request.amount,
      });
      request.pairing.notifyFailed();
      return null;
    }
  };

  const routeAndCollect = async (
    venues: readonly Venue[],
    orders: OrdersToExecute,
  ): Promise<ExecutionReport[]> => {
    const venuesById = new Map(venues.map((venue) => [venue.id, venue]));

    const sessions = new Map<string, { session: ExchangeSession; firstSymbol: string }>();
    const routed: Array<{ session: ExchangeSession; request: OrderRequest }> = [];

    for (const request of flattenOrders(orders)) {
      const venue = venuesById.get(request.exchangeId);
      if (!venue) {
        dropOrphan(request);
        continue;
      }

      let entry = sessions.get(venue.id);
      if (!entry) {
        entry = {
          session: createExchangeSession({ venue, config, logger }),
          firstSymbol: request.symbol,
        };
        sessions.set(venue.id, entry);
      }
      routed.push({ session: entry.session, request });
    }

    const initResults = await Promise.allSettled(
      Array.from(sessions.values()).map(({ session, firstSymbol }) => session.initialize(firstSymbol)),
    );
    initResults.forEach((result, index) => {
      if (result.status === "rejected") {
        logger.warn("Session initialization failed", {
          exchangeId: Array.from(sessions.keys())[index],
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });

    const reports = await Promise.all(routed.map(({ session, request }) => runOrder(session, request)));
    return reports.filter((report): report is ExecutionReport => report !== null);
  };

  return { routeAndCollect };
};
