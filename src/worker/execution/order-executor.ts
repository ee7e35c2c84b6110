/**
 * Batch entry point: routes a batch, logs the outcome and forwards the
 * batch summary to an optional notifier.
 */

import type { Venue } from "@/adapters/types";
import { countOrders } from "@/domains/order/types";
import type { OrdersToExecute } from "@/domains/order/types";
import type { Logger } from "@/lib/logger/logger";

import type { ExecutorConfig } from "./config";
import { createOrderEventBus } from "./events";
import type { EventSink, OrderEventBus } from "./events";
import type { OrderExecutorDeps } from "./executor-context";
import { createOrderRouter } from "./router";
import type { ExecuteOrderFn } from "./router";
import { createLogSink, createTelegramSink } from "./sinks";
import type { ExecutionReport } from "./types";

/** Destination for the end-of-batch summary, e.g. a chat bot. */
export interface SummaryNotifier {
  send: (message: string) => Promise<void>;
}

export interface OrderExecutorOptions
  extends Pick<OrderExecutorDeps, "classifier" | "repricePolicy" | "sleep" | "now"> {
  config: ExecutorConfig;
  logger: Logger;
  notifier?: SummaryNotifier;
  executeFn?: ExecuteOrderFn;
}

export interface BatchOrderExecutor {
  readonly eventBus: OrderEventBus;
  registerSink: (sink: EventSink) => void;
  executeOrders: (venues: readonly Venue[], orders: OrdersToExecute) => Promise<ExecutionReport[]>;
}

export const createOrderExecutor = (options: OrderExecutorOptions): BatchOrderExecutor => {
  const { logger, notifier } = options;
  const eventBus = createOrderEventBus(logger);
  const summarySink = createTelegramSink();
  eventBus.registerSink(createLogSink(logger));
  eventBus.registerSink(summarySink);

  const router = createOrderRouter({ ...options, eventBus });

  const sendSummary = async (): Promise<void> => {
    const summary = summarySink.flushSummary();
    if (!summary || !notifier) {
      return;
    }
    try {
      await notifier.send(summary);
    } catch (error) {
      logger.error("Failed to send batch summary", error instanceof Error ? error : undefined);
    }
  };

  const executeOrders = async (
    venues: readonly Venue[],
    orders: OrdersToExecute,
  ): Promise<ExecutionReport[]> => {
    const total = countOrders(orders);
    if (total === 0) {
      logger.info("No orders to execute");
      return [];
    }

    logger.info("Executing order batch", {
      orders: total,
      venues: venues.map((venue) => venue.id),
    });
    const reports = await router.routeAndCollect(venues, orders);
    const filled = reports.filter((report) => report.status === "CLOSED").length;
    logger.info(`filled ${filled} out of ${total} orders`);

    await sendSummary();
    return reports;
  };

  return {
    eventBus,
    registerSink: eventBus.registerSink,
    executeOrders,
  };
};
