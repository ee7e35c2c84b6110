import type { Logger } from "@/lib/logger/logger";

import type { EventSink } from "../events";

/**
 * Logs every event field as structured context under the message `order_event`.
 */
export const createLogSink = (logger: Logger): EventSink => ({
  onEvent: (event) => {
    logger.info("order_event", {
      orderId: event.orderId,
      exchangeId: event.exchangeId,
      symbol: event.symbol,
      side: event.side,
      state: event.state,
      timestampMs: event.timestampMs,
      eventName: event.eventName,
      latencyMs: event.latencyMs,
      fillPrice: event.fillPrice,
      fillQty: event.fillQty,
      ...(event.context && { context: event.context }),
    });
  },
});
