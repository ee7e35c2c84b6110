/**
 * Aggregates a batch's events into a chat-friendly summary.
 */

import type { EventSink, OrderEvent, OrderState } from "../events";

type Outcome = "filled" | "timeout" | "rejected" | "orphaned";

const OUTCOME_BY_STATE: Partial<Record<OrderState, Outcome>> = {
  FILLED: "filled",
  TIMED_OUT: "timeout",
  FAILED: "rejected",
  CANCELLED: "orphaned",
};

export const SUMMARY_HEADER = "=== Order Batch Summary ===";

export interface TelegramSink extends EventSink {
  /** Render the buffered events and clear the buffer. Empty string when nothing is buffered. */
  flushSummary: () => string;
}

const formatEventLine = (event: OrderEvent): string => {
  const fill =
    event.fillPrice !== null && event.fillQty !== null
      ? ` fill=${event.fillQty}@${event.fillPrice}`
      : "";
  const latency = event.latencyMs !== null ? ` latency=${event.latencyMs}ms` : "";
  return `[${event.state}] ${event.symbol} ${event.side} order=${event.orderId ?? "-"}${fill}${latency}`;
};

export const createTelegramSink = (): TelegramSink => {
  let events: OrderEvent[] = [];

  const flushSummary = (): string => {
    if (events.length === 0) {
      return "";
    }

    const counts: Record<Outcome, number> = { filled: 0, timeout: 0, rejected: 0, orphaned: 0 };
    for (const event of events) {
      const outcome = OUTCOME_BY_STATE[event.state];
      if (outcome) {
        counts[outcome] += 1;
      }
    }

    const lines = [
      SUMMARY_HEADER,
      `filled: ${counts.filled}  timeout: ${counts.timeout}  rejected: ${counts.rejected}  orphaned: ${counts.orphaned}`,
      "",
      ...events.map(formatEventLine),
    ];
    events = [];
    return lines.join("\n");
  };

  return {
    onEvent: (event) => {
      events.push(event);
    },
    flushSummary,
  };
};
