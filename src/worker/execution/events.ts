/**
 * Order lifecycle events and the bus that fans them out to sinks.
 */

import * as v from "valibot";

import type { OrderSide } from "@/adapters/types";
import type { Logger } from "@/lib/logger/logger";

// --- Order State ---

export const ORDER_STATES = [
  // Public lifecycle
  "PENDING",
  "SUBMITTED",
  "PARTIALLY_FILLED",
  "FILLED",
  "CANCELLED",
  "TIMED_OUT",
  "FAILED",
  // Executor internals
  "INITIALIZING",
  "CREATING_ORDER",
  "MONITORING_ORDER",
  "UPDATING_ORDER",
  "WAIT_UNTIL_ORDER_CANCELLED",
] as const;

export type OrderState = (typeof ORDER_STATES)[number];

export const orderStateSchema = v.picklist(ORDER_STATES);

// --- Order Event ---

export type OrderEventName =
  | "order_submitted"
  | "order_fill_partial"
  | "order_fill_complete"
  | "order_failed"
  | "order_orphaned"
  | "order_repriced"
  | "order_reprice_suppressed"
  | "order_timeout_fallback"
  | "ws_reconnect_attempt"
  | "ws_circuit_open"
  | "ws_staleness_fallback";

export interface OrderEvent {
  readonly orderId: string | null;
  readonly exchangeId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly state: OrderState;
  readonly timestampMs: number;
  readonly eventName: OrderEventName;
  readonly latencyMs: number | null;
  readonly fillPrice: number | null;
  readonly fillQty: number | null;
  readonly context?: Readonly<Record<string, unknown>>;
}

export interface EventSink {
  onEvent: (event: OrderEvent) => void;
}

// --- Event Bus ---

export interface OrderEventBus {
  registerSink: (sink: EventSink) => void;
  emit: (event: OrderEvent) => void;
}

/**
 * Create a synchronous event bus. Sinks receive events in registration order;
 * a throwing sink is logged and skipped.
 */
export const createOrderEventBus = (logger: Logger): OrderEventBus => {
  const sinks: EventSink[] = [];

  return {
    registerSink: (sink) => {
      sinks.push(sink);
    },

    emit: (event) => {
      for (const sink of sinks) {
        try {
          sink.onEvent(event);
        } catch (error) {
          logger.warn("Event sink failed", {
            eventName: event.eventName,
            orderId: event.orderId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    },
  };
};
