/**
 * Order requests as handed to the execution engine.
 */

import * as v from "valibot";

import { orderSideSchema, orderTypeSchema } from "@/adapters/types";
import type { OrderSide, OrderType } from "@/adapters/types";

import { createPairing } from "./pairing";
import type { Pairing } from "./pairing";

/** MAKER rests a limit order; TAKER crosses the spread. */
export type ExecutionStyle = "MAKER" | "TAKER";

export interface OrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly orderType: OrderType;
  readonly amount: number;
  /** Limit price; required for LIMIT orders */
  readonly price: number | null;
  readonly execution: ExecutionStyle;
  readonly exchangeId: string;
  /** Venue-specific options forwarded verbatim to order creation */
  readonly params: Readonly<Record<string, unknown>>;
  readonly pairing: Pairing;
  readonly notes: string;
}

export const orderRequestInputSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  side: orderSideSchema,
  orderType: orderTypeSchema,
  amount: v.number(),
  price: v.optional(v.nullable(v.number()), null),
  execution: v.optional(v.picklist(["MAKER", "TAKER"])),
  exchangeId: v.pipe(v.string(), v.minLength(1)),
  params: v.optional(v.record(v.string(), v.unknown()), {}),
  notes: v.optional(v.string(), ""),
});

export type OrderRequestInput = v.InferInput<typeof orderRequestInputSchema> & {
  pairing?: Pairing;
};

/**
 * Build an immutable order request. Execution style defaults to TAKER for
 * market orders and MAKER otherwise; a fresh pairing is attached when none is given.
 */
export const createOrderRequest = (input: OrderRequestInput): OrderRequest => {
  const parsed = v.parse(orderRequestInputSchema, input);
  const request: OrderRequest = {
    ...parsed,
    execution: parsed.execution ?? (parsed.orderType === "MARKET" ? "TAKER" : "MAKER"),
    params: Object.freeze({ ...parsed.params }),
    pairing: input.pairing ?? createPairing(),
  };
  return Object.freeze(request);
};

/**
 * Orders for one batch. Updates to existing positions run ahead of new ones.
 * Groups are keyed by instrument.
 */
export interface OrdersToExecute {
  updates: Record<string, OrderRequest[]>;
  new: Record<string, OrderRequest[]>;
}

export const flattenOrders = (orders: OrdersToExecute): OrderRequest[] => [
  ...Object.values(orders.updates).flat(),
  ...Object.values(orders.new).flat(),
];

export const countOrders = (orders: OrdersToExecute): number => flattenOrders(orders).length;
