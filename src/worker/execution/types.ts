/**
 * Execution reports and per-order working state.
 */

import * as v from "valibot";

import { venueOrderStatusSchema } from "@/adapters/types";
import type { VenueOrderStatus } from "@/adapters/types";

// --- Execution Report ---

/**
 * Outcome of one order. `filled + remaining == amount`; `fillLatencyMs` is
 * measured from submission to the status the report was built from.
 */
export interface ExecutionReport {
  id: string;
  symbol: string;
  status: VenueOrderStatus;
  amount: number;
  filled: number;
  remaining: number;
  averagePrice: number | null;
  lastPrice: number | null;
  exchangeId: string;
  fillLatencyMs: number;
  /** Epoch ms of the venue's last update */
  timestamp: number;
}

const nonNegative = v.pipe(v.number(), v.minValue(0));

export const executionReportSchema = v.object({
  id: v.string(),
  symbol: v.string(),
  status: venueOrderStatusSchema,
  amount: nonNegative,
  filled: nonNegative,
  remaining: nonNegative,
  averagePrice: v.nullable(v.number()),
  lastPrice: v.nullable(v.number()),
  exchangeId: v.pipe(v.string(), v.minLength(1)),
  fillLatencyMs: nonNegative,
  timestamp: v.number(),
});

export const isExecutionReport = (value: unknown): value is ExecutionReport =>
  v.is(executionReportSchema, value);

/** Statuses after which the venue will not change the order again. */
const TERMINAL_STATUSES: ReadonlySet<VenueOrderStatus> = new Set([
  "CLOSED",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
]);

export const isTerminalStatus = (status: VenueOrderStatus): boolean =>
  TERMINAL_STATUSES.has(status);

// --- Order Book State ---

/**
 * Price a maker order is quoting at and the spread observed when it was chosen.
 */
export interface OrderBookState {
  bestPrice: number;
  spreadPct: number;
}
