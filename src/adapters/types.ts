/**
 * Venue client interface and shared market types.
 *
 * Prices and amounts are plain numbers in the venue's own units, as the
 * connectivity layer reports them.
 */

import * as v from "valibot";

// Enums
export type OrderSide = "BUY" | "SELL";

export type OrderType = "LIMIT" | "MARKET";

export type VenueOrderStatus = "OPEN" | "CLOSED" | "CANCELED" | "REJECTED" | "EXPIRED";

export type MarginMode = "isolated" | "cross";

/** Transport used to place and monitor orders on a venue. */
export type VenueConnection = "rest" | "stream";

// Domain Types
export interface OrderBookLevel {
  price: number;
  amount: number;
}

export interface OrderBook {
  symbol: string;
  /** Best bid first */
  bids: OrderBookLevel[];
  /** Best ask first */
  asks: OrderBookLevel[];
  timestamp: number;
}

export interface VenueOrder {
  id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  status: VenueOrderStatus;
  amount: number;
  filled: number;
  remaining: number | null;
  price: number | null;
  average: number | null;
  lastTradePrice: number | null;
  /** Epoch ms of the venue's last update */
  timestamp: number;
}

// Order Creation Parameters
export interface LimitOrderParams {
  symbol: string;
  side: OrderSide;
  amount: number;
  price: number;
  /** Venue-specific options forwarded verbatim */
  params?: Record<string, unknown>;
}

export interface MarketOrderParams {
  symbol: string;
  side: OrderSide;
  amount: number;
  params?: Record<string, unknown>;
}

// Valibot Schemas
export const orderSideSchema = v.picklist(["BUY", "SELL"]);

export const orderTypeSchema = v.picklist(["LIMIT", "MARKET"]);

export const venueOrderStatusSchema = v.picklist([
  "OPEN",
  "CLOSED",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
]);

export const orderBookLevelSchema = v.object({
  price: v.pipe(v.number(), v.gtValue(0)),
  amount: v.pipe(v.number(), v.minValue(0)),
});

export const orderBookSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  bids: v.array(orderBookLevelSchema),
  asks: v.array(orderBookLevelSchema),
  timestamp: v.number(),
});

// Type Guards (using Valibot)
export const isOrderBook = (value: unknown): value is OrderBook => v.is(orderBookSchema, value);

// Venue Client Interface
export interface VenueClient {
  // Orders
  createLimitOrder(params: LimitOrderParams): Promise<VenueOrder>;
  createMarketOrder(params: MarketOrderParams): Promise<VenueOrder>;
  cancelOrder(orderId: string, symbol: string): Promise<void>;
  fetchOpenOrders(symbol: string): Promise<VenueOrder[]>;
  fetchOrder(orderId: string, symbol: string): Promise<VenueOrder>;

  // Market data
  fetchOrderBook(symbol: string): Promise<OrderBook>;

  // Account setup (perpetual venues)
  setMarginMode?(mode: MarginMode, symbol: string): Promise<void>;
  setLeverage?(leverage: number, symbol: string): Promise<void>;

  // Streaming: each call resolves with the next update
  watchOrderBook?(symbol: string): Promise<OrderBook>;
  watchOrders?(symbol: string): Promise<VenueOrder[]>;
  unwatchOrderBook?(symbol: string): Promise<void>;
  unwatchOrders?(symbol: string): Promise<void>;
}

export interface StreamingVenueClient extends VenueClient {
  watchOrderBook(symbol: string): Promise<OrderBook>;
  watchOrders(symbol: string): Promise<VenueOrder[]>;
}

export interface Venue {
  id: string;
  client: VenueClient;
  leverage: number;
  marginMode: MarginMode;
  connection: VenueConnection;
}

export const isStreamingClient = (client: VenueClient): client is StreamingVenueClient =>
  typeof client.watchOrderBook === "function" && typeof client.watchOrders === "function";

/**
 * Returns the venue's client when the venue is configured for streaming and
 * the client implements both subscriptions, else `null`.
 */
export const getStreamingClient = (venue: Venue): StreamingVenueClient | null => {
  if (venue.connection !== "stream") {
    return null;
  }
  return isStreamingClient(venue.client) ? venue.client : null;
};

export const hasStreamingSupport = (venue: Venue): boolean => getStreamingClient(venue) !== null;
