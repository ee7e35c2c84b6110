/**
 * Paper trading venue.
 *
 * In-memory order matching against a book that callers move by hand. Limit
 * orders that cross the book fill in full at their limit price; market orders
 * fill at the top of the opposite side. Streaming calls resolve on the next
 * change, which makes this client usable for dry runs and in-process tests.
 */

import * as v from "valibot";

import { ExchangeError } from "../errors";
import { orderBookSchema } from "../types";
import type {
  LimitOrderParams,
  MarginMode,
  MarketOrderParams,
  OrderBook,
  OrderSide,
  StreamingVenueClient,
  VenueOrder,
} from "../types";

const EXCHANGE = "paper";

export type PaperMethod =
  | "createLimitOrder"
  | "createMarketOrder"
  | "cancelOrder"
  | "fetchOpenOrders"
  | "fetchOrder"
  | "fetchOrderBook"
  | "setMarginMode"
  | "setLeverage"
  | "watchOrderBook"
  | "watchOrders";

export interface PaperVenueClientConfig {
  /** Initial books keyed by symbol */
  books?: OrderBook[];
}

export interface PaperVenueClient extends StreamingVenueClient {
  setMarginMode(mode: MarginMode, symbol: string): Promise<void>;
  setLeverage(leverage: number, symbol: string): Promise<void>;
  unwatchOrderBook(symbol: string): Promise<void>;
  unwatchOrders(symbol: string): Promise<void>;

  /** Replace a symbol's book, filling any resting order it crosses. */
  setOrderBook(book: OrderBook): void;
  /** Make the next call to `method` fail with `error`. */
  failNext(method: PaperMethod, error: Error): void;
  getOrders(): VenueOrder[];
  getMarginCalls(): Array<{ mode: MarginMode; symbol: string }>;
  getLeverageCalls(): Array<{ leverage: number; symbol: string }>;
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

const crosses = (side: OrderSide, price: number, book: OrderBook): boolean => {
  if (side === "BUY") {
    const bestAsk = book.asks[0];
    return bestAsk !== undefined && bestAsk.price <= price;
  }
  const bestBid = book.bids[0];
  return bestBid !== undefined && bestBid.price >= price;
};

/**
 * Create a paper trading venue client.
 */
export const createPaperVenueClient = (config: PaperVenueClientConfig = {}): PaperVenueClient => {
  const books = new Map<string, OrderBook>();
  const bookVersions = new Map<string, number>();
  const deliveredVersions = new Map<string, number>();
  const bookWaiters = new Map<string, Waiter<OrderBook>[]>();

  const orders = new Map<string, VenueOrder>();
  const pendingUpdates = new Map<string, VenueOrder[]>();
  const orderWaiters = new Map<string, Waiter<VenueOrder[]>[]>();

  const failures = new Map<PaperMethod, Error>();
  const marginCalls: Array<{ mode: MarginMode; symbol: string }> = [];
  const leverageCalls: Array<{ leverage: number; symbol: string }> = [];
  let nextOrderId = 1;

  const checkFailure = (method: PaperMethod): void => {
    const error = failures.get(method);
    if (error) {
      failures.delete(method);
      throw error;
    }
  };

  const requireBook = (symbol: string): OrderBook => {
    const book = books.get(symbol);
    if (!book) {
      throw new ExchangeError(`Unknown symbol ${symbol}`, "BAD_SYMBOL", EXCHANGE);
    }
    return book;
  };

  const requireOrder = (orderId: string): VenueOrder => {
    const order = orders.get(orderId);
    if (!order) {
      throw new ExchangeError(`Order ${orderId} not found`, "ORDER_NOT_FOUND", EXCHANGE);
    }
    return order;
  };

  const publishOrder = (order: VenueOrder): void => {
    const snapshot = { ...order };
    const waiters = orderWaiters.get(order.symbol) ?? [];
    orderWaiters.delete(order.symbol);
    if (waiters.length > 0) {
      for (const waiter of waiters) {
        waiter.resolve([snapshot]);
      }
      return;
    }
    pendingUpdates.set(order.symbol, [...(pendingUpdates.get(order.symbol) ?? []), snapshot]);
  };

  const fill = (order: VenueOrder, price: number): void => {
    order.status = "CLOSED";
    order.filled = order.amount;
    order.remaining = 0;
    order.average = price;
    order.lastTradePrice = price;
    order.timestamp = Date.now();
  };

  const matchRestingOrders = (book: OrderBook): void => {
    for (const order of orders.values()) {
      if (order.symbol !== book.symbol || order.status !== "OPEN" || order.price === null) {
        continue;
      }
      if (crosses(order.side, order.price, book)) {
        fill(order, order.price);
        publishOrder(order);
      }
    }
  };

  const setOrderBook = (book: OrderBook): void => {
    const parsed = v.parse(orderBookSchema, book);
    books.set(parsed.symbol, parsed);
    bookVersions.set(parsed.symbol, (bookVersions.get(parsed.symbol) ?? 0) + 1);

    const waiters = bookWaiters.get(parsed.symbol) ?? [];
    bookWaiters.delete(parsed.symbol);
    if (waiters.length > 0) {
      deliveredVersions.set(parsed.symbol, bookVersions.get(parsed.symbol) ?? 0);
      for (const waiter of waiters) {
        waiter.resolve(parsed);
      }
    }

    matchRestingOrders(parsed);
  };

  const newOrder = (
    symbol: string,
    side: OrderSide,
    type: VenueOrder["type"],
    amount: number,
    price: number | null,
  ): VenueOrder => {
    const order: VenueOrder = {
      id: `${EXCHANGE}-${nextOrderId++}`,
      symbol,
      side,
      type,
      status: "OPEN",
      amount,
      filled: 0,
      remaining: amount,
      price,
      average: null,
      lastTradePrice: null,
      timestamp: Date.now(),
    };
    orders.set(order.id, order);
    return order;
  };

  const rejectWaiters = <T>(waiters: Map<string, Waiter<T>[]>, symbol: string): void => {
    const pending = waiters.get(symbol) ?? [];
    waiters.delete(symbol);
    for (const waiter of pending) {
      waiter.reject(new ExchangeError(`Unsubscribed from ${symbol}`, "NETWORK_ERROR", EXCHANGE));
    }
  };

  for (const book of config.books ?? []) {
    setOrderBook(book);
  }

  return {
    createLimitOrder: async ({ symbol, side, amount, price }: LimitOrderParams) => {
      checkFailure("createLimitOrder");
      const book = requireBook(symbol);
      if (amount <= 0 || price <= 0) {
        throw new ExchangeError("Amount and price must be positive", "INVALID_ORDER", EXCHANGE);
      }
      const order = newOrder(symbol, side, "LIMIT", amount, price);
      if (crosses(side, price, book)) {
        fill(order, price);
      }
      publishOrder(order);
      return { ...order };
    },

    createMarketOrder: async ({ symbol, side, amount }: MarketOrderParams) => {
      checkFailure("createMarketOrder");
      const book = requireBook(symbol);
      const top = side === "BUY" ? book.asks[0] : book.bids[0];
      if (!top) {
        throw new ExchangeError(`No liquidity for ${symbol}`, "INVALID_ORDER", EXCHANGE);
      }
      const order = newOrder(symbol, side, "MARKET", amount, null);
      fill(order, top.price);
      publishOrder(order);
      return { ...order };
    },

    cancelOrder: async (orderId: string) => {
      checkFailure("cancelOrder");
      const order = requireOrder(orderId);
      if (order.status !== "OPEN") {
        throw new ExchangeError(`Order ${orderId} is ${order.status}`, "INVALID_ORDER", EXCHANGE);
      }
      order.status = "CANCELED";
      order.timestamp = Date.now();
      publishOrder(order);
    },

    fetchOpenOrders: async (symbol: string) => {
      checkFailure("fetchOpenOrders");
      return Array.from(orders.values())
        .filter((order) => order.symbol === symbol && order.status === "OPEN")
        .map((order) => ({ ...order }));
    },

    fetchOrder: async (orderId: string) => {
      checkFailure("fetchOrder");
      return { ...requireOrder(orderId) };
    },

    fetchOrderBook: async (symbol: string) => {
      checkFailure("fetchOrderBook");
      return requireBook(symbol);
    },

    setMarginMode: async (mode: MarginMode, symbol: string) => {
      checkFailure("setMarginMode");
      marginCalls.push({ mode, symbol });
    },

    setLeverage: async (leverage: number, symbol: string) => {
      checkFailure("setLeverage");
      leverageCalls.push({ leverage, symbol });
    },

    watchOrderBook: async (symbol: string) => {
      checkFailure("watchOrderBook");
      const book = books.get(symbol);
      const version = bookVersions.get(symbol) ?? 0;
      if (book && version > (deliveredVersions.get(symbol) ?? 0)) {
        deliveredVersions.set(symbol, version);
        return book;
      }
      return new Promise<OrderBook>((resolve, reject) => {
        bookWaiters.set(symbol, [...(bookWaiters.get(symbol) ?? []), { resolve, reject }]);
      });
    },

    watchOrders: async (symbol: string) => {
      checkFailure("watchOrders");
      const queued = pendingUpdates.get(symbol);
      if (queued && queued.length > 0) {
        pendingUpdates.delete(symbol);
        return queued;
      }
      return new Promise<VenueOrder[]>((resolve, reject) => {
        orderWaiters.set(symbol, [...(orderWaiters.get(symbol) ?? []), { resolve, reject }]);
      });
    },

    unwatchOrderBook: async (symbol: string) => {
      rejectWaiters(bookWaiters, symbol);
    },

    unwatchOrders: async (symbol: string) => {
      rejectWaiters(orderWaiters, symbol);
    },

    setOrderBook,

    failNext: (method, error) => {
      failures.set(method, error);
    },

    getOrders: () => Array.from(orders.values()).map((order) => ({ ...order })),

    getMarginCalls: () => [...marginCalls],

    getLeverageCalls: () => [...leverageCalls],
  };
};
