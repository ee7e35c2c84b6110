/**
 * Maker price discovery from a book snapshot.
 */

import type { OrderBook, OrderSide } from "@/adapters/types";

import type { ExecutionStrategy } from "./config";
import type { OrderBookState } from "./types";

/**
 * Elapsed-time bands for best-price quoting: [upper bound in seconds, book depth index].
 * Past the last band the order quotes at the top of the book.
 */
const BEST_PRICE_BANDS: ReadonlyArray<readonly [number, number]> = [
  [10, 5],
  [30, 4],
  [60, 3],
  [120, 2],
  [180, 1],
];

/**
 * Book depth to quote at. `fast` always quotes the top level; `best-price`
 * starts five levels deep and walks towards the top as the order ages.
 */
export const bestPriceIndex = (strategy: ExecutionStrategy, elapsedSeconds: number): number => {
  if (strategy === "fast") {
    return 0;
  }
  const band = BEST_PRICE_BANDS.find(([upperBound]) => elapsedSeconds < upperBound);
  return band ? band[1] : 0;
};

export const spreadPct = (book: OrderBook): number | null => {
  const bestBid = book.bids[0];
  const bestAsk = book.asks[0];
  if (!bestBid || !bestAsk) {
    return null;
  }
  return (bestAsk.price - bestBid.price) / bestBid.price;
};

/**
 * Pick a quote from the book.
 *
 * Returns a new state when there is no current quote, when the target is more
 * competitive than the current quote, or when the current quote has crossed
 * the top of the book. Returns `null` when the current quote should stand or
 * the book is one-sided.
 */
export const analyzeOrderBook = (
  book: OrderBook,
  side: OrderSide,
  current: OrderBookState | null,
  elapsedSeconds: number,
  strategy: ExecutionStrategy,
): OrderBookState | null => {
  const spread = spreadPct(book);
  if (spread === null) {
    return null;
  }

  const levels = side === "BUY" ? book.bids : book.asks;
  const index = Math.min(bestPriceIndex(strategy, elapsedSeconds), levels.length - 1);
  const target = levels[index];
  const top = levels[0];
  if (!target || !top) {
    return null;
  }

  if (current === null) {
    return { bestPrice: target.price, spreadPct: spread };
  }

  const shouldUpdate =
    side === "BUY"
      ? target.price > current.bestPrice || current.bestPrice > top.price
      : target.price < current.bestPrice || current.bestPrice < top.price;

  return shouldUpdate ? { bestPrice: target.price, spreadPct: spread } : null;
};
