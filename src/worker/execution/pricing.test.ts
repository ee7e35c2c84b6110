import { describe, expect, it } from "vitest";

import type { OrderBook } from "@/adapters/types";

import { analyzeOrderBook, bestPriceIndex, spreadPct } from "./pricing";

const makeBook = (bids: number[], asks: number[]): OrderBook => ({
  symbol: "BTC/USDT",
  bids: bids.map((price) => ({ price, amount: 1 })),
  asks: asks.map((price) => ({ price, amount: 1 })),
  timestamp: 0,
});

describe("bestPriceIndex", () => {
  it("should always quote the top for fast execution", () => {
    expect(bestPriceIndex("fast", 0)).toBe(0);
    expect(bestPriceIndex("fast", 500)).toBe(0);
  });

  it("should walk from depth 5 to the top as the order ages", () => {
    expect([0, 9.9, 10, 29, 30, 59, 60, 119, 120, 179, 180, 600].map((s) =>
      bestPriceIndex("best-price", s),
    )).toEqual([5, 5, 4, 4, 3, 3, 2, 2, 1, 1, 0, 0]);
  });
});

describe("spreadPct", () => {
  it("should measure the spread against the best bid", () => {
    expect(spreadPct(makeBook([100], [102]))).toBe(0.02);
  });

  it("should return null for a one-sided book", () => {
    expect(spreadPct(makeBook([], [101]))).toBeNull();
  });
});

describe("analyzeOrderBook", () => {
  const book = makeBook([100, 99, 98], [101, 102, 103]);

  it("should quote the best bid for a fresh fast buy", () => {
    expect(analyzeOrderBook(book, "BUY", null, 0, "fast")).toEqual({
      bestPrice: 100,
      spreadPct: 0.01,
    });
  });

  it("should quote the best ask for a fresh fast sell", () => {
    expect(analyzeOrderBook(book, "SELL", null, 0, "fast")).toMatchObject({ bestPrice: 101 });
  });

  it("should clamp the best-price depth to the book", () => {
    expect(analyzeOrderBook(book, "BUY", null, 0, "best-price")).toMatchObject({ bestPrice: 98 });
  });

  it("should keep a buy quote that is still at the top", () => {
    expect(analyzeOrderBook(book, "BUY", { bestPrice: 100, spreadPct: 0.01 }, 5, "fast")).toBeNull();
  });

  it("should move a buy quote up when the bid improves", () => {
    const higher = makeBook([100.5, 100], [101]);

    expect(
      analyzeOrderBook(higher, "BUY", { bestPrice: 100, spreadPct: 0.01 }, 5, "fast"),
    ).toMatchObject({ bestPrice: 100.5 });
  });

  it("should move a buy quote down when it sits above the best bid", () => {
    const lower = makeBook([99, 98], [100]);

    expect(
      analyzeOrderBook(lower, "BUY", { bestPrice: 100, spreadPct: 0.01 }, 5, "fast"),
    ).toMatchObject({ bestPrice: 99 });
  });

  it("should move a sell quote up when it sits below the best ask", () => {
    const higher = makeBook([101], [102, 103]);

    expect(
      analyzeOrderBook(higher, "SELL", { bestPrice: 101, spreadPct: 0.01 }, 5, "fast"),
    ).toMatchObject({ bestPrice: 102 });
  });

  it("should ignore a one-sided book", () => {
    expect(analyzeOrderBook(makeBook([100], []), "BUY", null, 0, "fast")).toBeNull();
  });
});
