import { describe, expect, it } from "vitest";

import { ExchangeError } from "../errors";
import type { OrderBook } from "../types";

import { createPaperVenueClient } from "./adapter";

const SYMBOL = "BTC/USDT";

const makeBook = (bid: number, ask: number): OrderBook => ({
  symbol: SYMBOL,
  bids: [{ price: bid, amount: 1 }],
  asks: [{ price: ask, amount: 1 }],
  timestamp: 0,
});

describe("createPaperVenueClient", () => {
  it("should rest a limit order that does not cross", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });

    const order = await client.createLimitOrder({
      symbol: SYMBOL,
      side: "BUY",
      amount: 2,
      price: 100,
    });

    expect(order).toMatchObject({ id: "paper-1", status: "OPEN", filled: 0, remaining: 2 });
    await expect(client.fetchOpenOrders(SYMBOL)).resolves.toHaveLength(1);
  });

  it("should fill a resting order when the book moves through it", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    const order = await client.createLimitOrder({
      symbol: SYMBOL,
      side: "BUY",
      amount: 2,
      price: 100,
    });

    client.setOrderBook(makeBook(99, 100));

    await expect(client.fetchOrder(order.id, SYMBOL)).resolves.toMatchObject({
      status: "CLOSED",
      filled: 2,
      remaining: 0,
      average: 100,
    });
    await expect(client.fetchOpenOrders(SYMBOL)).resolves.toEqual([]);
  });

  it("should fill a crossing limit order immediately", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });

    const order = await client.createLimitOrder({
      symbol: SYMBOL,
      side: "SELL",
      amount: 1,
      price: 99.5,
    });

    expect(order).toMatchObject({ status: "CLOSED", filled: 1, average: 99.5 });
  });

  it("should fill market orders at the top of the opposite side", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });

    const buy = await client.createMarketOrder({ symbol: SYMBOL, side: "BUY", amount: 1 });
    const sell = await client.createMarketOrder({ symbol: SYMBOL, side: "SELL", amount: 1 });

    expect(buy).toMatchObject({ type: "MARKET", status: "CLOSED", average: 101 });
    expect(sell).toMatchObject({ type: "MARKET", status: "CLOSED", average: 100 });
  });

  it("should reject unknown symbols as BAD_SYMBOL", async () => {
    const client = createPaperVenueClient();

    await expect(
      client.createMarketOrder({ symbol: "DOGE/USDT", side: "BUY", amount: 1 }),
    ).rejects.toMatchObject({ name: "ExchangeError", code: "BAD_SYMBOL" });
  });

  it("should cancel open orders only once", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    const order = await client.createLimitOrder({
      symbol: SYMBOL,
      side: "BUY",
      amount: 1,
      price: 99,
    });

    await client.cancelOrder(order.id, SYMBOL);

    await expect(client.fetchOrder(order.id, SYMBOL)).resolves.toMatchObject({
      status: "CANCELED",
    });
    await expect(client.cancelOrder(order.id, SYMBOL)).rejects.toMatchObject({
      code: "INVALID_ORDER",
    });
  });

  it("should deliver the current book first, then wait for the next change", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });

    await expect(client.watchOrderBook(SYMBOL)).resolves.toMatchObject({
      bids: [{ price: 100, amount: 1 }],
    });

    const next = client.watchOrderBook(SYMBOL);
    client.setOrderBook(makeBook(102, 103));

    await expect(next).resolves.toMatchObject({ bids: [{ price: 102, amount: 1 }] });
  });

  it("should deliver queued order updates to the next watcher", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    const order = await client.createMarketOrder({ symbol: SYMBOL, side: "BUY", amount: 1 });

    const updates = await client.watchOrders(SYMBOL);

    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({ id: order.id, status: "CLOSED" });
  });

  it("should push updates to a waiting watcher", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    const order = await client.createLimitOrder({
      symbol: SYMBOL,
      side: "BUY",
      amount: 1,
      price: 100,
    });
    await client.watchOrders(SYMBOL);

    const next = client.watchOrders(SYMBOL);
    client.setOrderBook(makeBook(99, 100));

    await expect(next).resolves.toEqual([
      expect.objectContaining({ id: order.id, status: "CLOSED" }),
    ]);
  });

  it("should reject pending watchers on unwatch", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    const pending = client.watchOrders(SYMBOL);

    await client.unwatchOrders(SYMBOL);

    await expect(pending).rejects.toBeInstanceOf(ExchangeError);
  });

  it("should fail the next call when a failure is injected", async () => {
    const client = createPaperVenueClient({ books: [makeBook(100, 101)] });
    client.failNext("fetchOrderBook", new Error("boom"));

    await expect(client.fetchOrderBook(SYMBOL)).rejects.toThrow("boom");
    await expect(client.fetchOrderBook(SYMBOL)).resolves.toMatchObject({ symbol: SYMBOL });
  });

  it("should record margin and leverage calls", async () => {
    const client = createPaperVenueClient();

    await client.setMarginMode("isolated", SYMBOL);
    await client.setLeverage(5, SYMBOL);

    expect(client.getMarginCalls()).toEqual([{ mode: "isolated", symbol: SYMBOL }]);
    expect(client.getLeverageCalls()).toEqual([{ leverage: 5, symbol: SYMBOL }]);
  });
});
