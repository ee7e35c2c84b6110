import { describe, expect, it } from "vitest";

import { OrderValidationError } from "@/worker/execution/errors";

import { createOrderRequest } from "./types";
import { validateOrderRequest } from "./validation";

const limitOrder = (amount: number, price: number | null) =>
  createOrderRequest({
    symbol: "BTC/USDT",
    side: "BUY",
    orderType: "LIMIT",
    amount,
    price,
    exchangeId: "paper",
  });

describe("validateOrderRequest", () => {
  it("should accept a positive limit order", () => {
    expect(() => validateOrderRequest(limitOrder(1, 100))).not.toThrow();
  });

  it("should accept a market order without a price", () => {
    const request = createOrderRequest({
      symbol: "BTC/USDT",
      side: "SELL",
      orderType: "MARKET",
      amount: 0.5,
      exchangeId: "paper",
    });

    expect(() => validateOrderRequest(request)).not.toThrow();
  });

  it.each([0, -1])("should reject amount %s", (amount) => {
    expect(() => validateOrderRequest(limitOrder(amount, 100))).toThrow(OrderValidationError);
  });

  it("should reject a limit order without a price", () => {
    expect(() => validateOrderRequest(limitOrder(1, null))).toThrow(
      "Limit order requires a positive price, got null",
    );
  });

  it("should reject a limit order with a zero price", () => {
    expect(() => validateOrderRequest(limitOrder(1, 0))).toThrow(OrderValidationError);
  });
});
