import { OrderValidationError } from "@/worker/execution/errors";

import type { OrderRequest } from "./types";

/**
 * Reject requests that no venue would accept, before any network call.
 *
 * @throws {OrderValidationError} If the amount is not positive, or a limit order has no positive price
 */
export const validateOrderRequest = (request: OrderRequest): void => {
  if (!(request.amount > 0)) {
    throw new OrderValidationError(
      `Order amount must be positive, got ${request.amount}`,
      request.symbol,
    );
  }
  if (request.orderType === "LIMIT" && (request.price === null || !(request.price > 0))) {
    throw new OrderValidationError(
      `Limit order requires a positive price, got ${request.price}`,
      request.symbol,
    );
  }
};
