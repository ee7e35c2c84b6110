export { createPairing } from "./pairing";
export type { PairOutcome, Pairing } from "./pairing";

export { countOrders, createOrderRequest, flattenOrders, orderRequestInputSchema } from "./types";
export type { ExecutionStyle, OrderRequest, OrderRequestInput, OrdersToExecute } from "./types";

export { validateOrderRequest } from "./validation";
