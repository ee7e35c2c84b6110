export type {
  LimitOrderParams,
  MarginMode,
  MarketOrderParams,
  OrderBook,
  OrderBookLevel,
  OrderSide,
  OrderType,
  StreamingVenueClient,
  Venue,
  VenueClient,
  VenueConnection,
  VenueOrder,
  VenueOrderStatus,
} from "./types";

export {
  getStreamingClient,
  hasStreamingSupport,
  isOrderBook,
  isStreamingClient,
  orderBookLevelSchema,
  orderBookSchema,
  orderSideSchema,
  orderTypeSchema,
  venueOrderStatusSchema,
} from "./types";

export { ExchangeError, isNetworkError } from "./errors";
export type { ExchangeErrorCode } from "./errors";

export { createVenue } from "./factory";

export { VenueConfigSchema, isVenueConfig, parseVenueConfig } from "./config";
export type { VenueConfig } from "./config";

export { createPaperVenueClient } from "./paper";
export type { PaperMethod, PaperVenueClient, PaperVenueClientConfig } from "./paper";
