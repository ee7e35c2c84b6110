/**
 * Venue error types.
 *
 * Connectivity layers should map their failures onto `ExchangeError` codes so
 * the rejection classifier can tell business rejections from transport errors.
 */

export type ExchangeErrorCode =
  | "AUTHENTICATION_FAILED"
  | "RATE_LIMITED"
  | "INSUFFICIENT_FUNDS"
  | "BAD_SYMBOL"
  | "ORDER_NOT_FOUND"
  | "INVALID_ORDER"
  | "NETWORK_ERROR"
  | "UNKNOWN";

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";

  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    public readonly exchange: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Socket-level error codes raised by Node and undici.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * True for transport failures: `NETWORK_ERROR` exchange errors and raw socket errors.
 */
export const isNetworkError = (error: unknown): boolean => {
  if (error instanceof ExchangeError) {
    return error.code === "NETWORK_ERROR";
  }
  if (error !== null && typeof error === "object" && "code" in error) {
    return typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code);
  }
  return false;
};
