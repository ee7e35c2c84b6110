/**
 * Order executor errors.
 */

export class OrderExecutorError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OrderExecutorError";
    this.code = code;
  }
}

/**
 * Request rejected before any venue call.
 */
export class OrderValidationError extends OrderExecutorError {
  constructor(
    message: string,
    public readonly symbol: string,
  ) {
    super(message, "ORDER_VALIDATION");
    this.name = "OrderValidationError";
  }
}

/**
 * Order creation failed. `fatal` marks a business rejection that must not be retried.
 */
export class OrderCreationError extends OrderExecutorError {
  constructor(
    message: string,
    public readonly fatal: boolean,
    cause?: unknown,
  ) {
    super(message, "ORDER_CREATION", cause);
    this.name = "OrderCreationError";
  }
}

/**
 * Consecutive status fetches failed past the retry budget.
 */
export class OrderFetchError extends OrderExecutorError {
  constructor(
    public readonly orderId: string,
    public readonly failures: number,
    cause?: unknown,
  ) {
    super(`Fetching order ${orderId} failed ${failures} times in a row`, "ORDER_FETCH", cause);
    this.name = "OrderFetchError";
  }
}

export class OrderTimeoutError extends OrderExecutorError {
  constructor(
    public readonly symbol: string,
    public readonly timeoutMs: number,
  ) {
    super(`Order for ${symbol} timed out after ${timeoutMs}ms`, "ORDER_TIMEOUT");
    this.name = "OrderTimeoutError";
  }
}

export class StreamingNotSupportedError extends OrderExecutorError {
  constructor(public readonly exchangeId: string) {
    super(`Venue ${exchangeId} does not support order streaming`, "STREAMING_NOT_SUPPORTED");
    this.name = "StreamingNotSupportedError";
  }
}

/**
 * Streaming is disabled for the venue until its session ends; callers should use REST.
 */
export class StreamCircuitOpenError extends OrderExecutorError {
  constructor(
    public readonly exchangeId: string,
    public readonly attempts: number,
  ) {
    super(
      `Stream circuit open for ${exchangeId} after ${attempts} reconnect attempts`,
      "STREAM_CIRCUIT_OPEN",
    );
    this.name = "StreamCircuitOpenError";
  }
}
