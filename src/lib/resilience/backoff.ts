/**
 * Exponential backoff schedules for venue retries.
 */

export interface BackoffConfig {
  /** Initial delay before first retry (ms) */
  initialDelayMs: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
  /** Multiplier for exponential growth */
  multiplier: number;
  /** Jitter factor (0-1) */
  jitterFactor: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Streaming reconnects: 100ms, 200ms, 400ms, ... capped at 30s, no jitter.
 */
export const STREAM_RECONNECT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 100,
  maxDelayMs: 30000,
  multiplier: 2,
  jitterFactor: 0,
};

/**
 * Order status fetch retries: 0.5s, 1s, 2s, 4s.
 */
export const FETCH_RETRY_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  jitterFactor: 0,
};

/** Consecutive status fetch failures after which polling gives up. */
export const MAX_FETCH_FAILURES = 4;

/**
 * Calculates backoff delay for a given attempt number.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0, STREAM_RECONNECT_BACKOFF_CONFIG); // 100
 * calculateBackoffMs(3, FETCH_RETRY_BACKOFF_CONFIG); // 4000
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;

  const baseDelayMs = initialDelayMs * multiplier ** attempt;
  const cappedDelayMs = Math.min(baseDelayMs, maxDelayMs);
  const jitter = cappedDelayMs * jitterFactor * Math.random();

  return Math.floor(cappedDelayMs + jitter);
};
