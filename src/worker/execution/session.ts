/**
 * Per-venue coordinator for one batch.
 *
 * A session caches margin/leverage setup per symbol, bounds how many orders
 * run against the venue at once, and carries the stream circuit. Nothing
 * survives the batch: the router builds fresh sessions every time.
 */

import PQueue from "p-queue";

import { getStreamingClient } from "@/adapters/types";
import type { Venue } from "@/adapters/types";
import { sleep as defaultSleep } from "@/lib/async/sleep";
import type { Sleep } from "@/lib/async/sleep";
import type { Logger } from "@/lib/logger/logger";
import { createCircuitBreaker } from "@/lib/resilience/circuit-breaker";
import type { CircuitBreaker } from "@/lib/resilience/circuit-breaker";

import type { ExecutorConfig } from "./config";

/** Upper bound on waiting for the first book snapshot during pre-warm. */
export const PREWARM_TIMEOUT_MS = 5_000;

/** Half-open delay for the stream breaker; unused once it latches. */
const STREAM_CIRCUIT_RESET_MS = 30_000;

export interface ExchangeSession {
  readonly venue: Venue;
  /** Latch over the venue's order stream, set by `markCircuitOpen` */
  readonly streamCircuit: CircuitBreaker;
  /** Pre-warm the book subscription for `symbol`. Never throws. */
  initialize: (symbol: string) => Promise<void>;
  /** Set margin mode and leverage for `symbol` once per session. Never throws. */
  ensureMarginInitialized: (symbol: string) => Promise<void>;
  markCircuitOpen: () => void;
  isCircuitOpen: () => boolean;
  /** Run `fn` under the venue's concurrency limit. */
  run: <T>(fn: () => Promise<T>) => Promise<T>;
}

export interface ExchangeSessionOptions {
  venue: Venue;
  config: ExecutorConfig;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * Latch for a venue's order stream. Failures never open it on their own:
 * each order counts its own reconnect attempts and trips it once they run out.
 */
export const createStreamCircuit = (): CircuitBreaker =>
  createCircuitBreaker({
    failureThreshold: Number.POSITIVE_INFINITY,
    resetTimeoutMs: STREAM_CIRCUIT_RESET_MS,
    latchOnBreak: true,
  });

export const createExchangeSession = ({
  venue,
  config,
  logger,
  sleep = defaultSleep,
}: ExchangeSessionOptions): ExchangeSession => {
  const exchangeId = venue.id;
  const marginSetups = new Map<string, Promise<void>>();
  const limiter = new PQueue({ concurrency: config.maxConcurrentOrdersPerExchange });

  const streamCircuit = createStreamCircuit();

  let circuitReported = false;

  const markCircuitOpen = (): void => {
    streamCircuit.trip();
    if (!circuitReported) {
      circuitReported = true;
      logger.warn("Stream circuit open, using REST for the rest of the batch", { exchangeId });
    }
  };

  const initialize = async (symbol: string): Promise<void> => {
    const client = getStreamingClient(venue);
    if (!client) {
      return;
    }

    const controller = new AbortController();
    const warmed = client.watchOrderBook(symbol).then(() => true);
    const expired = sleep(PREWARM_TIMEOUT_MS, controller.signal).then(() => false);

    try {
      if (await Promise.race([warmed, expired])) {
        logger.debug("Order book pre-warmed", { exchangeId, symbol });
      } else {
        logger.warn("Order book pre-warm timed out", {
          exchangeId,
          symbol,
          timeoutMs: PREWARM_TIMEOUT_MS,
        });
      }
    } catch (error) {
      logger.warn("Order book pre-warm failed", {
        exchangeId,
        symbol,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      controller.abort();
    }
  };

  const setUpMargin = async (symbol: string): Promise<void> => {
    const { client } = venue;

    if (client.setMarginMode) {
      try {
        await client.setMarginMode(venue.marginMode, symbol);
      } catch (error) {
        logger.warn("Failed to set margin mode", {
          exchangeId,
          symbol,
          marginMode: venue.marginMode,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (client.setLeverage) {
      try {
        await client.setLeverage(venue.leverage, symbol);
      } catch (error) {
        logger.warn("Failed to set leverage", {
          exchangeId,
          symbol,
          leverage: venue.leverage,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };

  const ensureMarginInitialized = (symbol: string): Promise<void> => {
    const existing = marginSetups.get(symbol);
    if (existing) {
      return existing;
    }
    const setup = setUpMargin(symbol);
    marginSetups.set(symbol, setup);
    return setup;
  };

  return {
    venue,
    streamCircuit,
    initialize,
    ensureMarginInitialized,
    markCircuitOpen,
    isCircuitOpen: streamCircuit.isOpen,
    run: <T>(fn: () => Promise<T>): Promise<T> => limiter.add<T>(fn, { throwOnTimeout: true }),
  };
};
