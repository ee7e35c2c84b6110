/**
 * Circuit breaker wrapper around cockatiel.
 *
 * - CLOSED: calls pass through
 * - OPEN: after `failureThreshold` consecutive failures, calls fail fast
 * - HALF_OPEN: after `resetTimeoutMs`, one trial call is let through
 *
 * With `latchOnBreak`, the first break (or an explicit `trip()`) keeps the
 * circuit open for the breaker's lifetime.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
  handleWhen,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening; `Infinity` never opens on its own */
  failureThreshold: number;
  /** Time in ms before attempting HALF_OPEN from OPEN */
  resetTimeoutMs: number;
  /** Which errors count as failures; others pass through uncounted */
  isFailure?: (error: Error) => boolean;
  /** Stay open once broken instead of half-opening after the reset timeout */
  latchOnBreak?: boolean;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  /** Force the circuit open for the rest of the breaker's lifetime */
  trip: () => void;
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

export class CircuitOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Closed:
      return "CLOSED";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
  }
};

export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs, isFailure, latchOnBreak = false } = config;

  const breaker = circuitBreaker(isFailure ? handleWhen(isFailure) : handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  let latched = false;
  const listeners = new Set<(state: CircuitBreakerState) => void>();

  const notify = (state: CircuitBreakerState): void => {
    for (const listener of listeners) {
      listener(state);
    }
  };

  breaker.onStateChange((state) => {
    if (!latched) {
      notify(mapCircuitState(state));
    }
  });

  if (latchOnBreak) {
    breaker.onBreak(() => {
      latched = true;
    });
  }

  const trip = (): void => {
    if (latched) {
      return;
    }
    latched = true;
    breaker.isolate();
    notify("OPEN");
  };

  const isOpen = (): boolean =>
    latched || breaker.state === CircuitState.Open || breaker.state === CircuitState.Isolated;

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    if (latched) {
      throw new CircuitOpenError("Circuit breaker is latched open");
    }
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => (latched ? "OPEN" : mapCircuitState(breaker.state)),
    isOpen,
    trip,
    onStateChange: (callback) => {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    },
  };
};
