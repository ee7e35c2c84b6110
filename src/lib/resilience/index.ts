export {
  DEFAULT_BACKOFF_CONFIG,
  FETCH_RETRY_BACKOFF_CONFIG,
  MAX_FETCH_FAILURES,
  STREAM_RECONNECT_BACKOFF_CONFIG,
  calculateBackoffMs,
  type BackoffConfig,
} from "./backoff";

export {
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";
