/**
 * Circuit Breaker Module
 *
 * Per-endpoint circuit breakers and the registry that shares them across
 * concurrent workflow executions.
 */

// Types
export {
  CircuitState,
  CircuitTransitionReason,
  CIRCUIT_STATE_NAMES,
  DEFAULT_CIRCUIT_CONFIG,
  MAX_TIMER_DELAY_MS,
  RECENT_FAILURE_CAPACITY,
  RECENT_FAILURE_REPORT_SIZE,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type CircuitCheckResult,
  type CircuitStateChangeEvent,
  type CallOptions,
  type FailureRecord,
  type StateChangeListener,
} from './types';

// Errors
export { CircuitOpenError, CallTimeoutError } from './errors';

// Circuit Breaker
export { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker';

// Registry
export {
  CircuitBreakerRegistry,
  type CircuitBreakerRegistryOptions,
  type CircuitBreakerRegistryStats,
} from './registry';
