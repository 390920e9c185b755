/**
 * Circuit Breaker Types
 *
 * Defines circuit states, transitions, configuration and status tracking
 * for the per-endpoint breakers that guard agent invocations.
 */

/**
 * Circuit breaker states following standard state machine pattern.
 *
 * State machine:
 * - CLOSED (normal) → failureThreshold consecutive failures → OPEN
 * - OPEN (blocked) → recoveryTimeoutMs elapsed → HALF_OPEN
 * - HALF_OPEN (testing) → successThreshold successes → CLOSED, any failure → OPEN
 */
export enum CircuitState {
  /** Normal operation, requests allowed */
  CLOSED = 'closed',
  /** Circuit tripped, all requests blocked */
  OPEN = 'open',
  /** Testing recovery, limited probes allowed */
  HALF_OPEN = 'half_open',
}

/**
 * Human-readable names for circuit states
 */
export const CIRCUIT_STATE_NAMES: Record<CircuitState, string> = {
  [CircuitState.CLOSED]: 'CLOSED',
  [CircuitState.OPEN]: 'OPEN',
  [CircuitState.HALF_OPEN]: 'HALF_OPEN',
};

/**
 * Configuration for circuit breaker behavior
 */
export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Time before OPEN → HALF_OPEN transition (ms) */
  recoveryTimeoutMs: number;
  /** Consecutive HALF_OPEN successes needed to close */
  successThreshold: number;
  /** Default per-call timeout (ms); 0 disables it */
  requestTimeoutMs: number;
  /** Concurrent probes admitted while HALF_OPEN */
  halfOpenMaxCalls: number;
}

/**
 * Longest delay setTimeout honours. Larger values fire after 1ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Default circuit breaker configuration
 */
export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60 * 1000,
  successThreshold: 2,
  requestTimeoutMs: 30 * 1000,
  halfOpenMaxCalls: 2,
};

/**
 * How many failures are kept for monitoring
 */
export const RECENT_FAILURE_CAPACITY = 100;

/**
 * How many failures a status snapshot exposes
 */
export const RECENT_FAILURE_REPORT_SIZE = 10;

/**
 * Failure record for tracking
 */
export interface FailureRecord {
  /** When the failure occurred (ISO 8601) */
  timestamp: string;
  /** Error class name */
  type: string;
  /** Error message */
  message: string;
}

/**
 * Serializable circuit breaker status
 */
export interface CircuitBreakerStatus {
  /** Endpoint this circuit breaker guards */
  name: string;
  /** Current circuit state */
  state: CircuitState;
  /** Human-readable state name */
  stateName: string;
  /** Consecutive failure count */
  failureCount: number;
  /** Consecutive success count while HALF_OPEN */
  successCount: number;
  /** Probes currently in flight while HALF_OPEN */
  halfOpenInFlight: number;
  totalRequests: number;
  totalSuccesses: number;
  totalFailures: number;
  totalTimeouts: number;
  totalRejections: number;
  totalFallbacks: number;
  /** Successes over admitted-or-rejected requests, 0 when idle */
  successRate: number;
  /** When the circuit last opened (ISO 8601) or null */
  openedAt: string | null;
  /** When the last failure was recorded (ISO 8601) or null */
  lastFailureAt: string | null;
  /** When the circuit will allow a probe (ISO 8601) or null */
  resetAt: string | null;
  /** Most recent failures, oldest first */
  recentFailures: FailureRecord[];
  /** Configuration for this circuit breaker */
  config: CircuitBreakerConfig;
}

/**
 * Event emitted when circuit state changes
 */
export interface CircuitStateChangeEvent {
  /** Breaker name */
  name: string;
  /** Previous state */
  fromState: CircuitState;
  /** New state */
  toState: CircuitState;
  /** Reason for the transition */
  reason: CircuitTransitionReason;
  /** Extra detail, such as the failure message that tripped it */
  details?: string;
  /** When the transition occurred (ISO 8601) */
  timestamp: string;
}

/**
 * Reasons for circuit state transitions
 */
export enum CircuitTransitionReason {
  /** Consecutive failure threshold reached */
  CONSECUTIVE_FAILURES = 'consecutive_failures',
  /** Manual trip by operator */
  MANUAL_TRIP = 'manual_trip',
  /** Recovery timeout expired (OPEN → HALF_OPEN) */
  TIMEOUT_EXPIRED = 'timeout_expired',
  /** Enough successes in HALF_OPEN state */
  HALF_OPEN_SUCCESS = 'half_open_success',
  /** Failure in HALF_OPEN state */
  HALF_OPEN_FAILURE = 'half_open_failure',
  /** Manual reset by operator */
  MANUAL_RESET = 'manual_reset',
}

/**
 * Result of attempting to proceed through a circuit
 */
export interface CircuitCheckResult {
  /** Whether the request can proceed */
  allowed: boolean;
  /** Current circuit state */
  state: CircuitState;
  /** Reason if not allowed */
  reason?: string;
  /** When the circuit will allow a probe (ISO 8601) if OPEN */
  resetAt?: string;
}

/**
 * Per-call options for CircuitBreaker.call
 */
export interface CallOptions<T> {
  /** Overrides config.requestTimeoutMs; 0 disables the timeout */
  timeoutMs?: number;
  /** Served instead of a CircuitOpenError when the call is rejected */
  fallback?: () => T | Promise<T>;
}

export type StateChangeListener = (event: CircuitStateChangeEvent) => void;
