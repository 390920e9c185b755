/**
 * Circuit Breaker
 *
 * Per-endpoint circuit breaker guarding agent invocations.
 * Tracks failures and manages state transitions so an unhealthy endpoint
 * fails fast instead of stalling every workflow that targets it.
 *
 * State mutations happen only in the synchronous sections between awaits,
 * so concurrent callers sharing a breaker never observe a half-applied
 * transition.
 */

import { toError } from '../errors';
import { createChildLogger, type Logger } from '../logging';
import { CallTimeoutError, CircuitOpenError } from './errors';
import {
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type CircuitCheckResult,
  CircuitTransitionReason,
  type CircuitStateChangeEvent,
  type CallOptions,
  type FailureRecord,
  type StateChangeListener,
  DEFAULT_CIRCUIT_CONFIG,
  MAX_TIMER_DELAY_MS,
  CIRCUIT_STATE_NAMES,
  RECENT_FAILURE_CAPACITY,
  RECENT_FAILURE_REPORT_SIZE,
} from './types';

function assertTimeout(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`${field} must be between 0 and ${MAX_TIMER_DELAY_MS}ms, got ${value}`);
  }
}

/**
 * Construction options for a CircuitBreaker
 */
export interface CircuitBreakerOptions {
  config?: Partial<CircuitBreakerConfig>;
  /**
   * Decides whether an error counts toward the thresholds. Errors it rejects
   * propagate without touching the breaker state. Defaults to counting every
   * error, transient or permanent alike.
   */
  isFailure?: (error: Error) => boolean;
  logger?: Logger;
}

/**
 * Circuit breaker for a single endpoint
 *
 * - CLOSED: Normal operation, requests allowed
 * - OPEN: Circuit tripped, requests rejected without invoking the endpoint
 * - HALF_OPEN: Testing recovery, up to halfOpenMaxCalls concurrent probes
 */
export class CircuitBreaker {
  readonly name: string;
  private _state: CircuitState;
  private _failureCount: number;
  private _successCount: number;
  private _halfOpenInFlight: number;
  /** Bumped on every transition so stale probes can be recognised */
  private _epoch: number;
  private _openedAt: Date | null;
  private _lastFailureAt: Date | null;
  private _totalRequests: number;
  private _totalSuccesses: number;
  private _totalFailures: number;
  private _totalTimeouts: number;
  private _totalRejections: number;
  private _totalFallbacks: number;
  private _recentFailures: FailureRecord[];
  private _config: CircuitBreakerConfig;
  private _isFailure: (error: Error) => boolean;
  private _log: Logger;
  private _stateChangeListeners: StateChangeListener[];

  constructor(name: string, options: CircuitBreakerOptions = {}) {
    this.name = name;
    this._state = CircuitState.CLOSED;
    this._failureCount = 0;
    this._successCount = 0;
    this._halfOpenInFlight = 0;
    this._epoch = 0;
    this._openedAt = null;
    this._lastFailureAt = null;
    this._totalRequests = 0;
    this._totalSuccesses = 0;
    this._totalFailures = 0;
    this._totalTimeouts = 0;
    this._totalRejections = 0;
    this._totalFallbacks = 0;
    this._recentFailures = [];
    this._config = { ...DEFAULT_CIRCUIT_CONFIG, ...options.config };
    assertTimeout(this._config.requestTimeoutMs, 'requestTimeoutMs');
    this._isFailure = options.isFailure ?? (() => true);
    this._log = options.logger ?? createChildLogger({ component: 'CircuitBreaker', breaker: name });
    this._stateChangeListeners = [];

    this._log.debug({ config: this._config }, 'Circuit breaker initialized');
  }

  /**
   * Current circuit state
   */
  get state(): CircuitState {
    // OPEN → HALF_OPEN happens lazily, on the first read after the timeout
    this.checkAutoTransition();
    return this._state;
  }

  get isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  get isClosed(): boolean {
    return this.state === CircuitState.CLOSED;
  }

  get isHalfOpen(): boolean {
    return this.state === CircuitState.HALF_OPEN;
  }

  /**
   * Consecutive failure count
   */
  get failureCount(): number {
    return this._failureCount;
  }

  /**
   * Consecutive success count while HALF_OPEN
   */
  get successCount(): number {
    return this._successCount;
  }

  get totalFailures(): number {
    return this._totalFailures;
  }

  get totalSuccesses(): number {
    return this._totalSuccesses;
  }

  get totalRejections(): number {
    return this._totalRejections;
  }

  get config(): CircuitBreakerConfig {
    return { ...this._config };
  }

  /**
   * Check if a request can proceed through this circuit
   */
  canProceed(): CircuitCheckResult {
    const currentState = this.state;

    switch (currentState) {
      case CircuitState.CLOSED:
        return { allowed: true, state: currentState };

      case CircuitState.OPEN:
        return {
          allowed: false,
          state: currentState,
          reason: `Circuit '${this.name}' is OPEN`,
          resetAt: this.getResetTime()?.toISOString(),
        };

      case CircuitState.HALF_OPEN:
        if (this._halfOpenInFlight < this._config.halfOpenMaxCalls) {
          return { allowed: true, state: currentState };
        }
        return {
          allowed: false,
          state: currentState,
          reason: `Circuit '${this.name}' is HALF_OPEN with ${this._halfOpenInFlight} probes in flight`,
        };
    }
  }

  /**
   * Execute fn under breaker protection.
   *
   * @throws CircuitOpenError when rejected and no fallback is given
   * @throws CallTimeoutError when fn does not settle within the timeout
   * @throws RangeError when `options.timeoutMs` is negative or above MAX_TIMER_DELAY_MS
   */
  async call<T>(fn: () => Promise<T>, options: CallOptions<T> = {}): Promise<T> {
    if (options.timeoutMs !== undefined) {
      assertTimeout(options.timeoutMs, 'timeoutMs');
    }
    this._totalRequests++;

    const check = this.canProceed();
    if (!check.allowed) {
      this._totalRejections++;
      if (options.fallback) {
        this._totalFallbacks++;
        this._log.warn({ state: check.state }, 'Request rejected, serving fallback');
        return options.fallback();
      }
      this._log.warn({ state: check.state }, 'Request rejected - circuit open');
      throw new CircuitOpenError(this.name, check.state, check.resetAt);
    }

    const probe = check.state === CircuitState.HALF_OPEN;
    const epoch = this._epoch;
    if (probe) {
      this._halfOpenInFlight++;
    }

    const timeoutMs = options.timeoutMs ?? this._config.requestTimeoutMs;
    let result: T;
    try {
      result = await this.invokeWithTimeout(fn, timeoutMs);
    } catch (caught) {
      const error = toError(caught);
      const current = this.settle(probe, epoch);
      if (error instanceof CallTimeoutError) {
        this._totalTimeouts++;
        this._log.warn({ timeoutMs }, 'Request timeout');
      }
      if (error instanceof CallTimeoutError || this._isFailure(error)) {
        if (current) {
          this.recordFailure(error);
        } else {
          this.countFailure(error);
        }
      }
      throw error;
    }

    if (this.settle(probe, epoch)) {
      this.recordSuccess();
    } else {
      this._totalSuccesses++;
    }
    return result;
  }

  /**
   * Record a successful operation
   */
  recordSuccess(): void {
    this._totalSuccesses++;

    switch (this.state) {
      case CircuitState.CLOSED:
        this._failureCount = 0;
        break;
      case CircuitState.HALF_OPEN:
        this._successCount++;
        if (this._successCount >= this._config.successThreshold) {
          this.transitionTo(CircuitState.CLOSED, CircuitTransitionReason.HALF_OPEN_SUCCESS);
        }
        break;
      case CircuitState.OPEN:
        break;
    }
  }

  /**
   * Record a failed operation
   */
  recordFailure(error: Error): void {
    this.countFailure(error);

    switch (this.state) {
      case CircuitState.CLOSED:
        this._failureCount++;
        this._log.warn(
          { failureCount: this._failureCount, err: error },
          'Circuit breaker failure recorded'
        );
        if (this._failureCount >= this._config.failureThreshold) {
          this.tripCircuit(CircuitTransitionReason.CONSECUTIVE_FAILURES, error.message);
        }
        break;
      case CircuitState.HALF_OPEN:
        this.tripCircuit(CircuitTransitionReason.HALF_OPEN_FAILURE, error.message);
        break;
      case CircuitState.OPEN:
        break;
    }
  }

  /**
   * Manually trip the circuit
   */
  trip(reason: string): void {
    this.tripCircuit(CircuitTransitionReason.MANUAL_TRIP, reason);
  }

  /**
   * Manually reset the circuit to CLOSED
   */
  reset(requestedBy?: string): void {
    if (this._state !== CircuitState.CLOSED) {
      this.transitionTo(
        CircuitState.CLOSED,
        CircuitTransitionReason.MANUAL_RESET,
        requestedBy ? `Reset requested by ${requestedBy}` : undefined
      );
    }
  }

  /**
   * Add a listener for state changes
   */
  onStateChange(listener: StateChangeListener): () => void {
    this._stateChangeListeners.push(listener);
    return () => {
      const index = this._stateChangeListeners.indexOf(listener);
      if (index !== -1) {
        this._stateChangeListeners.splice(index, 1);
      }
    };
  }

  /**
   * Read-only snapshot for monitoring
   */
  status(): CircuitBreakerStatus {
    const state = this.state;
    const decided = this._totalSuccesses + this._totalFailures + this._totalRejections;
    return {
      name: this.name,
      state,
      stateName: CIRCUIT_STATE_NAMES[state],
      failureCount: this._failureCount,
      successCount: this._successCount,
      halfOpenInFlight: this._halfOpenInFlight,
      totalRequests: this._totalRequests,
      totalSuccesses: this._totalSuccesses,
      totalFailures: this._totalFailures,
      totalTimeouts: this._totalTimeouts,
      totalRejections: this._totalRejections,
      totalFallbacks: this._totalFallbacks,
      successRate: decided > 0 ? this._totalSuccesses / decided : 0,
      openedAt: this._openedAt?.toISOString() ?? null,
      lastFailureAt: this._lastFailureAt?.toISOString() ?? null,
      resetAt: this.getResetTime()?.toISOString() ?? null,
      recentFailures: this._recentFailures.slice(-RECENT_FAILURE_REPORT_SIZE),
      config: { ...this._config },
    };
  }

  toJSON(): CircuitBreakerStatus {
    return this.status();
  }

  // === Private Methods ===

  private async invokeWithTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return fn();
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new CallTimeoutError(this.name, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([fn(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Close out an admitted call. Returns false when the breaker changed state
   * while the call was in flight; such outcomes only update the totals.
   */
  private settle(probe: boolean, epoch: number): boolean {
    if (epoch !== this._epoch) {
      return false;
    }
    if (probe) {
      this._halfOpenInFlight--;
    }
    return true;
  }

  private countFailure(error: Error): void {
    const now = new Date();
    this._totalFailures++;
    this._lastFailureAt = now;
    this._recentFailures.push({
      timestamp: now.toISOString(),
      type: error.name,
      message: error.message,
    });
    if (this._recentFailures.length > RECENT_FAILURE_CAPACITY) {
      this._recentFailures.shift();
    }
  }

  private checkAutoTransition(): void {
    const resetTime = this.getResetTime();
    if (resetTime && resetTime.getTime() <= Date.now()) {
      this.transitionTo(CircuitState.HALF_OPEN, CircuitTransitionReason.TIMEOUT_EXPIRED);
    }
  }

  private getResetTime(): Date | null {
    if (this._state !== CircuitState.OPEN || !this._openedAt) {
      return null;
    }
    return new Date(this._openedAt.getTime() + this._config.recoveryTimeoutMs);
  }

  private tripCircuit(reason: CircuitTransitionReason, details: string): void {
    if (this._state === CircuitState.OPEN) {
      return;
    }
    this._openedAt = new Date();
    this.transitionTo(CircuitState.OPEN, reason, details);
  }

  private transitionTo(newState: CircuitState, reason: CircuitTransitionReason, details?: string): void {
    const previousState = this._state;
    if (previousState === newState) {
      return;
    }

    this._state = newState;
    this._failureCount = 0;
    this._successCount = 0;
    this._halfOpenInFlight = 0;
    this._epoch++;
    if (newState === CircuitState.CLOSED) {
      this._openedAt = null;
    }

    const event: CircuitStateChangeEvent = {
      name: this.name,
      fromState: previousState,
      toState: newState,
      reason,
      details,
      timestamp: new Date().toISOString(),
    };

    const logFields = { fromState: previousState, toState: newState, reason, totalFailures: this._totalFailures };
    if (newState === CircuitState.OPEN) {
      this._log.warn(logFields, 'Circuit breaker opened');
    } else {
      this._log.info(logFields, 'Circuit breaker state changed');
    }

    for (const listener of this._stateChangeListeners) {
      try {
        listener(event);
      } catch (error) {
        this._log.error({ err: error }, 'State change listener failed');
      }
    }
  }
}
