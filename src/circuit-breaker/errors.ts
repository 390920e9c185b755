import { AgentCoordinatorError, ErrorCode } from '../errors';
import { CircuitState } from './types';

/**
 * Raised when a breaker rejects a call without invoking the endpoint.
 */
export class CircuitOpenError extends AgentCoordinatorError {
  readonly breakerName: string;
  readonly state: CircuitState;
  /** When the breaker will admit a probe (ISO 8601), if known */
  readonly resetAt?: string;

  constructor(breakerName: string, state: CircuitState, resetAt?: string) {
    super(
      ErrorCode.CIRCUIT_OPEN,
      state === CircuitState.HALF_OPEN
        ? `Circuit breaker '${breakerName}' is HALF_OPEN and at its probe limit`
        : `Circuit breaker '${breakerName}' is OPEN`
    );
    this.name = 'CircuitOpenError';
    this.breakerName = breakerName;
    this.state = state;
    this.resetAt = resetAt;
  }
}

/**
 * Raised when a guarded call exceeds its timeout.
 */
export class CallTimeoutError extends AgentCoordinatorError {
  readonly breakerName: string;
  readonly timeoutMs: number;

  constructor(breakerName: string, timeoutMs: number) {
    super(ErrorCode.CALL_TIMEOUT, `Call through '${breakerName}' exceeded timeout of ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
    this.breakerName = breakerName;
    this.timeoutMs = timeoutMs;
  }
}
