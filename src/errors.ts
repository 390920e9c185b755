/**
 * Error Codes
 *
 * Every error raised by the coordinator core carries a stable code so callers
 * and dashboards can branch without matching on messages.
 */

export enum ErrorCode {
  /** Timeout or connection failure reported by the invoker */
  TRANSIENT_AGENT_ERROR = 'TRANSIENT_AGENT_ERROR',
  /** Request rejected by the endpoint */
  PERMANENT_AGENT_ERROR = 'PERMANENT_AGENT_ERROR',
  /** Breaker rejected the call without invoking the endpoint */
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  /** Call exceeded its timeout */
  CALL_TIMEOUT = 'CALL_TIMEOUT',
  /** No enabled agent matches the request */
  NO_AGENT_AVAILABLE = 'NO_AGENT_AVAILABLE',
  /** Administrative call named an unregistered agent */
  AGENT_NOT_FOUND = 'AGENT_NOT_FOUND',
  /** Task set cannot be executed as given */
  WORKFLOW_INVALID = 'WORKFLOW_INVALID',
  /** Configuration could not be loaded or failed validation */
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Base class for all coordinator errors.
 */
export class AgentCoordinatorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentCoordinatorError';
    this.code = code;
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
