import { AgentCoordinatorError, ErrorCode } from '../errors';
import type { AgentCapability } from './capabilities';

/**
 * Timeout or connection failure reported by an invoker.
 */
export class TransientAgentError extends AgentCoordinatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.TRANSIENT_AGENT_ERROR, message, options);
    this.name = 'TransientAgentError';
  }
}

/**
 * Request rejected by the endpoint (invalid input, refused action).
 */
export class PermanentAgentError extends AgentCoordinatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.PERMANENT_AGENT_ERROR, message, options);
    this.name = 'PermanentAgentError';
  }
}

/**
 * No enabled agent can serve a capability, intent or id.
 */
export class NoAgentAvailableError extends AgentCoordinatorError {
  readonly capability?: AgentCapability;
  readonly intent?: string;

  constructor(message: string, details: { capability?: AgentCapability; intent?: string } = {}) {
    super(ErrorCode.NO_AGENT_AVAILABLE, message);
    this.name = 'NoAgentAvailableError';
    this.capability = details.capability;
    this.intent = details.intent;
  }
}

/**
 * Administrative call named an agent that was never registered.
 */
export class AgentNotFoundError extends AgentCoordinatorError {
  readonly agentId: string;

  constructor(agentId: string) {
    super(ErrorCode.AGENT_NOT_FOUND, `Agent not found: ${agentId}`);
    this.name = 'AgentNotFoundError';
    this.agentId = agentId;
  }
}
