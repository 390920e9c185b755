/**
 * Invoker contracts
 *
 * The coordinator never talks to an endpoint itself. Whatever performs the
 * network call (an LLM client, an HTTP client) implements AgentInvoker.
 */

import type { AgentDescriptor } from './types';

/**
 * What an agent receives for one task
 */
export interface AgentRequest {
  workflowId: string;
  taskId: string;
  /** The task's own payload */
  input: unknown;
  /** Outputs of the task's succeeded dependencies, keyed by task id */
  context: Readonly<Record<string, unknown>>;
}

/**
 * Performs the actual call to an agent endpoint.
 *
 * Implementations should reject with TransientAgentError for timeouts and
 * connection failures and PermanentAgentError for rejected requests.
 */
export interface AgentInvoker {
  invoke(descriptor: AgentDescriptor, request: AgentRequest): Promise<unknown>;
}

/**
 * Produces an alternate result when an agent's circuit is open.
 */
export interface FallbackProvider {
  fallback(descriptor: AgentDescriptor, request: AgentRequest): unknown | Promise<unknown>;
}
