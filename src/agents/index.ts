/**
 * Agents Module
 *
 * Agent descriptors, capability routing and the invoker contracts the
 * coordinator calls through.
 *
 * @example
 * ```typescript
 * const registry = new AgentRegistry();
 * registry.register({
 *   id: 'ticketing',
 *   name: 'Ticketing Agent',
 *   endpoint: 'projects/demo/endpoints/ticketing',
 *   capabilities: [AgentCapability.TICKET_PURCHASE],
 *   priority: 1,
 * });
 *
 * registry.route('buy_tickets').id; // 'ticketing'
 * ```
 */

export {
  AgentCapability,
  ALL_CAPABILITIES,
  INTENT_CAPABILITIES,
  capabilityForIntent,
  isAgentCapability,
} from './capabilities';

export {
  DEFAULT_AGENT_PRIORITY,
  type AgentDescriptor,
  type AgentDescriptorInput,
  type AgentDescriptorData,
  type AgentRegistryStats,
} from './types';

export {
  TransientAgentError,
  PermanentAgentError,
  NoAgentAvailableError,
  AgentNotFoundError,
} from './errors';

export type { AgentInvoker, AgentRequest, FallbackProvider } from './invoker';

export { AgentRegistry, type AgentRegistryOptions } from './agent-registry';
