/**
 * Agent Resolvers
 *
 * Strategies for picking the agent that serves a task.
 */

import { NoAgentAvailableError, type AgentDescriptor, type AgentRegistry } from '../agents';
import type { AgentResolver, AgentTask } from './types';

/**
 * capability -> most preferred enabled agent, else intent -> route,
 * else the named agent, which must be registered and enabled.
 */
export const defaultAgentResolver: AgentResolver = (task: AgentTask, registry: AgentRegistry): AgentDescriptor => {
  if (task.capability) {
    const [preferred] = registry.findByCapability(task.capability);
    if (!preferred) {
      throw new NoAgentAvailableError(`No agent available for capability: ${task.capability}`, {
        capability: task.capability,
      });
    }
    return preferred;
  }

  if (task.intent) {
    return registry.route(task.intent);
  }

  return requireEnabledAgent(task, registry);
};

/**
 * Always the named agent. Ignores capability and intent.
 */
export const directAgentResolver: AgentResolver = (task: AgentTask, registry: AgentRegistry): AgentDescriptor =>
  requireEnabledAgent(task, registry);

function requireEnabledAgent(task: AgentTask, registry: AgentRegistry): AgentDescriptor {
  const agent = registry.get(task.agentId);
  if (!agent) {
    throw new NoAgentAvailableError(`Agent not registered: ${task.agentId}`);
  }
  if (!agent.enabled) {
    throw new NoAgentAvailableError(`Agent disabled: ${task.agentId}`);
  }
  return agent;
}
