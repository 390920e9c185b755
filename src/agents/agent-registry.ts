/**
 * Agent Registry
 *
 * Central registry for agent discovery and routing.
 * Resolves which agent handles a capability or intent, preferring lower
 * priority values and, on ties, earlier registrations.
 *
 * Every operation is synchronous, so readers never observe a half-applied
 * registration or enable/disable call.
 */

import { createChildLogger, type Logger } from '../logging';
import { AgentCapability, capabilityForIntent } from './capabilities';
import { AgentNotFoundError, NoAgentAvailableError } from './errors';
import {
  DEFAULT_AGENT_PRIORITY,
  type AgentDescriptor,
  type AgentDescriptorData,
  type AgentDescriptorInput,
  type AgentRegistryStats,
} from './types';

/**
 * Configuration options for AgentRegistry
 */
export interface AgentRegistryOptions {
  /** Agent that receives intents missing from the intent table */
  defaultAgentId?: string;
  logger?: Logger;
}

interface RegistryEntry {
  descriptor: AgentDescriptor;
  /** Registration order, kept when a descriptor is replaced */
  sequence: number;
}

/**
 * Frozen copy of the input. `capabilities` and `metadata` are copied so the
 * caller keeps no handle on them; the Set itself is read-only only to the
 * compiler, through `ReadonlySet`.
 */
function freezeDescriptor(input: AgentDescriptorInput): AgentDescriptor {
  return Object.freeze({
    ...input,
    capabilities: new Set(input.capabilities),
    metadata: input.metadata ? Object.freeze({ ...input.metadata }) : undefined,
    priority: input.priority ?? DEFAULT_AGENT_PRIORITY,
    enabled: input.enabled ?? true,
  });
}

function byPreference(a: RegistryEntry, b: RegistryEntry): number {
  return a.descriptor.priority - b.descriptor.priority || a.sequence - b.sequence;
}

export class AgentRegistry {
  private entries: Map<string, RegistryEntry>;
  private nextSequence: number;
  private defaultAgentId?: string;
  private log: Logger;

  constructor(options: AgentRegistryOptions = {}) {
    this.entries = new Map();
    this.nextSequence = 0;
    this.defaultAgentId = options.defaultAgentId;
    this.log = options.logger ?? createChildLogger({ component: 'AgentRegistry' });
  }

  /**
   * Insert or replace a descriptor by id
   */
  register(input: AgentDescriptorInput): AgentDescriptor {
    const descriptor = freezeDescriptor(input);
    const existing = this.entries.get(descriptor.id);

    this.entries.set(descriptor.id, {
      descriptor,
      sequence: existing?.sequence ?? this.nextSequence++,
    });

    this.log.info(
      { agentId: descriptor.id, replaced: existing !== undefined, priority: descriptor.priority },
      `Registered agent: ${descriptor.name}`
    );
    return descriptor;
  }

  get(agentId: string): AgentDescriptor | undefined {
    return this.entries.get(agentId)?.descriptor;
  }

  has(agentId: string): boolean {
    return this.entries.has(agentId);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * List agents by preference
   */
  list(options: { enabledOnly?: boolean } = {}): AgentDescriptor[] {
    return this.sortedEntries()
      .filter(entry => !options.enabledOnly || entry.descriptor.enabled)
      .map(entry => entry.descriptor);
  }

  enable(agentId: string): AgentDescriptor {
    return this.setEnabled(agentId, true);
  }

  disable(agentId: string): AgentDescriptor {
    return this.setEnabled(agentId, false);
  }

  /**
   * Enabled agents carrying a capability, most preferred first
   */
  findByCapability(capability: AgentCapability): AgentDescriptor[] {
    return this.sortedEntries()
      .filter(entry => entry.descriptor.enabled && entry.descriptor.capabilities.has(capability))
      .map(entry => entry.descriptor);
  }

  capabilityForIntent(intent: string): AgentCapability | undefined {
    return capabilityForIntent(intent);
  }

  /**
   * Route a free-form intent to the preferred enabled agent
   *
   * @throws NoAgentAvailableError when nothing enabled can serve it
   */
  route(intent: string): AgentDescriptor {
    const capability = capabilityForIntent(intent);

    if (!capability) {
      const fallback = this.defaultAgentId ? this.get(this.defaultAgentId) : undefined;
      if (fallback?.enabled) {
        this.log.debug({ intent, agentId: fallback.id }, 'Unknown intent routed to default agent');
        return fallback;
      }
      throw new NoAgentAvailableError(`No capability mapped for intent: ${intent}`, { intent });
    }

    const [preferred] = this.findByCapability(capability);
    if (!preferred) {
      this.log.warn({ intent, capability }, 'No agent found for capability');
      throw new NoAgentAvailableError(`No agent available for capability: ${capability}`, {
        capability,
        intent,
      });
    }
    return preferred;
  }

  /**
   * Read-only snapshot for observability
   */
  stats(): AgentRegistryStats {
    const byCapability: Partial<Record<AgentCapability, number>> = {};
    let enabled = 0;

    for (const { descriptor } of this.entries.values()) {
      if (!descriptor.enabled) {
        continue;
      }
      enabled++;
      for (const capability of descriptor.capabilities) {
        byCapability[capability] = (byCapability[capability] ?? 0) + 1;
      }
    }

    return { total: this.entries.size, enabled, byCapability };
  }

  /**
   * Export all descriptors, most preferred first
   */
  toJSON(): AgentDescriptorData[] {
    return this.list().map(descriptor => ({
      ...descriptor,
      capabilities: Array.from(descriptor.capabilities),
      circuitBreaker: descriptor.circuitBreaker ? { ...descriptor.circuitBreaker } : undefined,
      metadata: descriptor.metadata ? { ...descriptor.metadata } : undefined,
    }));
  }

  // === Private Methods ===

  private setEnabled(agentId: string, enabled: boolean): AgentDescriptor {
    const entry = this.entries.get(agentId);
    if (!entry) {
      throw new AgentNotFoundError(agentId);
    }

    const descriptor: AgentDescriptor = Object.freeze({ ...entry.descriptor, enabled });
    this.entries.set(agentId, { descriptor, sequence: entry.sequence });
    this.log.info({ agentId, enabled }, enabled ? 'Agent enabled' : 'Agent disabled');
    return descriptor;
  }

  private sortedEntries(): RegistryEntry[] {
    return Array.from(this.entries.values()).sort(byPreference);
  }
}
