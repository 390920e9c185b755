/**
 * Agent Types
 *
 * Descriptors for registered agents and the shapes exchanged with the
 * external invoker.
 */

import type { CircuitBreakerConfig } from '../circuit-breaker';
import type { AgentCapability } from './capabilities';

/**
 * A registered agent endpoint
 */
export interface AgentDescriptor {
  /** Unique agent identifier */
  id: string;
  /** Display name */
  name: string;
  description?: string;
  /** Capabilities this agent handles */
  capabilities: ReadonlySet<AgentCapability>;
  /** Opaque endpoint handle passed to the invoker */
  endpoint: string;
  /** Lower is preferred */
  priority: number;
  enabled: boolean;
  /** Per-agent call timeout (ms) */
  timeoutMs?: number;
  /** Circuit breaker settings for this agent's endpoint */
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Input accepted by AgentRegistry.register
 */
export interface AgentDescriptorInput extends Omit<AgentDescriptor, 'capabilities' | 'enabled' | 'priority'> {
  capabilities: Iterable<AgentCapability>;
  priority?: number;
  /** Defaults to true */
  enabled?: boolean;
}

/**
 * Serializable form of a descriptor
 */
export interface AgentDescriptorData {
  id: string;
  name: string;
  description?: string;
  capabilities: AgentCapability[];
  endpoint: string;
  priority: number;
  enabled: boolean;
  timeoutMs?: number;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  metadata?: Record<string, unknown>;
}

/**
 * Read-only registry snapshot for observability
 */
export interface AgentRegistryStats {
  /** All registered agents */
  total: number;
  /** Enabled agents */
  enabled: number;
  /** Enabled agents per capability */
  byCapability: Partial<Record<AgentCapability, number>>;
}

/**
 * Default priority for descriptors registered without one
 */
export const DEFAULT_AGENT_PRIORITY = 100;
