/**
 * Orchestration factory
 *
 * Wires the agent registry, circuit breakers and coordinator from a loaded
 * configuration.
 */

import { AgentRegistry, type AgentInvoker, type FallbackProvider } from './agents';
import { CircuitBreakerRegistry, type CircuitBreakerOptions } from './circuit-breaker';
import type { OrchestrationConfig } from './config';
import { Coordinator, type AgentResolver } from './coordinator';
import { createLogger, type Logger } from './logging';

export interface OrchestrationOptions {
  invoker: AgentInvoker;
  fallback?: FallbackProvider;
  resolveAgent?: AgentResolver;
  /** Which errors count against a circuit; every error by default */
  isFailure?: CircuitBreakerOptions['isFailure'];
  /** Defaults to a root logger at the configured level */
  logger?: Logger;
}

export interface Orchestration {
  config: OrchestrationConfig;
  registry: AgentRegistry;
  breakers: CircuitBreakerRegistry;
  coordinator: Coordinator;
  logger: Logger;
}

export function createOrchestration(config: OrchestrationConfig, options: OrchestrationOptions): Orchestration {
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const registry = new AgentRegistry({
    defaultAgentId: config.defaultAgentId,
    logger: logger.child({ component: 'AgentRegistry' }),
  });
  for (const agent of config.agents) {
    registry.register(agent);
  }

  const breakers = new CircuitBreakerRegistry({
    defaultConfig: config.circuitBreaker,
    isFailure: options.isFailure,
    logger: logger.child({ component: 'CircuitBreakerRegistry' }),
  });

  const coordinator = new Coordinator({
    registry,
    breakers,
    invoker: options.invoker,
    fallback: options.fallback,
    resolveAgent: options.resolveAgent,
    defaultStrategy: config.coordinator.defaultStrategy,
    deadlineMs: config.coordinator.deadlineMs,
    historySize: config.coordinator.historySize,
    logger: logger.child({ component: 'Coordinator' }),
  });

  logger.info({ agents: registry.size, enabled: registry.stats().enabled }, 'Orchestration ready');
  return { config, registry, breakers, coordinator, logger };
}
