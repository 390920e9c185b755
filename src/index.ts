/**
 * Agent Coordinator
 *
 * Coordinates calls to independent, unreliable agent endpoints: an agent
 * registry for capability routing, a dependency-aware task coordinator and
 * per-endpoint circuit breakers.
 */

export * from './errors';
export * from './logging';
export * from './agents';
export * from './circuit-breaker';
export * from './coordinator';
export * from './config';
export { createOrchestration, type Orchestration, type OrchestrationOptions } from './orchestration';
