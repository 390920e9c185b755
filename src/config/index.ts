/**
 * Config Module
 *
 * Schema-validated orchestration settings from YAML or the environment.
 */

export {
  orchestrationConfigSchema,
  agentConfigSchema,
  circuitBreakerConfigSchema,
  coordinatorConfigSchema,
  type AgentConfig,
  type CircuitBreakerSettings,
  type CoordinatorConfig,
  type OrchestrationConfig,
  type OrchestrationConfigInput,
} from './schema';

export { ConfigError, type ConfigIssue } from './errors';

export {
  expandPath,
  parseConfig,
  loadConfig,
  loadAgentsFromEnv,
  loadConfigFromEnv,
  resolveConfig,
} from './loader';
