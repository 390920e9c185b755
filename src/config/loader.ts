/**
 * Configuration Loader
 *
 * Load orchestration settings from a YAML file or from environment
 * variables.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'js-yaml';
import { AgentCapability } from '../agents';
import { parseLogLevel } from '../logging';
import { ConfigError } from './errors';
import { orchestrationConfigSchema, type AgentConfig, type OrchestrationConfig } from './schema';

/**
 * Expand ~ to home directory
 */
export function expandPath(filepath: string): string {
  if (filepath === '~' || filepath.startsWith('~/')) {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

/**
 * Validate raw config data and apply defaults
 *
 * @param source - Where the data came from, used in error messages
 * @throws ConfigError listing every invalid path
 */
export function parseConfig(raw: unknown, source = 'config'): OrchestrationConfig {
  const result = orchestrationConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

/**
 * Load and validate a YAML config file
 */
export function loadConfig(filepath: string): OrchestrationConfig {
  const expanded = expandPath(filepath);

  if (!fs.existsSync(expanded)) {
    throw new ConfigError(`Config not found: ${expanded}`);
  }

  const content = fs.readFileSync(expanded, 'utf-8');
  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: expanded });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new ConfigError(`Invalid YAML in ${expanded}: ${reason}`, [], { cause: error });
  }

  return parseConfig(raw, expanded);
}

/**
 * Built-in agents whose endpoints come from the environment
 */
const ENV_AGENTS: ReadonlyArray<Omit<AgentConfig, 'endpoint' | 'enabled'> & { variable: string }> = [
  {
    variable: 'TICKETING_ENDPOINT',
    id: 'ticketing',
    name: 'Messaging & Ticketing Agent',
    description: 'Handles ticket purchases, upgrades, refunds, and inquiries',
    capabilities: [
      AgentCapability.TICKET_PURCHASE,
      AgentCapability.TICKET_UPGRADE,
      AgentCapability.TICKET_REFUND,
      AgentCapability.TICKET_INQUIRY,
    ],
    priority: 1,
  },
  {
    variable: 'SALES_ENDPOINT',
    id: 'sales',
    name: 'Sales Agent',
    description: 'Handles proposals, CRM, pipeline, and lead qualification',
    capabilities: [
      AgentCapability.SALES_PROPOSAL,
      AgentCapability.CRM_MANAGEMENT,
      AgentCapability.PIPELINE_TRACKING,
      AgentCapability.LEAD_QUALIFICATION,
    ],
    priority: 2,
  },
  {
    variable: 'FINANCE_ENDPOINT',
    id: 'finance',
    name: 'Finance & Operations Agent',
    description: 'Handles expenses, budgets, invoices, and financial reporting',
    capabilities: [
      AgentCapability.EXPENSE_APPROVAL,
      AgentCapability.BUDGET_TRACKING,
      AgentCapability.INVOICE_GENERATION,
      AgentCapability.FINANCIAL_REPORTING,
    ],
    priority: 3,
  },
  {
    variable: 'HR_ENDPOINT',
    id: 'hr',
    name: 'HR & Recruiting Agent',
    description: 'Handles recruiting, screening, scheduling, and employee inquiries',
    capabilities: [
      AgentCapability.CANDIDATE_SCREENING,
      AgentCapability.INTERVIEW_SCHEDULING,
      AgentCapability.ONBOARDING,
      AgentCapability.EMPLOYEE_INQUIRY,
    ],
    priority: 4,
  },
];

/**
 * Agents defined by endpoint variables. Ticketing falls back to ENDPOINT_ID,
 * then to 'local'; the others are only defined when their variable is set.
 * An empty value leaves the agent out.
 */
export function loadAgentsFromEnv(env: NodeJS.ProcessEnv = process.env): AgentConfig[] {
  const endpoints: Record<string, string | undefined> = {
    ...env,
    TICKETING_ENDPOINT: env.TICKETING_ENDPOINT ?? env.ENDPOINT_ID ?? 'local',
  };

  return ENV_AGENTS.flatMap(({ variable, ...agent }) => {
    const endpoint = endpoints[variable];
    return endpoint ? [{ ...agent, endpoint, enabled: true }] : [];
  });
}

/**
 * Config built from environment variables alone. Unknown intents go to
 * the ticketing agent when it is defined.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OrchestrationConfig {
  const agents = loadAgentsFromEnv(env);

  return parseConfig(
    {
      logLevel: parseLogLevel(env.LOG_LEVEL),
      agents,
      defaultAgentId: agents.some(agent => agent.id === 'ticketing') ? 'ticketing' : undefined,
    },
    'environment configuration'
  );
}

/**
 * AGENT_CONFIG_PATH when set, the environment otherwise
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): OrchestrationConfig {
  return env.AGENT_CONFIG_PATH ? loadConfig(env.AGENT_CONFIG_PATH) : loadConfigFromEnv(env);
}
