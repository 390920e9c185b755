/**
 * Configuration schema
 *
 * Validated shape of the orchestration config file. Defaults applied here
 * are the defaults the rest of the system sees.
 */

import { z } from 'zod';
import { AgentCapability, DEFAULT_AGENT_PRIORITY } from '../agents';
import { MAX_TIMER_DELAY_MS } from '../circuit-breaker';
import { CoordinationStrategy, DEFAULT_HISTORY_SIZE } from '../coordinator';

export const circuitBreakerConfigSchema = z
  .object({
    failureThreshold: z.number().int().min(1),
    recoveryTimeoutMs: z.number().int().min(0),
    successThreshold: z.number().int().min(1),
    requestTimeoutMs: z.number().int().min(0).max(MAX_TIMER_DELAY_MS),
    halfOpenMaxCalls: z.number().int().min(1),
  })
  .partial()
  .strict();

export const agentConfigSchema = z
  .object({
    id: z.string().min(1, 'Agent id cannot be empty'),
    name: z.string().min(1, 'Agent name cannot be empty'),
    description: z.string().optional(),
    capabilities: z.array(z.nativeEnum(AgentCapability)).default([]),
    endpoint: z.string().min(1, 'Endpoint cannot be empty'),
    priority: z.number().int().default(DEFAULT_AGENT_PRIORITY),
    enabled: z.boolean().default(true),
    timeoutMs: z.number().int().min(0).max(MAX_TIMER_DELAY_MS).optional(),
    circuitBreaker: circuitBreakerConfigSchema.optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

export const coordinatorConfigSchema = z
  .object({
    defaultStrategy: z.nativeEnum(CoordinationStrategy).default(CoordinationStrategy.SEQUENTIAL),
    /** 0 disables the workflow deadline */
    deadlineMs: z.number().int().min(0).max(MAX_TIMER_DELAY_MS).default(0),
    historySize: z.number().int().min(1).default(DEFAULT_HISTORY_SIZE),
  })
  .strict();

export const orchestrationConfigSchema = z
  .object({
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Receives intents missing from the intent table */
    defaultAgentId: z.string().min(1).optional(),
    agents: z.array(agentConfigSchema).default([]),
    circuitBreaker: circuitBreakerConfigSchema.default({}),
    coordinator: coordinatorConfigSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.agents.forEach((agent, index) => {
      if (seen.has(agent.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['agents', index, 'id'],
          message: `Duplicate agent id: ${agent.id}`,
        });
      }
      seen.add(agent.id);
    });

    if (config.defaultAgentId && !seen.has(config.defaultAgentId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultAgentId'],
        message: `Default agent is not configured: ${config.defaultAgentId}`,
      });
    }
  });

export type CircuitBreakerSettings = z.infer<typeof circuitBreakerConfigSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type CoordinatorConfig = z.infer<typeof coordinatorConfigSchema>;
export type OrchestrationConfig = z.infer<typeof orchestrationConfigSchema>;
/** Config as written, before defaults */
export type OrchestrationConfigInput = z.input<typeof orchestrationConfigSchema>;
