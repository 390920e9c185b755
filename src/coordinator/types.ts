/**
 * Coordinator Types
 *
 * Task sets, per-task results and workflow results.
 */

import type { AgentCapability, AgentDescriptor, AgentRegistry } from '../agents';

/**
 * Execution strategies
 */
export enum CoordinationStrategy {
  /** One task at a time, dependencies first */
  SEQUENTIAL = 'sequential',
  /** Every task starts as soon as its dependencies are terminal */
  PARALLEL = 'parallel',
  /** A router picks the single task to run */
  CONDITIONAL = 'conditional',
}

/**
 * Task lifecycle. Moves forward only:
 * PENDING -> RUNNING -> SUCCEEDED | FAILED | SKIPPED, or PENDING -> SKIPPED.
 */
export enum TaskStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export enum SkipReason {
  /** A dependency failed or was skipped */
  DEPENDENCY_FAILED = 'dependency_failed',
  /** The task's condition returned false */
  CONDITION_NOT_MET = 'condition_not_met',
  /** Conditional routing chose another task */
  NOT_SELECTED = 'not_selected',
  /** The workflow deadline elapsed first */
  WORKFLOW_TIMEOUT = 'workflow_timeout',
}

export enum WorkflowStatus {
  SUCCESS = 'success',
  PARTIAL = 'partial',
  FAILED = 'failed',
}

/**
 * Read-only view of a task at the time a condition is evaluated
 */
export interface TaskSnapshot {
  status: TaskStatus;
  output?: unknown;
}

/**
 * Immutable snapshot of a running workflow handed to conditions
 */
export interface WorkflowContext {
  readonly workflowId: string;
  readonly tasks: Readonly<Record<string, Readonly<TaskSnapshot>>>;
  status(taskId: string): TaskStatus | undefined;
  output(taskId: string): unknown;
}

/**
 * One unit of work in a workflow
 */
export interface AgentTask {
  /** Defaults to agentId */
  id?: string;
  /** Agent to call when neither capability nor intent is given */
  agentId: string;
  capability?: AgentCapability;
  intent?: string;
  input?: unknown;
  /** Task ids that must finish first */
  dependsOn?: readonly string[];
  /** Evaluated once all dependencies succeeded; false skips the task */
  condition?: (context: WorkflowContext) => boolean;
  /** Overrides the agent's and the breaker's timeout */
  timeoutMs?: number;
}

export interface TaskError {
  name: string;
  message: string;
  code?: string;
}

export interface TaskResult {
  taskId: string;
  /** Resolved agent, or the requested one when resolution did not happen */
  agentId: string;
  status: TaskStatus;
  output?: unknown;
  error?: TaskError;
  skipReason?: SkipReason;
  /** Output came from the fallback provider because the circuit was open */
  fallback: boolean;
  startedAt?: string;
  finishedAt?: string;
  durationMs: number;
}

export interface WorkflowResult {
  workflowId: string;
  strategy: CoordinationStrategy;
  status: WorkflowStatus;
  /** Task ids in input order */
  taskIds: readonly string[];
  results: Readonly<Record<string, TaskResult>>;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

/**
 * Picks the agent for a task. Throwing fails the task.
 */
export type AgentResolver = (task: AgentTask, registry: AgentRegistry) => AgentDescriptor;

/**
 * Returns the agent id whose task should run
 */
export type ConditionalRouter = (input: unknown, tasks: readonly AgentTask[]) => string | Promise<string>;

export interface ExecuteOptions {
  workflowId?: string;
  /** Workflow-level deadline (ms); unset or 0 disables it */
  deadlineMs?: number;
  resolveAgent?: AgentResolver;
  /** Conditional only: router input, defaults to the first task's input */
  routerInput?: unknown;
  /** Conditional only, when called through executeWorkflow */
  router?: ConditionalRouter;
}
