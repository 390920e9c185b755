/**
 * Coordinator Module
 *
 * Dependency-aware workflow execution over registered agents.
 *
 * @example
 * ```typescript
 * const coordinator = new Coordinator({ registry, breakers, invoker });
 *
 * const result = await coordinator.executeParallel([
 *   { id: 'purchase', agentId: 'ticketing', input: { seats: 2 } },
 *   { id: 'approve', agentId: 'finance', dependsOn: ['purchase'] },
 * ]);
 *
 * result.results.approve.status; // 'succeeded'
 * ```
 */

// Types
export {
  CoordinationStrategy,
  TaskStatus,
  SkipReason,
  WorkflowStatus,
  type AgentTask,
  type AgentResolver,
  type ConditionalRouter,
  type ExecuteOptions,
  type TaskError,
  type TaskResult,
  type TaskSnapshot,
  type WorkflowContext,
  type WorkflowResult,
} from './types';

// Errors
export { WorkflowErrorCode, WorkflowValidationError } from './errors';

// Task graph
export { buildTaskGraph, sequentialOrder, taskId, type TaskGraph, type TaskNode } from './task-graph';

// Resolvers
export { defaultAgentResolver, directAgentResolver } from './resolvers';

// History
export {
  ExecutionHistory,
  DEFAULT_HISTORY_SIZE,
  RECENT_EXECUTIONS_REPORT_SIZE,
  type ExecutionRecord,
  type ExecutionStats,
} from './execution-history';

// Coordinator
export { Coordinator, type CoordinatorOptions } from './coordinator';
