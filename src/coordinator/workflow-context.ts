import type { TaskRun } from './task-run';
import type { TaskSnapshot, TaskStatus, WorkflowContext } from './types';

/**
 * Freeze the current state of every task into a context for conditions.
 */
export function createWorkflowContext(workflowId: string, runs: Iterable<TaskRun>): WorkflowContext {
  const tasks: Record<string, Readonly<TaskSnapshot>> = {};
  for (const run of runs) {
    tasks[run.id] = Object.freeze(run.snapshot());
  }
  Object.freeze(tasks);

  return Object.freeze({
    workflowId,
    tasks,
    status(taskId: string): TaskStatus | undefined {
      return tasks[taskId]?.status;
    },
    output(taskId: string): unknown {
      return tasks[taskId]?.output;
    },
  });
}
