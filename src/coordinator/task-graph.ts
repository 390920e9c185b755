/**
 * Task Graph
 *
 * Validates a task set and orders it for sequential execution.
 */

import { WorkflowErrorCode, WorkflowValidationError } from './errors';
import type { AgentTask } from './types';

export interface TaskNode {
  id: string;
  task: AgentTask;
  dependsOn: readonly string[];
  /** Position in the input */
  index: number;
}

export interface TaskGraph {
  /** Nodes in input order */
  nodes: readonly TaskNode[];
  byId: ReadonlyMap<string, TaskNode>;
}

export function taskId(task: AgentTask): string {
  return task.id ?? task.agentId;
}

/**
 * Build and validate the dependency graph.
 *
 * @throws WorkflowValidationError on duplicate ids, unknown dependencies or cycles
 */
export function buildTaskGraph(tasks: readonly AgentTask[]): TaskGraph {
  const byId = new Map<string, TaskNode>();
  const nodes: TaskNode[] = [];

  tasks.forEach((task, index) => {
    const id = taskId(task);
    if (byId.has(id)) {
      throw new WorkflowValidationError(WorkflowErrorCode.DUPLICATE_TASK_ID, `Duplicate task id: ${id}`, {
        taskId: id,
      });
    }
    const node: TaskNode = { id, task, dependsOn: [...new Set(task.dependsOn ?? [])], index };
    byId.set(id, node);
    nodes.push(node);
  });

  for (const node of nodes) {
    for (const dependency of node.dependsOn) {
      if (!byId.has(dependency)) {
        throw new WorkflowValidationError(
          WorkflowErrorCode.UNKNOWN_DEPENDENCY,
          `Task '${node.id}' depends on unknown task '${dependency}'`,
          { taskId: node.id }
        );
      }
    }
  }

  const cycle = findCycle(nodes, byId);
  if (cycle) {
    throw new WorkflowValidationError(
      WorkflowErrorCode.DEPENDENCY_CYCLE,
      `Dependency cycle: ${cycle.join(' -> ')}`,
      { taskId: cycle[0], cycle }
    );
  }

  return { nodes, byId };
}

/**
 * Input order, moving a task back only as far as its dependencies require.
 * Expects a validated, acyclic set.
 */
export function sequentialOrder<T extends { id: string; dependsOn: readonly string[] }>(items: readonly T[]): T[] {
  const placed = new Set<string>();
  const remaining = [...items];
  const order: T[] = [];

  while (remaining.length > 0) {
    const next = remaining.findIndex(item => item.dependsOn.every(dependency => placed.has(dependency)));
    if (next < 0) {
      throw new Error(`Unsatisfiable dependencies: ${remaining.map(item => item.id).join(', ')}`);
    }
    const [item] = remaining.splice(next, 1);
    placed.add(item.id);
    order.push(item);
  }

  return order;
}

/**
 * Depth-first search along dependency edges. Returns the cycle path with its
 * first id repeated at the end, or null.
 */
function findCycle(nodes: readonly TaskNode[], byId: ReadonlyMap<string, TaskNode>): string[] | null {
  const finished = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();

  const visit = (node: TaskNode): string[] | null => {
    path.push(node.id);
    onPath.add(node.id);

    for (const dependency of node.dependsOn) {
      if (onPath.has(dependency)) {
        return [...path.slice(path.indexOf(dependency)), dependency];
      }
      const next = byId.get(dependency);
      if (next && !finished.has(dependency)) {
        const cycle = visit(next);
        if (cycle) {
          return cycle;
        }
      }
    }

    path.pop();
    onPath.delete(node.id);
    finished.add(node.id);
    return null;
  };

  for (const node of nodes) {
    if (!finished.has(node.id)) {
      const cycle = visit(node);
      if (cycle) {
        return cycle;
      }
    }
  }
  return null;
}
