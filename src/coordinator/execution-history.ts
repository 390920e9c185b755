/**
 * Execution History
 *
 * Bounded log of finished workflows and the aggregate figures derived from it.
 */

import { CoordinationStrategy, type TaskStatus, type WorkflowResult, type WorkflowStatus } from './types';

export const DEFAULT_HISTORY_SIZE = 100;
export const RECENT_EXECUTIONS_REPORT_SIZE = 10;

export interface ExecutionRecord {
  workflowId: string;
  /** Workflow start (ISO 8601) */
  timestamp: string;
  strategy: CoordinationStrategy;
  status: WorkflowStatus;
  taskIds: readonly string[];
  tasks: ReadonlyArray<{ taskId: string; status: TaskStatus; durationMs: number }>;
  durationMs: number;
}

export interface ExecutionStats {
  totalExecutions: number;
  totalDurationMs: number;
  averageDurationMs: number;
  byStrategy: Record<CoordinationStrategy, number>;
  /** Most recent first */
  recent: ExecutionRecord[];
}

export class ExecutionHistory {
  private records: ExecutionRecord[] = [];
  private totalExecutions = 0;
  private totalDurationMs = 0;
  private byStrategy: Record<CoordinationStrategy, number> = {
    [CoordinationStrategy.SEQUENTIAL]: 0,
    [CoordinationStrategy.PARALLEL]: 0,
    [CoordinationStrategy.CONDITIONAL]: 0,
  };
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    this.capacity = Math.max(1, capacity);
  }

  get size(): number {
    return this.records.length;
  }

  record(result: WorkflowResult): ExecutionRecord {
    const entry: ExecutionRecord = Object.freeze({
      workflowId: result.workflowId,
      timestamp: result.startedAt,
      strategy: result.strategy,
      status: result.status,
      taskIds: result.taskIds,
      tasks: result.taskIds.map(taskId => ({
        taskId,
        status: result.results[taskId].status,
        durationMs: result.results[taskId].durationMs,
      })),
      durationMs: result.durationMs,
    });

    this.records.push(entry);
    if (this.records.length > this.capacity) {
      this.records.shift();
    }

    this.totalExecutions++;
    this.totalDurationMs += result.durationMs;
    this.byStrategy[result.strategy]++;
    return entry;
  }

  stats(): ExecutionStats {
    return {
      totalExecutions: this.totalExecutions,
      totalDurationMs: this.totalDurationMs,
      averageDurationMs: this.totalExecutions > 0 ? this.totalDurationMs / this.totalExecutions : 0,
      byStrategy: { ...this.byStrategy },
      recent: this.records.slice(-RECENT_EXECUTIONS_REPORT_SIZE).reverse(),
    };
  }
}
