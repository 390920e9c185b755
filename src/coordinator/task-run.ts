/**
 * Task Run
 *
 * Run-time state of one task inside one workflow execution. Owned by a
 * single Coordinator call; `done` resolves once the task is terminal so
 * dependents can wait on it.
 */

import { AgentCoordinatorError } from '../errors';
import type { TaskNode } from './task-graph';
import { SkipReason, TaskStatus, type TaskError, type TaskResult, type TaskSnapshot } from './types';

const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.SUCCEEDED,
  TaskStatus.FAILED,
  TaskStatus.SKIPPED,
]);

function describeError(error: Error): TaskError {
  return error instanceof AgentCoordinatorError
    ? { name: error.name, message: error.message, code: error.code }
    : { name: error.name, message: error.message };
}

export class TaskRun {
  readonly node: TaskNode;
  readonly done: Promise<void>;

  private _status: TaskStatus = TaskStatus.PENDING;
  private _agentId: string;
  private _output: unknown;
  private _error?: Error;
  private _skipReason?: SkipReason;
  private _fallback = false;
  private _startedAt?: Date;
  private _finishedAt?: Date;
  private resolveDone: () => void;

  constructor(node: TaskNode) {
    this.node = node;
    this._agentId = node.task.agentId;

    let resolve: () => void = () => undefined;
    this.done = new Promise<void>(r => {
      resolve = r;
    });
    this.resolveDone = resolve;
  }

  get id(): string {
    return this.node.id;
  }

  get dependsOn(): readonly string[] {
    return this.node.dependsOn;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get output(): unknown {
    return this._output;
  }

  get error(): Error | undefined {
    return this._error;
  }

  get skipReason(): SkipReason | undefined {
    return this._skipReason;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this._status);
  }

  /**
   * Check if a status transition is valid.
   *
   * Valid transitions:
   * - PENDING -> RUNNING
   * - PENDING -> SKIPPED
   * - RUNNING -> SUCCEEDED | FAILED | SKIPPED
   */
  canTransitionTo(next: TaskStatus): boolean {
    switch (this._status) {
      case TaskStatus.PENDING:
        return next === TaskStatus.RUNNING || next === TaskStatus.SKIPPED;
      case TaskStatus.RUNNING:
        return TERMINAL_STATUSES.has(next);
      default:
        return false;
    }
  }

  start(): void {
    this.transition(TaskStatus.RUNNING);
    this._startedAt = new Date();
  }

  /**
   * Record the agent that actually serves this task
   */
  assignAgent(agentId: string): void {
    this._agentId = agentId;
  }

  succeed(output: unknown, fallback = false): void {
    this.transition(TaskStatus.SUCCEEDED);
    this._output = output;
    this._fallback = fallback;
    this.settle();
  }

  fail(error: Error): void {
    this.transition(TaskStatus.FAILED);
    this._error = error;
    this.settle();
  }

  skip(reason: SkipReason): void {
    this.transition(TaskStatus.SKIPPED);
    this._skipReason = reason;
    this.settle();
  }

  snapshot(): TaskSnapshot {
    return this._status === TaskStatus.SUCCEEDED
      ? { status: this._status, output: this._output }
      : { status: this._status };
  }

  toResult(): TaskResult {
    const startedAt = this._startedAt;
    const finishedAt = this._finishedAt;

    return Object.freeze({
      taskId: this.id,
      agentId: this._agentId,
      status: this._status,
      output: this._output,
      error: this._error ? describeError(this._error) : undefined,
      skipReason: this._skipReason,
      fallback: this._fallback,
      startedAt: startedAt?.toISOString(),
      finishedAt: finishedAt?.toISOString(),
      durationMs: startedAt && finishedAt ? finishedAt.getTime() - startedAt.getTime() : 0,
    });
  }

  // === Private Methods ===

  private settle(): void {
    this._finishedAt = new Date();
    this.resolveDone();
  }

  private transition(next: TaskStatus): void {
    if (!this.canTransitionTo(next)) {
      throw new Error(`Invalid task transition for '${this.id}': ${this._status} -> ${next}`);
    }
    this._status = next;
  }
}
