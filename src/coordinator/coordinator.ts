/**
 * Coordinator
 *
 * Executes task sets against registered agents. Each task waits only on its
 * own dependencies; a failure never aborts unrelated tasks. Every agent call
 * goes through the circuit breaker keyed by the agent's id.
 */

import { randomUUID } from 'crypto';
import type { AgentDescriptor, AgentInvoker, AgentRegistry, AgentRequest, FallbackProvider } from '../agents';
import { MAX_TIMER_DELAY_MS, type CircuitBreakerRegistry, type CircuitBreakerStatus } from '../circuit-breaker';
import { toError } from '../errors';
import { createChildLogger, type Logger } from '../logging';
import { WorkflowErrorCode, WorkflowValidationError } from './errors';
import { ExecutionHistory, type ExecutionStats } from './execution-history';
import { defaultAgentResolver } from './resolvers';
import { buildTaskGraph, sequentialOrder, type TaskGraph } from './task-graph';
import { TaskRun } from './task-run';
import {
  CoordinationStrategy,
  SkipReason,
  TaskStatus,
  WorkflowStatus,
  type AgentResolver,
  type AgentTask,
  type ConditionalRouter,
  type ExecuteOptions,
  type TaskResult,
  type WorkflowResult,
} from './types';
import { createWorkflowContext } from './workflow-context';

/**
 * Configuration options for Coordinator
 */
export interface CoordinatorOptions {
  registry: AgentRegistry;
  breakers: CircuitBreakerRegistry;
  invoker: AgentInvoker;
  /** Serves tasks whose agent circuit is open */
  fallback?: FallbackProvider;
  /** Default: capability, then intent, then agent id */
  resolveAgent?: AgentResolver;
  /** Strategy used by executeWorkflow when none is given */
  defaultStrategy?: CoordinationStrategy;
  /** Workflow deadline applied when a call sets none (ms, 0 = none) */
  deadlineMs?: number;
  /** Number of execution records kept */
  historySize?: number;
  logger?: Logger;
}

/**
 * State of one executeX call
 */
interface Execution {
  workflowId: string;
  runs: ReadonlyMap<string, TaskRun>;
  resolveAgent: AgentResolver;
  expired: boolean;
  log: Logger;
}

type Driver = (execution: Execution) => Promise<void>;

export class Coordinator {
  private registry: AgentRegistry;
  private breakers: CircuitBreakerRegistry;
  private invoker: AgentInvoker;
  private fallback?: FallbackProvider;
  private resolveAgent: AgentResolver;
  private defaultStrategy: CoordinationStrategy;
  private deadlineMs: number;
  private history: ExecutionHistory;
  private log: Logger;

  constructor(options: CoordinatorOptions) {
    this.registry = options.registry;
    this.breakers = options.breakers;
    this.invoker = options.invoker;
    this.fallback = options.fallback;
    this.resolveAgent = options.resolveAgent ?? defaultAgentResolver;
    this.defaultStrategy = options.defaultStrategy ?? CoordinationStrategy.SEQUENTIAL;
    this.deadlineMs = options.deadlineMs ?? 0;
    this.history = new ExecutionHistory(options.historySize);
    this.log = options.logger ?? createChildLogger({ component: 'Coordinator' });
  }

  /**
   * Execute a task set with the given strategy.
   *
   * @throws WorkflowValidationError when the task set or deadline is invalid, or
   *   when the conditional strategy is requested without `options.router`
   */
  async executeWorkflow(
    tasks: readonly AgentTask[],
    strategy: CoordinationStrategy = this.defaultStrategy,
    options: ExecuteOptions = {}
  ): Promise<WorkflowResult> {
    switch (strategy) {
      case CoordinationStrategy.SEQUENTIAL:
        return this.executeSequential(tasks, options);
      case CoordinationStrategy.PARALLEL:
        return this.executeParallel(tasks, options);
      case CoordinationStrategy.CONDITIONAL:
        if (!options.router) {
          throw new WorkflowValidationError(
            WorkflowErrorCode.MISSING_ROUTER,
            'Conditional strategy requires a router'
          );
        }
        return this.executeConditional(tasks, options.router, options);
    }
  }

  /**
   * Run tasks one at a time in input order, dependencies first.
   */
  async executeSequential(tasks: readonly AgentTask[], options: ExecuteOptions = {}): Promise<WorkflowResult> {
    const graph = buildTaskGraph(tasks);
    this.checkDeadline(options);

    return this.execute(graph, CoordinationStrategy.SEQUENTIAL, options, async execution => {
      for (const run of sequentialOrder(Array.from(execution.runs.values()))) {
        if (execution.expired) {
          return;
        }
        await this.runTask(execution, run);
      }
    });
  }

  /**
   * Start every task as soon as its dependencies are terminal.
   */
  async executeParallel(tasks: readonly AgentTask[], options: ExecuteOptions = {}): Promise<WorkflowResult> {
    const graph = buildTaskGraph(tasks);
    this.checkDeadline(options);

    return this.execute(graph, CoordinationStrategy.PARALLEL, options, async execution => {
      await Promise.all(Array.from(execution.runs.values(), run => this.runTask(execution, run)));
    });
  }

  /**
   * Ask the router for an agent id and run only the first task assigned to
   * it. Every other task is skipped.
   *
   * @throws WorkflowValidationError when the router answers an agent id no task carries
   */
  async executeConditional(
    tasks: readonly AgentTask[],
    router: ConditionalRouter,
    options: ExecuteOptions = {}
  ): Promise<WorkflowResult> {
    const graph = buildTaskGraph(tasks);
    this.checkDeadline(options);
    const routerInput = options.routerInput !== undefined ? options.routerInput : tasks[0]?.input;
    const agentId = await router(routerInput, tasks);

    const selected = graph.nodes.find(node => node.task.agentId === agentId);
    if (!selected) {
      throw new WorkflowValidationError(
        WorkflowErrorCode.NO_ROUTE_MATCH,
        `Router selected '${agentId}' but no task uses that agent`
      );
    }

    return this.execute(graph, CoordinationStrategy.CONDITIONAL, options, async execution => {
      for (const run of execution.runs.values()) {
        if (run.id !== selected.id) {
          run.skip(SkipReason.NOT_SELECTED);
        }
      }
      const run = execution.runs.get(selected.id);
      if (run) {
        execution.log.debug({ taskId: run.id, agentId }, 'Task selected by router');
        await this.runTask(execution, run);
      }
    });
  }

  /**
   * Aggregate figures over past executions
   */
  getExecutionStats(): ExecutionStats {
    return this.history.stats();
  }

  /**
   * Current status of every agent circuit
   */
  getCircuitStatuses(): CircuitBreakerStatus[] {
    return this.breakers.statuses();
  }

  // === Private Methods ===

  private checkDeadline(options: ExecuteOptions): void {
    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    if (!Number.isFinite(deadlineMs) || deadlineMs < 0 || deadlineMs > MAX_TIMER_DELAY_MS) {
      throw new WorkflowValidationError(
        WorkflowErrorCode.INVALID_DEADLINE,
        `Workflow deadline must be between 0 and ${MAX_TIMER_DELAY_MS}ms, got ${deadlineMs}`
      );
    }
  }

  private async execute(
    graph: TaskGraph,
    strategy: CoordinationStrategy,
    options: ExecuteOptions,
    drive: Driver
  ): Promise<WorkflowResult> {
    const workflowId = options.workflowId ?? randomUUID();
    const startedAt = new Date();
    const execution: Execution = {
      workflowId,
      runs: new Map(graph.nodes.map((node): [string, TaskRun] => [node.id, new TaskRun(node)])),
      resolveAgent: options.resolveAgent ?? this.resolveAgent,
      expired: false,
      log: this.log.child({ workflowId, strategy }),
    };

    execution.log.info({ taskCount: graph.nodes.length }, 'Workflow started');

    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    if (await this.raceDeadline(drive(execution), deadlineMs)) {
      execution.expired = true;
      const unfinished = Array.from(execution.runs.values()).filter(run => !run.isTerminal);
      for (const run of unfinished) {
        run.skip(SkipReason.WORKFLOW_TIMEOUT);
      }
      execution.log.warn(
        { deadlineMs, skipped: unfinished.map(run => run.id) },
        'Workflow deadline elapsed'
      );
    }

    const finishedAt = new Date();
    const taskIds = graph.nodes.map(node => node.id);
    const results: Record<string, TaskResult> = {};
    for (const run of execution.runs.values()) {
      results[run.id] = run.toResult();
    }

    const result: WorkflowResult = Object.freeze({
      workflowId,
      strategy,
      status: overallStatus(Object.values(results)),
      taskIds: Object.freeze(taskIds),
      results: Object.freeze(results),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    });

    this.history.record(result);
    execution.log.info({ status: result.status, durationMs: result.durationMs }, 'Workflow finished');
    return result;
  }

  /**
   * Resolves true when the deadline elapsed before the work finished
   */
  private async raceDeadline(work: Promise<void>, deadlineMs: number): Promise<boolean> {
    if (deadlineMs <= 0) {
      await work;
      return false;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), deadlineMs);
    });

    try {
      return await Promise.race([work.then(() => false), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runTask(execution: Execution, run: TaskRun): Promise<void> {
    const { log } = execution;
    const dependencies = run.dependsOn.flatMap(id => {
      const dependency = execution.runs.get(id);
      return dependency ? [dependency] : [];
    });

    await Promise.all(dependencies.map(dependency => dependency.done));
    if (run.isTerminal) {
      return;
    }

    const blocked = dependencies.find(dependency => dependency.status !== TaskStatus.SUCCEEDED);
    if (blocked) {
      run.skip(SkipReason.DEPENDENCY_FAILED);
      log.debug({ taskId: run.id, dependency: blocked.id, dependencyStatus: blocked.status }, 'Task skipped');
      return;
    }

    const { task } = run.node;
    if (task.condition) {
      let proceed: boolean;
      try {
        proceed = task.condition(createWorkflowContext(execution.workflowId, execution.runs.values()));
      } catch (caught) {
        run.start();
        run.fail(toError(caught));
        log.warn({ taskId: run.id, err: run.error }, 'Task condition threw');
        return;
      }
      if (!proceed) {
        run.skip(SkipReason.CONDITION_NOT_MET);
        log.debug({ taskId: run.id }, 'Task condition not met');
        return;
      }
    }

    run.start();

    let descriptor: AgentDescriptor;
    try {
      descriptor = execution.resolveAgent(task, this.registry);
    } catch (caught) {
      run.fail(toError(caught));
      log.warn({ taskId: run.id, err: run.error }, 'Agent resolution failed');
      return;
    }
    run.assignAgent(descriptor.id);

    const request: AgentRequest = {
      workflowId: execution.workflowId,
      taskId: run.id,
      input: task.input,
      context: Object.freeze(Object.fromEntries(dependencies.map(dependency => [dependency.id, dependency.output]))),
    };
    const provider = this.fallback;
    let servedByFallback = false;

    log.debug({ taskId: run.id, agentId: descriptor.id }, 'Task started');
    try {
      const breaker = this.breakers.getCircuit(descriptor.id, descriptor.circuitBreaker);
      const output = await breaker.call(() => this.invoker.invoke(descriptor, request), {
        timeoutMs: task.timeoutMs ?? descriptor.timeoutMs,
        fallback: provider
          ? () => {
              servedByFallback = true;
              return provider.fallback(descriptor, request);
            }
          : undefined,
      });
      if (run.isTerminal) {
        log.debug({ taskId: run.id }, 'Late result discarded');
        return;
      }
      run.succeed(output, servedByFallback);
      log.debug({ taskId: run.id, fallback: servedByFallback }, 'Task succeeded');
    } catch (caught) {
      const error = toError(caught);
      if (run.isTerminal) {
        log.debug({ taskId: run.id, err: error }, 'Late failure discarded');
        return;
      }
      run.fail(error);
      log.debug({ taskId: run.id, err: error }, 'Task failed');
    }
  }
}

/**
 * success: nothing failed or ran out of time.
 * failed: something did, and nothing succeeded.
 * partial: otherwise.
 */
function overallStatus(results: readonly TaskResult[]): WorkflowStatus {
  const failed = results.some(
    result =>
      result.status === TaskStatus.FAILED ||
      (result.status === TaskStatus.SKIPPED && result.skipReason === SkipReason.WORKFLOW_TIMEOUT)
  );
  if (!failed) {
    return WorkflowStatus.SUCCESS;
  }
  return results.some(result => result.status === TaskStatus.SUCCEEDED)
    ? WorkflowStatus.PARTIAL
    : WorkflowStatus.FAILED;
}
