/**
 * Tests for Coordinator
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Coordinator } from '../coordinator';
import { WorkflowErrorCode, WorkflowValidationError } from '../errors';
import { directAgentResolver } from '../resolvers';
import { CoordinationStrategy, SkipReason, TaskStatus, WorkflowStatus, type AgentTask } from '../types';
import {
  AgentCapability,
  AgentRegistry,
  PermanentAgentError,
  TransientAgentError,
  type AgentDescriptor,
  type AgentInvoker,
  type AgentRequest,
} from '../../agents';
import {
  CircuitBreakerRegistry,
  CircuitState,
  MAX_TIMER_DELAY_MS,
  type CircuitStateChangeEvent,
} from '../../circuit-breaker';

type Handler = (request: AgentRequest) => unknown | Promise<unknown>;

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

class FakeInvoker implements AgentInvoker {
  readonly calls: Array<{ agentId: string; request: AgentRequest }> = [];
  active = 0;
  maxActive = 0;
  private handlers = new Map<string, Handler>();

  on(agentId: string, handler: Handler): this {
    this.handlers.set(agentId, handler);
    return this;
  }

  callsTo(agentId: string): number {
    return this.calls.filter(call => call.agentId === agentId).length;
  }

  async invoke(descriptor: AgentDescriptor, request: AgentRequest): Promise<unknown> {
    this.calls.push({ agentId: descriptor.id, request });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      const handler = this.handlers.get(descriptor.id);
      if (handler) {
        return await handler(request);
      }
      await delay(5);
      return { agent: descriptor.id, echo: request.input };
    } finally {
      this.active--;
    }
  }
}

function amountOf(value: unknown): number {
  return typeof value === 'object' && value !== null && 'amount' in value && typeof value.amount === 'number'
    ? value.amount
    : 0;
}

function createRegistry(): AgentRegistry {
  const registry = new AgentRegistry();
  registry.register({
    id: 'ticketing',
    name: 'Ticketing Agent',
    endpoint: 'endpoints/ticketing',
    capabilities: [AgentCapability.TICKET_PURCHASE, AgentCapability.TICKET_REFUND],
    priority: 1,
  });
  registry.register({
    id: 'backup-ticketing',
    name: 'Backup Ticketing Agent',
    endpoint: 'endpoints/backup-ticketing',
    capabilities: [AgentCapability.TICKET_PURCHASE],
    priority: 2,
  });
  registry.register({
    id: 'finance',
    name: 'Finance Agent',
    endpoint: 'endpoints/finance',
    capabilities: [AgentCapability.EXPENSE_APPROVAL],
    priority: 3,
  });
  registry.register({
    id: 'hr',
    name: 'HR Agent',
    endpoint: 'endpoints/hr',
    capabilities: [AgentCapability.EMPLOYEE_INQUIRY, AgentCapability.NOTIFICATION],
    priority: 4,
  });
  return registry;
}

describe('Coordinator', () => {
  let registry: AgentRegistry;
  let breakers: CircuitBreakerRegistry;
  let invoker: FakeInvoker;
  let coordinator: Coordinator;

  beforeEach(() => {
    registry = createRegistry();
    breakers = new CircuitBreakerRegistry({
      defaultConfig: { failureThreshold: 3, recoveryTimeoutMs: 30000, successThreshold: 2, requestTimeoutMs: 0 },
    });
    invoker = new FakeInvoker();
    coordinator = new Coordinator({ registry, breakers, invoker });
  });

  const purchaseFlow: AgentTask[] = [
    { id: 'purchase', agentId: 'ticketing', input: { seats: 2 } },
    { id: 'approve', agentId: 'finance', dependsOn: ['purchase'] },
    { id: 'notify', agentId: 'hr', dependsOn: ['approve'] },
  ];

  describe('executeSequential', () => {
    it('should run a dependency chain and pass outputs along', async () => {
      invoker.on('ticketing', () => ({ orderId: 'ord-1', amount: 150 }));

      const result = await coordinator.executeSequential(purchaseFlow, { workflowId: 'wf-1' });

      expect(result.status).toBe(WorkflowStatus.SUCCESS);
      expect(result.strategy).toBe(CoordinationStrategy.SEQUENTIAL);
      expect(result.taskIds).toEqual(['purchase', 'approve', 'notify']);
      expect(invoker.calls.map(call => call.agentId)).toEqual(['ticketing', 'finance', 'hr']);
      expect(invoker.calls[1].request).toEqual({
        workflowId: 'wf-1',
        taskId: 'approve',
        input: undefined,
        context: { purchase: { orderId: 'ord-1', amount: 150 } },
      });
      expect(result.results.purchase.output).toEqual({ orderId: 'ord-1', amount: 150 });
    });

    it('should run one task at a time', async () => {
      await coordinator.executeSequential([{ agentId: 'ticketing' }, { agentId: 'finance' }, { agentId: 'hr' }]);

      expect(invoker.maxActive).toBe(1);
    });

    it('should run a later dependency before its dependent', async () => {
      const result = await coordinator.executeSequential([
        { id: 'notify', agentId: 'hr', dependsOn: ['approve'] },
        { id: 'approve', agentId: 'finance' },
      ]);

      expect(invoker.calls.map(call => call.agentId)).toEqual(['finance', 'hr']);
      expect(result.taskIds).toEqual(['notify', 'approve']);
      expect(result.results.notify.status).toBe(TaskStatus.SUCCEEDED);
    });

    it('should generate a workflow id when none is given', async () => {
      const result = await coordinator.executeSequential([{ agentId: 'hr' }]);

      expect(result.workflowId).toMatch(/^[0-9a-f-]{36}$/);
      expect(invoker.calls[0].request.workflowId).toBe(result.workflowId);
    });
  });

  describe('executeParallel', () => {
    it('should overlap independent tasks', async () => {
      await coordinator.executeParallel([{ agentId: 'ticketing' }, { agentId: 'finance' }, { agentId: 'hr' }]);

      expect(invoker.maxActive).toBe(3);
    });

    it('should match sequential results for independent tasks', async () => {
      const tasks: AgentTask[] = [
        { agentId: 'ticketing', input: 'a' },
        { agentId: 'finance', input: 'b' },
        { agentId: 'hr', input: 'c' },
      ];

      const parallel = await coordinator.executeParallel(tasks);
      const sequential = await coordinator.executeSequential(tasks);

      const summary = (ids: readonly string[], results: typeof parallel.results) =>
        ids.map(id => [id, results[id].status, results[id].output]);
      expect(summary(parallel.taskIds, parallel.results)).toEqual(summary(sequential.taskIds, sequential.results));
    });

    it('should wait for dependencies before starting', async () => {
      invoker.on('ticketing', async () => {
        await delay(10);
        return { amount: 10 };
      });

      const result = await coordinator.executeParallel(purchaseFlow);

      expect(result.status).toBe(WorkflowStatus.SUCCESS);
      expect(invoker.calls.map(call => call.agentId)).toEqual(['ticketing', 'finance', 'hr']);
    });

    it('should reject a cycle before any task runs', async () => {
      const tasks: AgentTask[] = [
        { id: 'a', agentId: 'ticketing', dependsOn: ['b'] },
        { id: 'b', agentId: 'finance', dependsOn: ['a'] },
        { id: 'c', agentId: 'hr' },
      ];

      await expect(coordinator.executeParallel(tasks)).rejects.toThrow(WorkflowValidationError);
      expect(invoker.calls).toHaveLength(0);
      expect(coordinator.getExecutionStats().totalExecutions).toBe(0);
    });
  });

  describe('failure handling', () => {
    it('should skip dependents of a failed task and keep unrelated tasks', async () => {
      invoker.on('finance', () => {
        throw new PermanentAgentError('Expense rejected');
      });

      const result = await coordinator.executeParallel([...purchaseFlow, { id: 'inquiry', agentId: 'hr' }]);

      expect(result.status).toBe(WorkflowStatus.PARTIAL);
      expect(result.results.approve.status).toBe(TaskStatus.FAILED);
      expect(result.results.approve.error).toEqual({
        name: 'PermanentAgentError',
        message: 'Expense rejected',
        code: 'PERMANENT_AGENT_ERROR',
      });
      expect(result.results.notify.status).toBe(TaskStatus.SKIPPED);
      expect(result.results.notify.skipReason).toBe(SkipReason.DEPENDENCY_FAILED);
      expect(result.results.inquiry.status).toBe(TaskStatus.SUCCEEDED);
      expect(invoker.callsTo('hr')).toBe(1);
    });

    it('should skip transitively', async () => {
      invoker.on('ticketing', () => {
        throw new TransientAgentError('Connection reset');
      });

      const result = await coordinator.executeSequential(purchaseFlow);

      expect(result.status).toBe(WorkflowStatus.FAILED);
      expect(result.results.approve.skipReason).toBe(SkipReason.DEPENDENCY_FAILED);
      expect(result.results.notify.skipReason).toBe(SkipReason.DEPENDENCY_FAILED);
      expect(invoker.calls).toHaveLength(1);
    });

    it('should record plain errors without a code', async () => {
      invoker.on('hr', () => Promise.reject(new TypeError('bad payload')));

      const result = await coordinator.executeSequential([{ agentId: 'hr' }]);

      expect(result.results.hr.error).toEqual({ name: 'TypeError', message: 'bad payload' });
    });
  });

  describe('conditions', () => {
    const conditionalFlow: AgentTask[] = [
      { id: 'purchase', agentId: 'ticketing' },
      {
        id: 'approve',
        agentId: 'finance',
        dependsOn: ['purchase'],
        condition: context => amountOf(context.output('purchase')) > 100,
      },
    ];

    it('should skip a task whose condition is false', async () => {
      invoker.on('ticketing', () => ({ amount: 50 }));

      const result = await coordinator.executeSequential(conditionalFlow);

      expect(result.status).toBe(WorkflowStatus.SUCCESS);
      expect(result.results.approve.status).toBe(TaskStatus.SKIPPED);
      expect(result.results.approve.skipReason).toBe(SkipReason.CONDITION_NOT_MET);
      expect(invoker.callsTo('finance')).toBe(0);
    });

    it('should run a task whose condition is true exactly once', async () => {
      invoker.on('ticketing', () => ({ amount: 150 }));

      const result = await coordinator.executeParallel(conditionalFlow);

      expect(result.results.approve.status).toBe(TaskStatus.SUCCEEDED);
      expect(invoker.callsTo('finance')).toBe(1);
    });

    it('should not evaluate the condition when a dependency failed', async () => {
      const condition = vi.fn(() => true);
      invoker.on('ticketing', () => {
        throw new TransientAgentError('Connection reset');
      });

      await coordinator.executeSequential([
        { id: 'purchase', agentId: 'ticketing' },
        { id: 'approve', agentId: 'finance', dependsOn: ['purchase'], condition },
      ]);

      expect(condition).not.toHaveBeenCalled();
    });

    it('should hand conditions a frozen snapshot', async () => {
      let seen: unknown;
      await coordinator.executeSequential([
        { id: 'purchase', agentId: 'ticketing', input: 7 },
        {
          id: 'approve',
          agentId: 'finance',
          dependsOn: ['purchase'],
          condition: context => {
            seen = {
              workflowId: context.workflowId,
              purchase: context.status('purchase'),
              approve: context.status('approve'),
              frozen: Object.isFrozen(context.tasks),
            };
            return true;
          },
        },
      ], { workflowId: 'wf-ctx' });

      expect(seen).toEqual({
        workflowId: 'wf-ctx',
        purchase: TaskStatus.SUCCEEDED,
        approve: TaskStatus.PENDING,
        frozen: true,
      });
    });

    it('should fail a task whose condition throws', async () => {
      const result = await coordinator.executeSequential([
        { id: 'purchase', agentId: 'ticketing' },
        {
          id: 'approve',
          agentId: 'finance',
          dependsOn: ['purchase'],
          condition: () => {
            throw new Error('missing amount');
          },
        },
      ]);

      expect(result.status).toBe(WorkflowStatus.PARTIAL);
      expect(result.results.approve.status).toBe(TaskStatus.FAILED);
      expect(result.results.approve.error?.message).toBe('missing amount');
      expect(invoker.callsTo('finance')).toBe(0);
    });
  });

  describe('agent resolution', () => {
    it('should resolve a capability to the preferred agent', async () => {
      const result = await coordinator.executeSequential([
        { id: 'buy', agentId: 'any', capability: AgentCapability.TICKET_PURCHASE },
      ]);

      expect(result.results.buy.agentId).toBe('ticketing');
      expect(invoker.calls[0].agentId).toBe('ticketing');
    });

    it('should fall through to the next agent when the preferred one is disabled', async () => {
      registry.disable('ticketing');

      const result = await coordinator.executeSequential([
        { id: 'buy', agentId: 'any', capability: AgentCapability.TICKET_PURCHASE },
      ]);

      expect(result.results.buy.agentId).toBe('backup-ticketing');
    });

    it('should route an intent', async () => {
      const result = await coordinator.executeSequential([{ id: 'expense', agentId: 'any', intent: 'approve_expense' }]);

      expect(result.results.expense.agentId).toBe('finance');
    });

    it('should fail tasks naming an unknown agent', async () => {
      const result = await coordinator.executeSequential([{ agentId: 'legal' }]);

      expect(result.status).toBe(WorkflowStatus.FAILED);
      expect(result.results.legal.agentId).toBe('legal');
      expect(result.results.legal.error).toEqual({
        name: 'NoAgentAvailableError',
        message: 'Agent not registered: legal',
        code: 'NO_AGENT_AVAILABLE',
      });
    });

    it('should fail tasks naming a disabled agent', async () => {
      registry.disable('hr');

      const result = await coordinator.executeSequential([{ agentId: 'hr' }]);

      expect(result.results.hr.error?.message).toBe('Agent disabled: hr');
      expect(invoker.calls).toHaveLength(0);
    });

    it('should ignore capabilities under the direct resolver', async () => {
      const result = await coordinator.executeSequential(
        [{ id: 'buy', agentId: 'backup-ticketing', capability: AgentCapability.TICKET_PURCHASE }],
        { resolveAgent: directAgentResolver }
      );

      expect(result.results.buy.agentId).toBe('backup-ticketing');
    });

    it('should use a caller-supplied resolver', async () => {
      const result = await coordinator.executeSequential([{ id: 'question', agentId: 'any' }], {
        resolveAgent: (_task, agents) => agents.route('hr_inquiry'),
      });

      expect(result.results.question.agentId).toBe('hr');
    });
  });

  describe('circuit breakers', () => {
    it('should open the agent circuit after repeated failures', async () => {
      invoker.on('finance', () => {
        throw new TransientAgentError('Upstream unavailable');
      });

      for (let i = 0; i < 3; i++) {
        await coordinator.executeSequential([{ agentId: 'finance' }]);
      }
      const result = await coordinator.executeSequential([{ agentId: 'finance' }]);

      expect(invoker.callsTo('finance')).toBe(3);
      expect(breakers.get('finance')?.isOpen).toBe(true);
      expect(result.results.finance.error).toEqual({
        name: 'CircuitOpenError',
        message: "Circuit breaker 'finance' is OPEN",
        code: 'CIRCUIT_OPEN',
      });
    });

    it('should apply per-agent breaker settings', async () => {
      registry.register({
        id: 'legal',
        name: 'Legal Agent',
        endpoint: 'endpoints/legal',
        capabilities: [AgentCapability.ESCALATION],
        circuitBreaker: { failureThreshold: 1 },
      });
      invoker.on('legal', () => {
        throw new TransientAgentError('Upstream unavailable');
      });

      await coordinator.executeSequential([{ agentId: 'legal' }]);

      expect(breakers.get('legal')?.isOpen).toBe(true);
      expect(coordinator.getCircuitStatuses().map(status => status.name)).toEqual(['legal']);
    });

    it('should serve open circuits from the fallback provider', async () => {
      const withFallback = new Coordinator({
        registry,
        breakers,
        invoker,
        fallback: {
          fallback: (descriptor, request) => ({ queued: true, agent: descriptor.id, taskId: request.taskId }),
        },
      });
      breakers.getCircuit('finance').trip('maintenance window');

      const result = await withFallback.executeSequential([{ id: 'approve', agentId: 'finance' }]);

      expect(result.status).toBe(WorkflowStatus.SUCCESS);
      expect(result.results.approve.fallback).toBe(true);
      expect(result.results.approve.output).toEqual({ queued: true, agent: 'finance', taskId: 'approve' });
      expect(invoker.callsTo('finance')).toBe(0);
    });

    it('should apply the task timeout before the agent timeout', async () => {
      registry.register({
        id: 'slow',
        name: 'Slow Agent',
        endpoint: 'endpoints/slow',
        capabilities: [AgentCapability.NOTIFICATION],
        timeoutMs: 5000,
      });
      invoker.on('slow', async () => {
        await delay(200);
        return 'late';
      });

      const result = await coordinator.executeSequential([{ agentId: 'slow', timeoutMs: 20 }]);

      expect(result.results.slow.error).toEqual({
        name: 'CallTimeoutError',
        message: "Call through 'slow' exceeded timeout of 20ms",
        code: 'CALL_TIMEOUT',
      });
    });

    it('should apply the agent timeout when the task sets none', async () => {
      registry.register({
        id: 'slow',
        name: 'Slow Agent',
        endpoint: 'endpoints/slow',
        capabilities: [AgentCapability.NOTIFICATION],
        timeoutMs: 20,
      });
      invoker.on('slow', async () => {
        await delay(200);
        return 'late';
      });

      const result = await coordinator.executeSequential([{ agentId: 'slow' }]);

      expect(result.results.slow.error?.name).toBe('CallTimeoutError');
      expect(breakers.get('slow')?.status().totalTimeouts).toBe(1);
    });

    it('should fail a task whose timeout exceeds the timer limit', async () => {
      const result = await coordinator.executeSequential([{ agentId: 'finance', timeoutMs: MAX_TIMER_DELAY_MS + 1 }]);

      expect(result.results.finance.error).toEqual({
        name: 'RangeError',
        message: 'timeoutMs must be between 0 and 2147483647ms, got 2147483648',
      });
      expect(invoker.callsTo('finance')).toBe(0);
      expect(breakers.get('finance')?.status().totalRequests).toBe(0);
    });

    it('should fail a task whose agent breaker settings are out of range', async () => {
      registry.register({
        id: 'legal',
        name: 'Legal Agent',
        endpoint: 'endpoints/legal',
        capabilities: [AgentCapability.ESCALATION],
        circuitBreaker: { requestTimeoutMs: 2_200_000_000 },
      });

      const result = await coordinator.executeParallel([{ agentId: 'legal' }, { agentId: 'hr' }]);

      expect(result.status).toBe(WorkflowStatus.PARTIAL);
      expect(result.results.legal.error?.name).toBe('RangeError');
      expect(result.results.hr.status).toBe(TaskStatus.SUCCEEDED);
      expect(breakers.hasCircuit('legal')).toBe(false);
    });

    it('should open a shared circuit once under concurrent failures', async () => {
      invoker.on('finance', async () => {
        await delay(5);
        throw new TransientAgentError('Upstream unavailable');
      });
      const events: CircuitStateChangeEvent[] = [];
      breakers.onStateChange(event => {
        events.push(event);
      });

      const result = await coordinator.executeParallel(
        ['q1', 'q2', 'q3', 'q4', 'q5'].map(id => ({ id, agentId: 'finance' }))
      );

      expect(invoker.callsTo('finance')).toBe(5);
      expect(invoker.maxActive).toBe(5);
      expect(result.status).toBe(WorkflowStatus.FAILED);
      expect(events.map(event => [event.fromState, event.toState])).toEqual([[CircuitState.CLOSED, CircuitState.OPEN]]);
      const status = breakers.get('finance')?.status();
      expect(status?.state).toBe(CircuitState.OPEN);
      expect(status?.failureCount).toBe(0);
      expect(status?.totalFailures).toBe(5);
    });
  });

  describe('executeConditional', () => {
    const routedTasks: AgentTask[] = [
      { agentId: 'ticketing', input: { text: 'two seats please' } },
      { agentId: 'finance' },
      { agentId: 'hr' },
    ];

    it('should run only the routed task', async () => {
      const router = vi.fn(() => 'finance');

      const result = await coordinator.executeConditional(routedTasks, router);

      expect(router).toHaveBeenCalledWith({ text: 'two seats please' }, routedTasks);
      expect(result.status).toBe(WorkflowStatus.SUCCESS);
      expect(result.results.finance.status).toBe(TaskStatus.SUCCEEDED);
      expect(result.results.ticketing.skipReason).toBe(SkipReason.NOT_SELECTED);
      expect(result.results.hr.skipReason).toBe(SkipReason.NOT_SELECTED);
      expect(invoker.calls.map(call => call.agentId)).toEqual(['finance']);
    });

    it('should pass routerInput to the router', async () => {
      const router = vi.fn(async () => 'hr');

      await coordinator.executeConditional(routedTasks, router, { routerInput: 'who handles onboarding?' });

      expect(router).toHaveBeenCalledWith('who handles onboarding?', routedTasks);
      expect(invoker.calls.map(call => call.agentId)).toEqual(['hr']);
    });

    it('should reject a router answer that matches no task', async () => {
      const error = await coordinator.executeConditional(routedTasks, () => 'legal').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(WorkflowValidationError);
      if (error instanceof WorkflowValidationError) {
        expect(error.reason).toBe(WorkflowErrorCode.NO_ROUTE_MATCH);
      }
      expect(invoker.calls).toHaveLength(0);
    });

    it('should skip the routed task when it depends on an unselected one', async () => {
      const result = await coordinator.executeConditional(
        [
          { id: 'purchase', agentId: 'ticketing' },
          { id: 'approve', agentId: 'finance', dependsOn: ['purchase'] },
        ],
        () => 'finance'
      );

      expect(result.results.purchase.skipReason).toBe(SkipReason.NOT_SELECTED);
      expect(result.results.approve.skipReason).toBe(SkipReason.DEPENDENCY_FAILED);
      expect(invoker.calls).toHaveLength(0);
    });
  });

  describe('executeWorkflow', () => {
    it('should dispatch on strategy', async () => {
      const result = await coordinator.executeWorkflow(purchaseFlow, CoordinationStrategy.PARALLEL);

      expect(result.strategy).toBe(CoordinationStrategy.PARALLEL);
      expect(result.status).toBe(WorkflowStatus.SUCCESS);
    });

    it('should use the default strategy', async () => {
      const parallelByDefault = new Coordinator({
        registry,
        breakers,
        invoker,
        defaultStrategy: CoordinationStrategy.PARALLEL,
      });

      const result = await parallelByDefault.executeWorkflow([{ agentId: 'hr' }]);

      expect(result.strategy).toBe(CoordinationStrategy.PARALLEL);
    });

    it('should require a router for the conditional strategy', async () => {
      await expect(
        coordinator.executeWorkflow(purchaseFlow, CoordinationStrategy.CONDITIONAL)
      ).rejects.toThrow('Conditional strategy requires a router');

      const result = await coordinator.executeWorkflow(purchaseFlow, CoordinationStrategy.CONDITIONAL, {
        router: () => 'ticketing',
      });
      expect(result.results.purchase.status).toBe(TaskStatus.SUCCEEDED);
    });

    it('should freeze the result', async () => {
      const result = await coordinator.executeWorkflow([{ agentId: 'hr' }]);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.results)).toBe(true);
      expect(Object.isFrozen(result.results.hr)).toBe(true);
    });
  });

  describe('execution stats', () => {
    it('should aggregate executions per strategy', async () => {
      await coordinator.executeSequential([{ agentId: 'hr' }], { workflowId: 'wf-1' });
      await coordinator.executeSequential([{ agentId: 'hr' }], { workflowId: 'wf-2' });
      await coordinator.executeParallel([{ agentId: 'hr' }], { workflowId: 'wf-3' });

      const stats = coordinator.getExecutionStats();

      expect(stats.totalExecutions).toBe(3);
      expect(stats.byStrategy).toEqual({ sequential: 2, parallel: 1, conditional: 0 });
      expect(stats.recent.map(record => record.workflowId)).toEqual(['wf-3', 'wf-2', 'wf-1']);
      expect(stats.recent[0].tasks).toEqual([
        { taskId: 'hr', status: TaskStatus.SUCCEEDED, durationMs: expect.any(Number) },
      ]);
    });

    it('should bound the history', async () => {
      const bounded = new Coordinator({ registry, breakers, invoker, historySize: 2 });

      for (const workflowId of ['wf-1', 'wf-2', 'wf-3']) {
        await bounded.executeSequential([{ agentId: 'hr' }], { workflowId });
      }

      const stats = bounded.getExecutionStats();
      expect(stats.totalExecutions).toBe(3);
      expect(stats.recent.map(record => record.workflowId)).toEqual(['wf-3', 'wf-2']);
    });
  });
});

describe('Coordinator deadline', () => {
  let breakers: CircuitBreakerRegistry;
  let invoker: FakeInvoker;
  let coordinator: Coordinator;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T09:00:00Z'));

    breakers = new CircuitBreakerRegistry({ defaultConfig: { requestTimeoutMs: 0 } });
    invoker = new FakeInvoker()
      .on('ticketing', async () => {
        await delay(100);
        return 'booked';
      })
      .on('finance', async () => {
        await delay(5000);
        return 'approved';
      });
    coordinator = new Coordinator({ registry: createRegistry(), breakers, invoker, deadlineMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should skip unfinished tasks when the deadline elapses', async () => {
    const pending = coordinator.executeParallel([
      { id: 'purchase', agentId: 'ticketing' },
      { id: 'approve', agentId: 'finance' },
      { id: 'notify', agentId: 'hr', dependsOn: ['approve'] },
    ]);

    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result.status).toBe(WorkflowStatus.PARTIAL);
    expect(result.durationMs).toBe(1000);
    expect(result.finishedAt).toBe('2026-03-01T09:00:01.000Z');
    expect(result.results.purchase.status).toBe(TaskStatus.SUCCEEDED);
    expect(result.results.purchase.durationMs).toBe(100);
    expect(result.results.approve.skipReason).toBe(SkipReason.WORKFLOW_TIMEOUT);
    expect(result.results.notify.skipReason).toBe(SkipReason.WORKFLOW_TIMEOUT);
  });

  it('should discard late results but let the breaker record them', async () => {
    const pending = coordinator.executeParallel([{ id: 'approve', agentId: 'finance' }]);

    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;
    await vi.advanceTimersByTimeAsync(4000);

    expect(result.status).toBe(WorkflowStatus.FAILED);
    expect(result.results.approve.status).toBe(TaskStatus.SKIPPED);
    expect(result.results.approve.output).toBeUndefined();
    expect(breakers.get('finance')?.totalSuccesses).toBe(1);
  });

  it('should stop a sequential run at the deadline', async () => {
    const pending = coordinator.executeSequential(
      [
        { id: 'first', agentId: 'ticketing' },
        { id: 'second', agentId: 'finance' },
        { id: 'third', agentId: 'hr' },
      ],
      { deadlineMs: 500 }
    );

    await vi.advanceTimersByTimeAsync(500);
    const result = await pending;
    await vi.advanceTimersByTimeAsync(5000);

    expect(result.results.first.status).toBe(TaskStatus.SUCCEEDED);
    expect(result.results.second.skipReason).toBe(SkipReason.WORKFLOW_TIMEOUT);
    expect(result.results.third.skipReason).toBe(SkipReason.WORKFLOW_TIMEOUT);
    expect(invoker.callsTo('hr')).toBe(0);
  });

  it('should reject a deadline beyond the timer limit before any task runs', async () => {
    await expect(
      coordinator.executeParallel([{ agentId: 'finance' }], { deadlineMs: MAX_TIMER_DELAY_MS + 1 })
    ).rejects.toMatchObject({
      reason: WorkflowErrorCode.INVALID_DEADLINE,
      message: 'Workflow deadline must be between 0 and 2147483647ms, got 2147483648',
    });

    const configured = new Coordinator({ registry: createRegistry(), breakers, invoker, deadlineMs: 2_200_000_000 });
    await expect(configured.executeSequential([{ agentId: 'ticketing' }])).rejects.toBeInstanceOf(
      WorkflowValidationError
    );
    expect(invoker.calls).toHaveLength(0);
  });

  it('should honour a deadline at the timer limit', async () => {
    const pending = coordinator.executeParallel([{ agentId: 'finance' }], { deadlineMs: MAX_TIMER_DELAY_MS });

    await vi.advanceTimersByTimeAsync(5000);
    const result = await pending;

    expect(result.status).toBe(WorkflowStatus.SUCCESS);
  });

  it('should not apply a deadline of zero', async () => {
    const pending = coordinator.executeParallel([{ agentId: 'finance' }], { deadlineMs: 0 });

    await vi.advanceTimersByTimeAsync(5000);
    const result = await pending;

    expect(result.status).toBe(WorkflowStatus.SUCCESS);
    expect(result.results.finance.output).toBe('approved');
  });
});
