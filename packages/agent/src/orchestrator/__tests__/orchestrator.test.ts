/**
 * @fileoverview Tests for the orchestrator loop
 */
import { describe, expect, it } from 'vitest';
import { ErrorCodes, loadStateTemplate, type ChatMessage } from '@wayfarer/core';
import type { IntakeAgent, OrchestratorAgents, PlannerAgent } from '../../agents/types.js';
import { TaskExecutor } from '../../executor/task-executor.js';
import { ToolRegistry } from '../../executor/tool-registry.js';
import { WorkerPool } from '../../executor/worker-pool.js';
import { StateManager } from '../../state/state-manager.js';
import { Orchestrator, type OrchestratorConfig } from '../orchestrator.js';
import {
  createFollowerAgent,
  createIntakeAgent,
  createPerMessageAgents,
  createScriptedAgents,
  createTravelTools,
  FaultyStore,
  INTENT_TASK_ID,
  type CallLog,
  type PlannedTask,
} from '../../__fixtures__/index.js';

const template = loadStateTemplate();

const PLAN: PlannedTask[] = [
  { task_id: 'f1', category: 'flight', tool: { name: 'flight_search', arguments: { origin: 'DEL', destination: 'GOI' } } },
  { task_id: 'h1', category: 'hotel', tool: { name: 'hotel_search', arguments: { city: 'Goa' } } },
  { task_id: 'r1', category: 'train', tool: { name: 'train_search', arguments: { from: 'NDLS' } } },
];

interface HarnessOptions {
  lockTimeoutMs?: number;
  config?: Partial<Omit<OrchestratorConfig, 'agents' | 'executor'>>;
}

async function createHarness(agents: OrchestratorAgents, options: HarnessOptions = {}) {
  const store = new FaultyStore();
  const calls: CallLog[] = [];
  const manager = new StateManager({ store, template, lockTimeoutMs: options.lockTimeoutMs ?? 1000 });
  const executor = new TaskExecutor({
    tools: new ToolRegistry(createTravelTools(calls)),
    pool: new WorkerPool(4),
    taskTimeoutMs: 500,
    batchTimeoutMs: 2000,
    maxRetries: 2,
    retryDelayMs: 1,
    resultCacheTtlMs: 0,
  });
  const orchestrator = new Orchestrator({
    agents,
    executor,
    maxIterations: 3,
    commitMaxAttempts: 3,
    commitRetryDelayMs: 1,
    ...options.config,
  });
  const handle = await manager.open('s1');
  const run = (message: string, history: ChatMessage[] = []) => orchestrator.run({ state: handle, history }, message);
  return { store, calls, manager, handle, run };
}

describe('Orchestrator', () => {
  it('runs a request through every stage', async () => {
    const { handle, run, calls } = await createHarness(createScriptedAgents(PLAN));

    const response = await run('Plan a trip from Delhi to Goa');

    expect(response).toMatchObject({
      sessionId: 's1',
      status: 'completed',
      message: 'Executed 3 tasks, 2 done before finalizing',
      stage: 'done',
      stages: ['intake', 'plan', 'execute', 'reflect', 'finalize', 'done'],
      taskStructure: { flight: ['f1'], hotel: ['h1'], train: ['r1'] },
    });
    expect(response.error).toBeUndefined();
    expect(response.iterations).toHaveLength(1);
    expect(response.iterations[0].summary).toMatchObject({ total: 3, completed: 2, failed: 1 });
    expect(calls.map((call) => call.name).sort()).toEqual(['flight_search_tool', 'hotel_search', 'train_search']);

    const tasks = handle.getState().tasks;
    expect(tasks.map((task) => [task.task_id, task.status])).toEqual([
      [INTENT_TASK_ID, 'done'],
      ['f1', 'done'],
      ['h1', 'done'],
      ['r1', 'failed'],
    ]);
    expect(tasks[1].metadata).toMatchObject({
      category: 'flight',
      execution: { tool: 'flight_search', attempts: 1, cached: false },
      result: { flights: [{ code: 'AI101', from: 'DEL', to: 'GOI', price: 4200 }] },
    });
    expect(tasks[3].metadata.error).toMatchObject({ code: ErrorCodes.TOOL_REPORTED_ERROR });
  });

  it('stops after intake when the request needs clarification', async () => {
    let planned = false;
    const planner: PlannerAgent = {
      name: 'planner',
      async propose(view) {
        planned = true;
        return { output: { taskStructure: {} }, diff: view.proposeDiff({}) };
      },
    };
    const { handle, run } = await createHarness(
      createScriptedAgents([], { intake: createIntakeAgent({ clarify: 'Where are you flying from?' }), planner })
    );

    const response = await run('Book me a flight');

    expect(response).toEqual({
      sessionId: 's1',
      status: 'needs_clarification',
      message: 'Where are you flying from?',
      stage: 'done',
      stages: ['intake', 'done'],
      iterations: [],
    });
    expect(planned).toBe(false);
    expect(handle.getState().user_profile.last_question).toBe('Where are you flying from?');
  });

  it('passes conversation history to intake', async () => {
    const { handle, run } = await createHarness(createScriptedAgents([]));
    const history: ChatMessage[] = [
      { role: 'user', content: 'Hi', timestamp: '2026-03-01T09:00:00.000Z' },
      { role: 'assistant', content: 'Where to?', timestamp: '2026-03-01T09:00:01.000Z' },
    ];

    await run('Goa please', history);

    expect(handle.getState().tasks[0].metadata).toEqual({ message: 'Goa please', history_turns: 2 });
  });

  it('loops back to execute for follow-up tasks', async () => {
    const followUp: PlannedTask = {
      task_id: 'h2',
      category: 'hotel',
      tool: { name: 'hotel_search', arguments: { city: 'Pune' } },
    };
    const { handle, run } = await createHarness(
      createScriptedAgents(PLAN, { follower: createFollowerAgent([[followUp]]) })
    );

    const response = await run('Goa, then Pune');

    expect(response.status).toBe('completed');
    expect(response.stages).toEqual([
      'intake',
      'plan',
      'execute',
      'reflect',
      'execute',
      'reflect',
      'finalize',
      'done',
    ]);
    expect(response.iterations.map((iteration) => iteration.tasks.map((task) => task.task_id))).toEqual([
      ['f1', 'h1', 'r1'],
      ['h2'],
    ]);
    const h2 = handle.getState().tasks.find((task) => task.task_id === 'h2');
    expect(h2).toMatchObject({ status: 'done', agent_origin: 'follower' });
  });

  it('stops looping at the iteration limit', async () => {
    const round = (id: string): PlannedTask[] => [
      { task_id: id, category: 'hotel', tool: { name: 'hotel_search', arguments: { city: id } } },
    ];
    const { handle, run } = await createHarness(
      createScriptedAgents(PLAN, { follower: createFollowerAgent([round('a2'), round('a3'), round('a4')]) }),
      { config: { maxIterations: 2 } }
    );

    const response = await run('Keep searching');

    expect(response.status).toBe('completed');
    expect(response.iterations).toHaveLength(2);
    expect(response.stages.filter((stage) => stage === 'execute')).toHaveLength(2);
    const a3 = handle.getState().tasks.find((task) => task.task_id === 'a3');
    expect(a3?.status).toBe('pending');
  });

  it('aborts on an invalid diff and keeps earlier commits', async () => {
    const planner: PlannerAgent = {
      name: 'planner',
      async propose() {
        return {
          output: { taskStructure: {} },
          diff: {
            kind: 'object',
            fields: {
              tasks: { kind: 'tasks', entries: [{ task_id: 'x', fields: { status: { kind: 'value', value: 'archived' } } }] },
            },
          },
        };
      },
    };
    const { handle, run, calls } = await createHarness(createScriptedAgents([], { planner }));

    const response = await run('Trip');

    expect(response).toMatchObject({
      status: 'failed',
      stage: 'plan',
      stages: ['intake', 'plan'],
      iterations: [],
      error: { code: ErrorCodes.INVALID_STATUS, category: 'validation' },
    });
    expect(response.message).toBe('Task patch x sets an unknown status');
    expect(handle.getState().tasks.map((task) => task.task_id)).toEqual([INTENT_TASK_ID]);
    expect(calls).toEqual([]);
  });

  it('aborts on a persistence failure without a partial merge', async () => {
    let failWrites = (): void => {};
    const follower = createFollowerAgent();
    const { store, handle, run } = await createHarness(
      createScriptedAgents(PLAN, {
        follower: {
          name: 'follower',
          async propose(view, input) {
            failWrites();
            return follower.propose(view, input);
          },
        },
      })
    );
    failWrites = () => {
      store.failWritesTo = 'state_';
    };

    const response = await run('Trip');

    expect(response).toMatchObject({
      status: 'failed',
      stage: 'reflect',
      error: { code: ErrorCodes.PERSISTENCE_WRITE_ERROR, category: 'persistence' },
    });
    expect(response.iterations).toHaveLength(1);

    const statuses = handle.getState().tasks.map((task) => task.status);
    expect(statuses).toEqual(['in_progress', 'pending', 'pending', 'pending']);
    expect(JSON.parse((await store.get('state_s1')) ?? '{}')).toEqual(handle.getState());
  });

  it('wraps agent exceptions', async () => {
    const planner: PlannerAgent = {
      name: 'planner',
      async propose() {
        throw new Error('model quota exceeded');
      },
    };
    const { run } = await createHarness(createScriptedAgents([], { planner }));

    const response = await run('Trip');

    expect(response).toMatchObject({
      status: 'failed',
      stage: 'plan',
      message: 'Agent planner failed: model quota exceeded',
      error: { code: ErrorCodes.AGENT_FAILED, category: 'agent' },
    });
  });

  it('executes only its own tasks when two requests share a session', async () => {
    const { manager, handle, run, calls, store } = await createHarness(createPerMessageAgents());
    const other = await manager.open('s1');
    const orchestrator = new Orchestrator({
      agents: createPerMessageAgents(),
      executor: new TaskExecutor({
        tools: new ToolRegistry(createTravelTools(calls)),
        pool: new WorkerPool(4),
        taskTimeoutMs: 500,
        batchTimeoutMs: 2000,
        maxRetries: 1,
        retryDelayMs: 1,
        resultCacheTtlMs: 0,
      }),
      maxIterations: 3,
      commitMaxAttempts: 3,
      commitRetryDelayMs: 1,
    });
    store.writeDelayMs = 2;

    const [goa, pune] = await Promise.all([
      run('Goa'),
      orchestrator.run({ state: other, history: [] }, 'Pune'),
    ]);
    other.release();

    expect(goa).toMatchObject({ status: 'completed', message: 'Finished Goa' });
    expect(pune).toMatchObject({ status: 'completed', message: 'Finished Pune' });
    expect(goa.iterations[0].results.map((result) => result.task_id)).toEqual(['hotel_Goa']);
    expect(pune.iterations[0].results.map((result) => result.task_id)).toEqual(['hotel_Pune']);
    expect(calls.map((call) => call.args.city).sort()).toEqual(['Goa', 'Pune']);

    const tasks = handle.getState().tasks;
    expect(tasks.map((task) => task.task_id).sort()).toEqual(['hotel_Goa', 'hotel_Pune', 'intent_Goa', 'intent_Pune']);
    expect(tasks.every((task) => task.status === 'done')).toBe(true);
  });

  describe('lock contention', () => {
    function contendingIntake(contend: () => Promise<unknown>, pending: Array<Promise<unknown>>): IntakeAgent {
      const intake = createIntakeAgent();
      return {
        name: 'intake',
        async propose(view, input) {
          pending.push(contend());
          return intake.propose(view, input);
        },
      };
    }

    it('retries a commit whose lock wait timed out', async () => {
      const pending: Array<Promise<unknown>> = [];
      let contend = (): Promise<unknown> => Promise.resolve();
      const harness = await createHarness(createScriptedAgents([], { intake: contendingIntake(() => contend(), pending) }), {
        lockTimeoutMs: 20,
        config: { commitMaxAttempts: 10, commitRetryDelayMs: 5 },
      });
      contend = () => {
        harness.store.writeDelayMs = 50;
        const write = harness.manager.updateTravelInfo('s1', { origin: 'BLR' });
        return write.finally(() => {
          harness.store.writeDelayMs = 0;
        });
      };

      const response = await harness.run('Trip');
      await Promise.all(pending);

      expect(response.status).toBe('completed');
      expect(harness.handle.getState().travel_info.origin).toBe('BLR');
      expect(harness.handle.getState().tasks[0].task_id).toBe(INTENT_TASK_ID);
    });

    it('fails the request when contention outlasts the retries', async () => {
      const pending: Array<Promise<unknown>> = [];
      let contend = (): Promise<unknown> => Promise.resolve();
      const harness = await createHarness(createScriptedAgents([], { intake: contendingIntake(() => contend(), pending) }), {
        lockTimeoutMs: 10,
        config: { commitMaxAttempts: 1 },
      });
      contend = () => {
        harness.store.writeDelayMs = 80;
        return harness.manager.updateTravelInfo('s1', { origin: 'BLR' });
      };

      const response = await harness.run('Trip');
      await Promise.all(pending);

      expect(response).toMatchObject({
        status: 'failed',
        stage: 'intake',
        error: { code: ErrorCodes.CONCURRENCY_TIMEOUT, category: 'concurrency' },
      });
      expect(harness.handle.getState().tasks).toEqual([]);
    });
  });
});
