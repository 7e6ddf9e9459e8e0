/**
 * @fileoverview Tests for SessionService
 */
import { beforeEach, describe, expect, it } from 'vitest';
import {
  ErrorCodes,
  getLoggingContext,
  loadStateTemplate,
  ValidationError,
  type LoggingContext,
} from '@wayfarer/core';
import type { IntakeAgent, OrchestratorAgents } from '../../agents/types.js';
import { TaskExecutor } from '../../executor/task-executor.js';
import { ToolRegistry } from '../../executor/tool-registry.js';
import { WorkerPool } from '../../executor/worker-pool.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import { StateManager } from '../../state/state-manager.js';
import { ConversationHistory } from '../conversation-history.js';
import { SessionService } from '../session-service.js';
import {
  createPerMessageAgents,
  createScriptedAgents,
  createTravelTools,
  FaultyStore,
  type PlannedTask,
} from '../../__fixtures__/index.js';

const template = loadStateTemplate();
const NOW = '2026-03-01T10:00:00.000Z';

const PLAN: PlannedTask[] = [
  { task_id: 'h1', category: 'hotel', tool: { name: 'hotel_search', arguments: { city: 'Goa' } } },
];

describe('SessionService', () => {
  let store: FaultyStore;
  let manager: StateManager;
  let history: ConversationHistory;

  beforeEach(() => {
    store = new FaultyStore();
    manager = new StateManager({ store, template, lockTimeoutMs: 1000 });
    history = new ConversationHistory({ store, now: () => new Date(NOW) });
  });

  function createService(agents: OrchestratorAgents, historyContextMessages = 10): SessionService {
    const executor = new TaskExecutor({
      tools: new ToolRegistry(createTravelTools()),
      pool: new WorkerPool(2),
      taskTimeoutMs: 500,
      batchTimeoutMs: 2000,
      maxRetries: 1,
      retryDelayMs: 1,
      resultCacheTtlMs: 0,
    });
    const orchestrator = new Orchestrator({
      agents,
      executor,
      maxIterations: 2,
      commitMaxAttempts: 1,
      commitRetryDelayMs: 1,
    });
    return new SessionService({
      stateManager: manager,
      orchestrator,
      history,
      historyContextMessages,
      now: () => new Date(NOW),
    });
  }

  it('creates sessions with fresh ids', () => {
    const service = createService(createScriptedAgents(PLAN));
    const first = service.createSession();
    const second = service.createSession();

    expect(first.sessionId).toMatch(/^sess_[0-9a-f]{16}$/);
    expect(first.createdAt).toBe(NOW);
    expect(second.sessionId).not.toBe(first.sessionId);
  });

  it('handles a message end to end', async () => {
    const service = createService(createScriptedAgents(PLAN));

    const response = await service.submitMessage('s1', '  Find a hotel in Goa  ');

    expect(response.status).toBe('completed');
    expect(response.message).toBe('Executed 1 tasks, 1 done before finalizing');
    expect(await history.list('s1')).toEqual([
      { role: 'user', content: 'Find a hotel in Goa', timestamp: NOW },
      { role: 'assistant', content: 'Executed 1 tasks, 1 done before finalizing', timestamp: NOW },
    ]);
    expect(manager.isLoaded('s1')).toBe(false);
  });

  it('rejects empty messages and session ids', async () => {
    const service = createService(createScriptedAgents(PLAN));

    const error = await service.submitMessage('s1', '   ').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      code: ErrorCodes.INVALID_PARAMS,
      message: 'Invalid submitMessage params: message: message must not be empty',
    });

    await expect(service.submitMessage('', 'hello')).rejects.toMatchObject({ code: ErrorCodes.INVALID_PARAMS });
    expect(await history.list('s1')).toEqual([]);
  });

  it('hands recent history to intake and tags logs with the request context', async () => {
    const seen: Array<{ turns: number; context: LoggingContext }> = [];
    const intake: IntakeAgent = {
      name: 'intake',
      async propose(view, input) {
        seen.push({ turns: input.history.length, context: { ...getLoggingContext() } });
        return { output: { needsClarification: true, reply: 'Which dates?' }, diff: view.proposeDiff({}) };
      },
    };
    const service = createService(createScriptedAgents([], { intake }), 3);

    await service.submitMessage('s1', 'Trip to Goa');
    await service.submitMessage('s1', 'Next week');

    expect(seen.map((entry) => entry.turns)).toEqual([0, 2]);
    expect(seen[1].context).toMatchObject({ sessionId: 's1', stage: 'intake' });
    expect(seen[1].context.requestId).toMatch(/^req_[0-9a-f]{16}$/);
    expect(seen[0].context.requestId).not.toBe(seen[1].context.requestId);
  });

  it('records the failure reply and releases the session when a request fails', async () => {
    const service = createService(createScriptedAgents(PLAN));
    store.failWritesTo = 'state_';

    const response = await service.submitMessage('s1', 'Trip');

    expect(response).toMatchObject({ status: 'failed', stage: 'intake', error: { code: ErrorCodes.PERSISTENCE_WRITE_ERROR } });
    expect((await history.list('s1')).map((message) => message.role)).toEqual(['user', 'assistant']);
    expect(manager.isLoaded('s1')).toBe(false);
  });

  it('completes overlapping requests to one session with every task recorded once', async () => {
    const service = createService(createPerMessageAgents());
    store.writeDelayMs = 2;

    const [goa, jaipur] = await Promise.all([
      service.submitMessage('s1', 'Goa'),
      service.submitMessage('s1', 'Jaipur'),
    ]);

    expect(goa).toMatchObject({ status: 'completed', message: 'Finished Goa' });
    expect(jaipur).toMatchObject({ status: 'completed', message: 'Finished Jaipur' });
    expect(manager.isLoaded('s1')).toBe(false);

    const state = await service.resumeSession('s1');
    expect(state.tasks.map((task) => task.task_id).sort()).toEqual([
      'hotel_Goa',
      'hotel_Jaipur',
      'intent_Goa',
      'intent_Jaipur',
    ]);
    expect(state.tasks.every((task) => task.status === 'done')).toBe(true);
    expect(await history.list('s1')).toHaveLength(4);
  });

  it('resumes and clears sessions', async () => {
    const service = createService(createScriptedAgents(PLAN));
    await service.submitMessage('s1', 'Find a hotel');

    const state = await service.resumeSession('s1');
    expect(state.tasks.map((task) => task.task_id)).toEqual(['intent_1', 'h1']);
    expect(manager.isLoaded('s1')).toBe(false);

    await service.clearSession('s1');
    expect(await store.get('state_s1')).toBeUndefined();
    expect(await store.get('messages_s1')).toBeUndefined();
    expect((await service.resumeSession('s1')).tasks).toEqual([]);
  });
});
