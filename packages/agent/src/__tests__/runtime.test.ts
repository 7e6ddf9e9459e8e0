/**
 * @fileoverview Tests for the runtime factory
 */
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, resetLogger, type WayfarerSettings } from '@wayfarer/core';
import { createWayfarerRuntime, type WayfarerRuntime } from '../runtime.js';
import { ToolRegistry } from '../executor/tool-registry.js';
import { InMemorySessionStore } from '../store/memory-store.js';
import { SqliteSessionStore } from '../store/sqlite-store.js';
import { createScriptedAgents, createTravelTools, type PlannedTask } from '../__fixtures__/index.js';

const PLAN: PlannedTask[] = [
  { task_id: 'f1', category: 'flight', tool: { name: 'flight_search', arguments: { origin: 'DEL', destination: 'BOM' } } },
];

function settings(overrides: Partial<WayfarerSettings> = {}): WayfarerSettings {
  return {
    ...DEFAULT_SETTINGS,
    executor: { ...DEFAULT_SETTINGS.executor, maxConcurrency: 2, retryDelayMs: 1 },
    ...overrides,
  };
}

describe('createWayfarerRuntime', () => {
  let runtime: WayfarerRuntime | undefined;

  afterEach(async () => {
    await runtime?.close();
    runtime = undefined;
    resetLogger();
  });

  it('wires an in-memory runtime from settings', async () => {
    runtime = createWayfarerRuntime({ agents: createScriptedAgents(PLAN), tools: createTravelTools(), settings: settings() });

    expect(runtime.store).toBeInstanceOf(InMemorySessionStore);
    expect(runtime.pool.capacity).toBe(2);
    expect(runtime.tools.has('flight_search')).toBe(true);

    const { sessionId } = runtime.sessions.createSession();
    const response = await runtime.sessions.submitMessage(sessionId, 'Fly me to Mumbai');

    expect(response.status).toBe('completed');
    expect(response.iterations[0].results[0]).toMatchObject({ task_id: 'f1', status: 'done' });
    expect(await runtime.history.list(sessionId)).toHaveLength(2);
  });

  it('opens a SQLite store when configured', async () => {
    runtime = createWayfarerRuntime({
      agents: createScriptedAgents(PLAN),
      tools: createTravelTools(),
      settings: settings({ store: { kind: 'sqlite', sqlitePath: ':memory:' } }),
    });

    expect(runtime.store).toBeInstanceOf(SqliteSessionStore);
    await runtime.sessions.submitMessage('sess_sqlite', 'Fly me to Mumbai');
    const state = await runtime.sessions.resumeSession('sess_sqlite');
    expect(state.tasks.map((task) => [task.task_id, task.status])).toEqual([
      ['intent_1', 'done'],
      ['f1', 'done'],
    ]);
  });

  it('accepts a prepared registry and store', () => {
    const tools = new ToolRegistry(createTravelTools());
    const store = new InMemorySessionStore();
    runtime = createWayfarerRuntime({ agents: createScriptedAgents([]), tools, store, settings: settings() });

    expect(runtime.tools).toBe(tools);
    expect(runtime.store).toBe(store);
  });
});
