/**
 * @fileoverview Tests for TaskExecutor
 */
import { describe, expect, it } from 'vitest';
import { ErrorCodes, type JsonObject, type Task } from '@wayfarer/core';
import { dispatchOrder, TaskExecutor, type TaskExecutorConfig } from '../task-executor.js';
import { ToolRegistry, type ToolDefinition } from '../tool-registry.js';
import { WorkerPool } from '../worker-pool.js';
import { createTravelTools, delay, type CallLog } from '../../__fixtures__/tools.js';

function task(taskId: string, metadata: JsonObject = {}): Task {
  return {
    task_id: taskId,
    timestamp: '2026-03-01T10:00:00.000Z',
    agent_origin: 'planner',
    intent: 'search',
    status: 'pending',
    metadata,
  };
}

function toolTask(taskId: string, name: string, args: JsonObject = {}, priority?: number): Task {
  const metadata: JsonObject = { tool: { name, arguments: args } };
  if (priority !== undefined) metadata.priority = priority;
  return task(taskId, metadata);
}

function createExecutor(
  tools: ToolDefinition[],
  overrides: Partial<TaskExecutorConfig> = {}
): TaskExecutor {
  return new TaskExecutor({
    tools: new ToolRegistry(tools),
    pool: new WorkerPool(4),
    taskTimeoutMs: 200,
    batchTimeoutMs: 2000,
    maxRetries: 3,
    retryDelayMs: 1,
    resultCacheTtlMs: 0,
    ...overrides,
  });
}

describe('dispatchOrder', () => {
  it('sorts by priority descending and keeps input order on ties', () => {
    const tasks = [
      toolTask('a', 'x', {}, 1),
      toolTask('b', 'x', {}, 5),
      toolTask('c', 'x'),
      toolTask('d', 'x', {}, 5),
    ];
    expect(dispatchOrder(tasks)).toEqual([1, 3, 0, 2]);
  });
});

describe('TaskExecutor', () => {
  it('returns an empty list for an empty batch', async () => {
    await expect(createExecutor([]).run([])).resolves.toEqual([]);
  });

  it('isolates failures and keeps results in input order', async () => {
    const executor = createExecutor(createTravelTools());
    const results = await executor.run([
      toolTask('t1', 'flight_search', { origin: 'DEL', destination: 'GOI' }),
      toolTask('t2', 'train_search', { from: 'NDLS' }),
      task('t3'),
      toolTask('t4', 'bus_search'),
      toolTask('t5', 'hotel_search', { city: 'Goa' }),
    ]);

    expect(results.map((result) => [result.task_id, result.status])).toEqual([
      ['t1', 'done'],
      ['t2', 'failed'],
      ['t3', 'failed'],
      ['t4', 'failed'],
      ['t5', 'done'],
    ]);

    expect(results[0].metadata).toEqual({
      tool: 'flight_search',
      attempts: 1,
      cached: false,
      duration_ms: expect.any(Number),
      result: { flights: [{ code: 'AI101', from: 'DEL', to: 'GOI', price: 4200 }] },
    });
    expect(results[1].metadata.error).toEqual({
      code: ErrorCodes.TOOL_REPORTED_ERROR,
      message: 'rail service unavailable',
      details: { error: 'rail service unavailable' },
    });
    expect(results[1].metadata.attempts).toBe(1);
    expect(results[2].metadata.error).toEqual({
      code: ErrorCodes.TOOL_CALL_MISSING,
      message: 'Task t3 has no valid tool call in metadata.tool',
    });
    expect(results[3].metadata).toMatchObject({
      tool: 'bus_search',
      attempts: 1,
      error: { code: ErrorCodes.TOOL_NOT_FOUND, message: 'Tool bus_search not found' },
    });
    expect(results[4].metadata.result).toEqual({ hotels: [{ name: 'Test Residency', city: 'Goa' }] });
  });

  it('fails a task that exceeds the per-task timeout without retrying it', async () => {
    const calls: CallLog[] = [];
    const executor = createExecutor(createTravelTools(calls), { taskTimeoutMs: 30 });

    const [slow, fast] = await executor.run([
      toolTask('slow', 'map_lookup', { query: 'fort', delayMs: 500 }),
      toolTask('fast', 'hotel_search', { city: 'Jaipur' }),
    ]);

    expect(slow.status).toBe('failed');
    expect(slow.metadata).toMatchObject({
      attempts: 1,
      error: { code: ErrorCodes.TOOL_TIMEOUT, message: 'Tool map_lookup timed out after 30ms' },
    });
    expect(fast.status).toBe('done');
    expect(calls.filter((call) => call.name === 'map_lookup')).toHaveLength(1);
  });

  it('retries thrown errors up to maxRetries', async () => {
    let flakyCalls = 0;
    let brokenCalls = 0;
    const executor = createExecutor([
      {
        name: 'flaky',
        execute: () => {
          flakyCalls++;
          if (flakyCalls < 3) throw new Error('upstream 503');
          return { ok: true };
        },
      },
      {
        name: 'broken',
        execute: () => {
          brokenCalls++;
          throw new Error('upstream 500');
        },
      },
    ]);

    const [flaky, broken] = await executor.run([toolTask('f', 'flaky'), toolTask('b', 'broken')]);

    expect(flaky).toMatchObject({ status: 'done', metadata: { attempts: 3, result: { ok: true } } });
    expect(broken).toMatchObject({
      status: 'failed',
      metadata: { attempts: 3, error: { code: ErrorCodes.TOOL_EXECUTION_FAILED, message: 'upstream 500' } },
    });
    expect(flakyCalls).toBe(3);
    expect(brokenCalls).toBe(3);
  });

  it('does not retry invalid parameters', async () => {
    const calls: CallLog[] = [];
    const executor = createExecutor(createTravelTools(calls));
    const [result] = await executor.run([toolTask('t', 'flight_search', { origin: 'DELHI' })]);

    expect(result.status).toBe('failed');
    expect(result.metadata).toMatchObject({ attempts: 1, error: { code: ErrorCodes.TOOL_INVALID_PARAMS } });
    expect(calls).toEqual([]);
  });

  it('marks unfinished tasks failed when the batch timeout elapses', async () => {
    const executor = createExecutor(createTravelTools(), {
      pool: new WorkerPool(2),
      taskTimeoutMs: 5000,
      batchTimeoutMs: 40,
    });

    const [slow, fast] = await executor.run([
      toolTask('slow', 'map_lookup', { delayMs: 2000 }),
      toolTask('fast', 'hotel_search', { city: 'Pune' }),
    ]);

    expect(fast.status).toBe('done');
    expect(slow).toEqual({
      task_id: 'slow',
      status: 'failed',
      metadata: {
        attempts: 0,
        cached: false,
        duration_ms: 40,
        error: { code: ErrorCodes.BATCH_TIMEOUT, message: 'Batch did not finish within 40ms' },
      },
    });
  });

  it('cancels queued tasks when the batch times out', async () => {
    const calls: CallLog[] = [];
    const pool = new WorkerPool(1);
    const executor = createExecutor(createTravelTools(calls), { pool, taskTimeoutMs: 5000, batchTimeoutMs: 30 });

    const results = await executor.run([
      toolTask('slow', 'map_lookup', { delayMs: 2000 }),
      toolTask('queued', 'hotel_search', { city: 'Pune' }),
    ]);

    expect(results.map((result) => result.metadata.error)).toEqual([
      { code: ErrorCodes.BATCH_TIMEOUT, message: 'Batch did not finish within 30ms' },
      { code: ErrorCodes.BATCH_TIMEOUT, message: 'Batch did not finish within 30ms' },
    ]);
    await delay(10);
    expect(calls.map((call) => call.name)).toEqual(['map_lookup']);
    expect(pool.active).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it('dispatches higher-priority tasks first', async () => {
    const order: string[] = [];
    const executor = createExecutor(
      [
        {
          name: 'record',
          execute: (args) => {
            order.push(String(args.id));
            return { id: args.id ?? null };
          },
        },
      ],
      { pool: new WorkerPool(1) }
    );

    const results = await executor.run([
      toolTask('low', 'record', { id: 'low' }, 1),
      toolTask('high', 'record', { id: 'high' }, 9),
      toolTask('none', 'record', { id: 'none' }),
    ]);

    expect(order).toEqual(['high', 'low', 'none']);
    expect(results.map((result) => result.task_id)).toEqual(['low', 'high', 'none']);
  });

  it('serves repeated calls from the cache until the entry expires', async () => {
    const calls: CallLog[] = [];
    let now = 1_000;
    const executor = createExecutor(createTravelTools(calls), { resultCacheTtlMs: 500, now: () => now });
    const search = (id: string) => toolTask(id, 'hotel_search', { city: 'Goa' });

    const [first] = await executor.run([search('a')]);
    const [second] = await executor.run([search('b')]);
    expect(first.metadata.cached).toBe(false);
    expect(second.metadata).toEqual({
      tool: 'hotel_search',
      attempts: 0,
      cached: true,
      duration_ms: 0,
      result: { hotels: [{ name: 'Test Residency', city: 'Goa' }] },
    });
    expect(calls).toHaveLength(1);

    now += 500;
    const [third] = await executor.run([search('c')]);
    expect(third.metadata.cached).toBe(false);
    expect(calls).toHaveLength(2);
  });

  it('does not cache failures', async () => {
    const calls: CallLog[] = [];
    const executor = createExecutor(createTravelTools(calls), { resultCacheTtlMs: 60_000 });

    await executor.run([toolTask('a', 'train_search', { from: 'NDLS' })]);
    const [again] = await executor.run([toolTask('b', 'train_search', { from: 'NDLS' })]);

    expect(again.metadata.cached).toBe(false);
    expect(calls).toHaveLength(2);
  });

  it('summarizes an iteration', async () => {
    const executor = createExecutor(createTravelTools());
    const tasks = [toolTask('ok', 'hotel_search', { city: 'Goa' }), toolTask('bad', 'train_search')];

    const iteration = await executor.runIteration(2, tasks);

    expect(iteration.iteration).toBe(2);
    expect(iteration.tasks).toEqual(tasks);
    expect(iteration.tasks).not.toBe(tasks);
    expect(iteration.results.map((result) => result.status)).toEqual(['done', 'failed']);
    expect(iteration.summary).toMatchObject({ total: 2, completed: 1, failed: 1 });
    expect(Date.parse(iteration.completed_at)).toBeGreaterThanOrEqual(Date.parse(iteration.started_at));
  });

  it('treats an external abort like a batch timeout', async () => {
    const executor = createExecutor(createTravelTools(), { taskTimeoutMs: 5000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const [result] = await executor.run([toolTask('slow', 'map_lookup', { delayMs: 2000 })], {
      signal: controller.signal,
    });

    expect(result.status).toBe('failed');
    expect(result.metadata.error).toMatchObject({ code: ErrorCodes.BATCH_TIMEOUT });
  });
});
