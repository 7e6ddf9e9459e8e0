/**
 * @fileoverview Task Executor
 *
 * Runs a batch of planned tasks through the shared worker pool. Each task's
 * tool call is bounded by a per-task timeout and retried on thrown errors;
 * the whole batch is bounded by its own timeout. One task failing never
 * affects its siblings, and results always line up with the input order.
 */

import {
  createLogger,
  ErrorCodes,
  isJsonObject,
  stableStringify,
  toJsonValue,
  toolCallSchema,
  ToolExecutionError,
  withLoggingContext,
  type ErrorCode,
  type JsonObject,
  type JsonValue,
  type Task,
  type TaskIteration,
  type TaskResult,
  type ToolCall,
} from '@wayfarer/core';
import { sleep, TimeoutError, withTimeout } from '../utils/async.js';
import type { ToolInvoker } from './tool-registry.js';
import type { WorkerPool } from './worker-pool.js';

// =============================================================================
// Types
// =============================================================================

export interface TaskExecutorConfig {
  tools: ToolInvoker;
  pool: WorkerPool;
  /** Bound on one tool call attempt */
  taskTimeoutMs: number;
  /** Bound on a whole batch */
  batchTimeoutMs: number;
  /** Attempts per task when the tool throws */
  maxRetries: number;
  retryDelayMs: number;
  /** Lifetime of cached successful results; 0 disables caching */
  resultCacheTtlMs: number;
  /** Millisecond clock, for cache expiry */
  now?: () => number;
}

export interface RunOptions {
  /** Aborts the batch like a batch timeout */
  signal?: AbortSignal;
  batchTimeoutMs?: number;
}

interface CacheEntry {
  value: JsonValue;
  expiresAt: number;
}

type AttemptOutcome =
  | { ok: true; value: JsonValue; attempts: number }
  | { ok: false; code: ErrorCode; message: string; attempts: number; details?: JsonValue };

// =============================================================================
// TaskExecutor
// =============================================================================

export class TaskExecutor {
  private readonly logger = createLogger('executor:tasks');
  private readonly tools: ToolInvoker;
  private readonly pool: WorkerPool;
  private readonly taskTimeoutMs: number;
  private readonly batchTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly resultCacheTtlMs: number;
  private readonly now: () => number;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(config: TaskExecutorConfig) {
    this.tools = config.tools;
    this.pool = config.pool;
    this.taskTimeoutMs = config.taskTimeoutMs;
    this.batchTimeoutMs = config.batchTimeoutMs;
    this.maxRetries = Math.max(1, config.maxRetries);
    this.retryDelayMs = config.retryDelayMs;
    this.resultCacheTtlMs = config.resultCacheTtlMs;
    this.now = config.now ?? Date.now;
  }

  /**
   * Execute tasks concurrently. Result `i` belongs to `tasks[i]`.
   * Tool-level failures become failed results; this never rejects for them.
   */
  async run(tasks: Task[], options: RunOptions = {}): Promise<TaskResult[]> {
    if (tasks.length === 0) return [];

    const batch = new AbortController();
    const abortBatch = (): void => batch.abort();
    if (options.signal?.aborted) batch.abort();
    options.signal?.addEventListener('abort', abortBatch, { once: true });

    const batchTimeoutMs = options.batchTimeoutMs ?? this.batchTimeoutMs;
    const results: Array<TaskResult | undefined> = tasks.map(() => undefined);

    const jobs = dispatchOrder(tasks).map((index) => {
      const task = tasks[index];
      return this.pool
        .submit(
          (signal) => withLoggingContext({ taskId: task.task_id }, () => this.executeTask(task, signal)),
          { signal: batch.signal }
        )
        .then(
          (result) => {
            results[index] = result;
          },
          (error: unknown) => {
            results[index] = failedResult(task, undefined, {
              code: batch.signal.aborted ? ErrorCodes.BATCH_TIMEOUT : ErrorCodes.TOOL_EXECUTION_FAILED,
              message: error instanceof Error ? error.message : String(error),
              attempts: 0,
            }, 0);
          }
        );
    });

    try {
      await withTimeout(Promise.all(jobs), batchTimeoutMs);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      this.logger.warn('Batch timeout elapsed; unfinished tasks marked failed', {
        batchTimeoutMs,
        unfinished: results.filter((result) => result === undefined).length,
      });
    } finally {
      batch.abort();
      options.signal?.removeEventListener('abort', abortBatch);
    }

    return tasks.map(
      (task, index) =>
        results[index] ??
        failedResult(task, undefined, {
          code: ErrorCodes.BATCH_TIMEOUT,
          message: `Batch did not finish within ${batchTimeoutMs}ms`,
          attempts: 0,
        }, batchTimeoutMs)
    );
  }

  /**
   * Run one batch and summarize it
   */
  async runIteration(iteration: number, tasks: Task[], options: RunOptions = {}): Promise<TaskIteration> {
    const startedAt = new Date();
    const start = performance.now();
    const results = await withLoggingContext({ iteration }, () => this.run(tasks, options));
    const completed = results.filter((result) => result.status === 'done').length;

    return {
      iteration,
      started_at: startedAt.toISOString(),
      completed_at: new Date().toISOString(),
      tasks: structuredClone(tasks),
      results,
      summary: {
        total: results.length,
        completed,
        failed: results.length - completed,
        duration_ms: Math.round(performance.now() - start),
      },
    };
  }

  // ===========================================================================
  // Single task
  // ===========================================================================

  private async executeTask(task: Task, signal: AbortSignal): Promise<TaskResult> {
    const start = performance.now();
    const parsed = toolCallSchema.safeParse(task.metadata.tool);
    if (!parsed.success) {
      return failedResult(task, undefined, {
        code: ErrorCodes.TOOL_CALL_MISSING,
        message: `Task ${task.task_id} has no valid tool call in metadata.tool`,
        attempts: 0,
      }, 0);
    }

    const call = parsed.data;
    const cacheKey = `${call.name}:${stableStringify(call.arguments)}`;
    const cached = this.readCache(cacheKey);
    if (cached !== undefined) {
      this.logger.debug('Tool result served from cache', { taskId: task.task_id, toolName: call.name });
      return {
        task_id: task.task_id,
        status: 'done',
        metadata: { tool: call.name, attempts: 0, cached: true, duration_ms: 0, result: cached },
      };
    }

    const outcome = await this.invokeWithRetry(task, call, signal);
    const durationMs = Math.round(performance.now() - start);

    if (!outcome.ok) {
      this.logger.warn('Task failed', {
        taskId: task.task_id,
        toolName: call.name,
        code: outcome.code,
        attempts: outcome.attempts,
      });
      return failedResult(task, call, outcome, durationMs);
    }

    this.writeCache(cacheKey, outcome.value);
    return {
      task_id: task.task_id,
      status: 'done',
      metadata: {
        tool: call.name,
        attempts: outcome.attempts,
        cached: false,
        duration_ms: durationMs,
        result: outcome.value,
      },
    };
  }

  private async invokeWithRetry(task: Task, call: ToolCall, signal: AbortSignal): Promise<AttemptOutcome> {
    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) {
        return { ok: false, code: ErrorCodes.BATCH_TIMEOUT, message: 'Batch aborted', attempts: attempt - 1 };
      }

      const controller = new AbortController();
      const forward = (): void => controller.abort();
      signal.addEventListener('abort', forward, { once: true });

      try {
        const raw = await withTimeout(
          Promise.resolve().then(() => this.tools.executeToolByName(call.name, call.arguments, controller.signal)),
          this.taskTimeoutMs,
          () => controller.abort()
        );
        const value = toJsonValue(raw);
        if (isToolErrorPayload(value)) {
          return {
            ok: false,
            code: ErrorCodes.TOOL_REPORTED_ERROR,
            message: describeToolError(value.error),
            attempts: attempt,
            details: value,
          };
        }
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        if (error instanceof TimeoutError) {
          return {
            ok: false,
            code: ErrorCodes.TOOL_TIMEOUT,
            message: `Tool ${call.name} timed out after ${this.taskTimeoutMs}ms`,
            attempts: attempt,
          };
        }

        const message = error instanceof Error ? error.message : String(error);
        const retryable = error instanceof ToolExecutionError ? error.isRetryable : true;
        if (!retryable || attempt >= this.maxRetries) {
          return {
            ok: false,
            code: error instanceof ToolExecutionError ? toErrorCode(error.code) : ErrorCodes.TOOL_EXECUTION_FAILED,
            message,
            attempts: attempt,
          };
        }

        this.logger.warn('Tool call failed, retrying', {
          taskId: task.task_id,
          toolName: call.name,
          attempt,
          maxRetries: this.maxRetries,
          error: message,
        });
        const waited = await sleep(this.retryDelayMs, signal);
        if (!waited) {
          return { ok: false, code: ErrorCodes.BATCH_TIMEOUT, message: 'Batch aborted', attempts: attempt };
        }
      } finally {
        signal.removeEventListener('abort', forward);
      }
    }
  }

  // ===========================================================================
  // Cache
  // ===========================================================================

  private readCache(key: string): JsonValue | undefined {
    if (this.resultCacheTtlMs <= 0) return undefined;
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  private writeCache(key: string, value: JsonValue): void {
    if (this.resultCacheTtlMs <= 0) return;
    this.cache.set(key, { value: structuredClone(value), expiresAt: this.now() + this.resultCacheTtlMs });
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Input indices ordered by `metadata.priority`, highest first; ties keep
 * input order
 */
export function dispatchOrder(tasks: Task[]): number[] {
  const priorityOf = (task: Task): number =>
    typeof task.metadata.priority === 'number' ? task.metadata.priority : 0;
  return tasks
    .map((_, index) => index)
    .sort((a, b) => priorityOf(tasks[b]) - priorityOf(tasks[a]) || a - b);
}

function isToolErrorPayload(value: JsonValue): value is JsonObject & { error: JsonValue } {
  return isJsonObject(value) && 'error' in value && value.error !== null;
}

function describeToolError(error: JsonValue): string {
  if (typeof error === 'string') return error;
  if (isJsonObject(error) && typeof error.message === 'string') return error.message;
  return JSON.stringify(error);
}

function toErrorCode(code: string): ErrorCode {
  const known = Object.values(ErrorCodes).find((candidate) => candidate === code);
  return known ?? ErrorCodes.TOOL_EXECUTION_FAILED;
}

function failedResult(
  task: Task,
  call: ToolCall | undefined,
  failure: { code: ErrorCode; message: string; attempts: number; details?: JsonValue },
  durationMs: number
): TaskResult {
  const error: JsonObject = { code: failure.code, message: failure.message };
  if (failure.details !== undefined) error.details = failure.details;

  const metadata: JsonObject = {
    attempts: failure.attempts,
    cached: false,
    duration_ms: durationMs,
    error,
  };
  if (call) metadata.tool = call.name;

  return { task_id: task.task_id, status: 'failed', metadata };
}
