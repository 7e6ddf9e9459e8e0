/**
 * @fileoverview Orchestrator Loop
 *
 * Drives one request through intake, plan, execute, reflect and finalize.
 * The loop is sequential and is the only caller of `commit`: agents return
 * proposals, the orchestrator validates and commits them in stage order.
 * Any structural failure ends the request with a failed response; canonical
 * state keeps every commit made before the failure and nothing partial.
 */

import {
  AgentError,
  ConcurrencyTimeoutError,
  createLogger,
  isEmptyDiff,
  isWayfarerError,
  parseDiff,
  TASK_LIST_FIELD,
  toErrorPayload,
  updateLoggingContext,
  type ChatMessage,
  type Diff,
  type ErrorPayload,
  type SessionState,
  type Task,
  type TaskIteration,
} from '@wayfarer/core';
import type { AgentProposal, OrchestratorAgents, SubAgent } from '../agents/types.js';
import type { TaskExecutor } from '../executor/task-executor.js';
import { agentViewOf, type AgentStateView, type SessionStateWriter } from '../state/session-handle.js';
import { sleep } from '../utils/async.js';
import { assertTransition, type Stage } from './stages.js';

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorConfig {
  agents: OrchestratorAgents;
  executor: TaskExecutor;
  /** Upper bound on execute/reflect rounds per request */
  maxIterations: number;
  /** Attempts per commit when the session lock wait times out */
  commitMaxAttempts: number;
  commitRetryDelayMs: number;
}

export interface OrchestratorContext {
  state: SessionStateWriter;
  /** Recent conversation turns handed to the intake agent */
  history: ChatMessage[];
}

export type OrchestratorStatus = 'completed' | 'needs_clarification' | 'failed';

export interface OrchestratorResponse {
  sessionId: string;
  status: OrchestratorStatus;
  /** Reply for the user: the summary, the clarifying question, or the failure message */
  message: string;
  /** Last stage reached; the failing stage when status is `failed` */
  stage: Stage;
  /** Stages visited, in order */
  stages: Stage[];
  iterations: TaskIteration[];
  taskStructure?: Record<string, string[]>;
  error?: ErrorPayload;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly logger = createLogger('orchestrator');
  private readonly agents: OrchestratorAgents;
  private readonly executor: TaskExecutor;
  private readonly maxIterations: number;
  private readonly commitMaxAttempts: number;
  private readonly commitRetryDelayMs: number;

  constructor(config: OrchestratorConfig) {
    this.agents = config.agents;
    this.executor = config.executor;
    this.maxIterations = Math.max(1, config.maxIterations);
    this.commitMaxAttempts = Math.max(1, config.commitMaxAttempts);
    this.commitRetryDelayMs = config.commitRetryDelayMs;
  }

  async run(context: OrchestratorContext, message: string): Promise<OrchestratorResponse> {
    const writer = context.state;
    const view = agentViewOf(writer);
    const stages: Stage[] = [];
    const iterations: TaskIteration[] = [];
    let stage: Stage = 'intake';
    let taskStructure: Record<string, string[]> | undefined;

    const enter = (next: Stage): void => {
      if (stages.length > 0) assertTransition(stage, next);
      stage = next;
      stages.push(next);
      updateLoggingContext({ stage: next });
      this.logger.debug('Stage entered', { stage: next });
    };

    const respond = (status: OrchestratorStatus, reply: string): OrchestratorResponse => ({
      sessionId: writer.sessionId,
      status,
      message: reply,
      stage,
      stages,
      iterations,
      ...(taskStructure ? { taskStructure } : {}),
    });

    try {
      enter('intake');
      const intake = await this.invoke(this.agents.intake, view, { message, history: context.history });
      await this.commit(writer, intake.diff);
      if (intake.output.needsClarification) {
        enter('done');
        this.logger.info('Request needs clarification');
        return respond('needs_clarification', intake.output.reply ?? '');
      }

      enter('plan');
      let known = taskIds(writer.getState());
      const plan = await this.invoke(this.agents.planner, view, {
        message,
        intentTaskId: intake.output.intentTaskId,
      });
      taskStructure = plan.output.taskStructure;
      let batch = newPendingTasks(known, plan.diff, await this.commit(writer, plan.diff));

      for (let iteration = 1; ; iteration++) {
        enter('execute');
        const record = await this.executor.runIteration(iteration, batch);
        iterations.push(record);
        this.logger.info('Iteration executed', { iteration, ...record.summary });

        enter('reflect');
        known = taskIds(writer.getState());
        const reflect = await this.invoke(this.agents.follower, view, {
          message,
          iteration,
          maxIterations: this.maxIterations,
          results: record.results,
        });
        batch = newPendingTasks(known, reflect.diff, await this.commit(writer, reflect.diff));

        if (!reflect.output.needsAdditionalTasks || batch.length === 0) break;
        if (iteration >= this.maxIterations) {
          this.logger.warn('Iteration limit reached with follow-up work outstanding', {
            maxIterations: this.maxIterations,
            outstanding: batch.length,
          });
          break;
        }
      }

      enter('finalize');
      const finalize = await this.invoke(this.agents.finalizer, view, { message, iterations });
      await this.commit(writer, finalize.diff);
      enter('done');

      return respond('completed', finalize.output.summary);
    } catch (error) {
      const payload = toErrorPayload(error);
      this.logger.error('Request aborted', { stage, code: payload.code, err: error });
      return { ...respond('failed', payload.message), error: payload };
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async invoke<TInput, TOutput>(
    agent: SubAgent<TInput, TOutput>,
    view: AgentStateView,
    input: TInput
  ): Promise<AgentProposal<TOutput>> {
    try {
      return await agent.propose(view, input);
    } catch (error) {
      if (isWayfarerError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new AgentError(`Agent ${agent.name} failed: ${reason}`, { agent: agent.name, cause: error });
    }
  }

  /**
   * Validate and commit, retrying only when the session lock wait timed out
   */
  private async commit(writer: SessionStateWriter, diff: Diff): Promise<SessionState> {
    const validated = parseDiff(diff);
    if (isEmptyDiff(validated)) return writer.getState();

    for (let attempt = 1; ; attempt++) {
      try {
        return await writer.commit(validated);
      } catch (error) {
        if (!(error instanceof ConcurrencyTimeoutError) || attempt >= this.commitMaxAttempts) throw error;
        this.logger.warn('Commit lock contended, retrying', {
          attempt,
          maxAttempts: this.commitMaxAttempts,
          waitedMs: error.waitedMs,
        });
        await sleep(this.commitRetryDelayMs);
      }
    }
  }
}

function taskIds(state: SessionState): Set<string> {
  return new Set(state.tasks.map((task) => task.task_id));
}

/**
 * Pending tasks this diff introduced. Tasks a concurrent request added to the
 * same session are left to that request.
 */
function newPendingTasks(known: Set<string>, diff: Diff, state: SessionState): Task[] {
  const list = diff.fields[TASK_LIST_FIELD];
  const proposed = new Set(list?.kind === 'tasks' ? list.entries.map((entry) => entry.task_id) : []);
  return state.tasks.filter(
    (task) => proposed.has(task.task_id) && !known.has(task.task_id) && task.status === 'pending'
  );
}
