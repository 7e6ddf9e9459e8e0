/**
 * @fileoverview State Manager
 *
 * Sole owner of canonical session state. Everything else reads snapshots or
 * proposes diffs; only `commit` mutates, and it does so under a per-session
 * lock: merge, persist, then swap. A failed persist leaves both the store
 * and the in-memory state at their pre-commit values.
 *
 * A session stays cached only while at least one handle from `open` is held;
 * `load` and `commit` without a handle drop the cached copy when they finish.
 */

import {
  createInitialState,
  createLogger,
  createTaskId,
  mergeState,
  parseDiff,
  PersistenceError,
  proposeDiff,
  SessionError,
  sessionStateSchema,
  taskDiff,
  categorizeError,
  type Diff,
  type JsonObject,
  type NewTask,
  type SessionState,
  type StateTemplate,
  type StateUpdates,
} from '@wayfarer/core';
import type { SessionStore } from '../store/types.js';
import { stateKey } from '../store/keys.js';
import { KeyedMutex } from './keyed-mutex.js';
import { SessionStateHandle } from './session-handle.js';

// =============================================================================
// Types
// =============================================================================

export interface StateManagerConfig {
  store: SessionStore;
  /** Template new sessions start from */
  template: StateTemplate;
  /** Longest a commit waits for the session lock (0 = unbounded) */
  lockTimeoutMs: number;
  /** Clock used to stamp new tasks */
  now?: () => Date;
}

// =============================================================================
// StateManager
// =============================================================================

export class StateManager {
  private readonly logger = createLogger('state:manager');
  private readonly store: SessionStore;
  private readonly template: StateTemplate;
  private readonly lockTimeoutMs: number;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();
  private readonly states = new Map<string, SessionState>();
  private readonly openHandles = new Map<string, number>();

  constructor(config: StateManagerConfig) {
    this.store = config.store;
    this.template = config.template;
    this.lockTimeoutMs = config.lockTimeoutMs;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Load canonical state, initializing from the template when the store has
   * none. Returns a snapshot.
   */
  async load(sessionId: string): Promise<SessionState> {
    const release = await this.locks.acquire(sessionId, this.lockTimeoutMs);
    try {
      return structuredClone(await this.loadUnlocked(sessionId));
    } finally {
      this.evictUnlessOpen(sessionId);
      release();
    }
  }

  /**
   * Deep, independent snapshot of a loaded session
   *
   * @throws SessionError when the session has not been loaded
   */
  getState(sessionId: string): SessionState {
    const state = this.states.get(sessionId);
    if (!state) {
      throw new SessionError(`Session ${sessionId} is not loaded`, { sessionId });
    }
    return structuredClone(state);
  }

  /**
   * Pure helper; never touches canonical state or the store
   */
  proposeDiff(updates: StateUpdates): Diff {
    return proposeDiff(updates);
  }

  /**
   * Apply a diff atomically: validate, lock, merge, persist, swap.
   *
   * @throws ValidationError for a malformed diff or an illegal transition
   * @throws ConcurrencyTimeoutError when the lock wait exceeds its bound
   * @throws PersistenceError when the store rejects the write; state is unchanged
   */
  async commit(sessionId: string, diff: Diff): Promise<SessionState> {
    const validated = parseDiff(diff);
    const release = await this.locks.acquire(sessionId, this.lockTimeoutMs);
    try {
      const current = await this.loadUnlocked(sessionId);
      const next = mergeState(current, validated, { timestamp: this.now().toISOString() });
      await this.persist(sessionId, next);
      this.states.set(sessionId, next);
      this.logger.debug('State committed', { sessionId, fields: Object.keys(validated.fields) });
      return structuredClone(next);
    } finally {
      this.evictUnlessOpen(sessionId);
      release();
    }
  }

  // ===========================================================================
  // Convenience writers
  // ===========================================================================

  /**
   * Add a task, filling id, timestamp, status and metadata when absent
   */
  async addTask(sessionId: string, task: NewTask): Promise<SessionState> {
    const entry: JsonObject = {
      task_id: task.task_id ?? createTaskId(),
      timestamp: task.timestamp ?? this.now().toISOString(),
      agent_origin: task.agent_origin ?? 'orchestrator',
      intent: task.intent,
      status: task.status ?? 'pending',
      metadata: task.metadata ?? {},
    };
    return this.commit(sessionId, taskDiff([entry]));
  }

  async updateTravelInfo(sessionId: string, updates: JsonObject): Promise<SessionState> {
    return this.commit(sessionId, proposeDiff({ travel_info: updates }));
  }

  async updateUserProfile(sessionId: string, updates: JsonObject): Promise<SessionState> {
    return this.commit(sessionId, proposeDiff({ user_profile: updates }));
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Load a session and return a writer handle. Call `release()` on the handle
   * when the request ends.
   */
  async open(sessionId: string): Promise<SessionStateHandle> {
    // Counted before loading so a concurrent release cannot evict the session
    this.openHandles.set(sessionId, (this.openHandles.get(sessionId) ?? 0) + 1);
    try {
      await this.load(sessionId);
    } catch (error) {
      this.releaseHandle(sessionId);
      throw error;
    }
    return new SessionStateHandle(this, sessionId, () => this.releaseHandle(sessionId));
  }

  /**
   * Delete stored state and drop the cached copy
   */
  async clear(sessionId: string): Promise<void> {
    const release = await this.locks.acquire(sessionId, this.lockTimeoutMs);
    try {
      await this.deleteStored(sessionId);
      this.states.delete(sessionId);
      this.logger.info('Session state cleared', { sessionId });
    } finally {
      release();
    }
  }

  isLoaded(sessionId: string): boolean {
    return this.states.has(sessionId);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private releaseHandle(sessionId: string): void {
    const remaining = (this.openHandles.get(sessionId) ?? 1) - 1;
    if (remaining > 0) {
      this.openHandles.set(sessionId, remaining);
      return;
    }
    this.openHandles.delete(sessionId);
    this.states.delete(sessionId);
  }

  private evictUnlessOpen(sessionId: string): void {
    if (!this.openHandles.has(sessionId)) this.states.delete(sessionId);
  }

  private async loadUnlocked(sessionId: string): Promise<SessionState> {
    const cached = this.states.get(sessionId);
    if (cached) return cached;

    const key = stateKey(sessionId);
    const raw = await this.readStored(key);
    const state = raw === undefined ? createInitialState(this.template) : this.decode(key, raw);
    this.states.set(sessionId, state);
    this.logger.debug('Session state loaded', { sessionId, fromStore: raw !== undefined });
    return state;
  }

  private decode(key: string, raw: string): SessionState {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Stored state at ${key} is not valid JSON`, { key, operation: 'read', cause: error });
    }
    const result = sessionStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Stored state at ${key} does not match the state schema`, {
        key,
        operation: 'read',
        cause: result.error,
      });
    }
    return result.data;
  }

  private async readStored(key: string): Promise<string | undefined> {
    try {
      return await this.store.get(key);
    } catch (error) {
      throw PersistenceError.wrap(error, key, 'read');
    }
  }

  private async persist(sessionId: string, state: SessionState): Promise<void> {
    const key = stateKey(sessionId);
    try {
      await this.store.set(key, JSON.stringify(state));
    } catch (error) {
      const failure = PersistenceError.wrap(error, key, 'write');
      const structured = categorizeError(failure, { sessionId });
      this.logger.error('Commit not applied: state could not be persisted', {
        sessionId,
        code: structured.code,
        category: structured.category,
        err: failure,
      });
      throw failure;
    }
  }

  private async deleteStored(sessionId: string): Promise<void> {
    const key = stateKey(sessionId);
    try {
      await this.store.delete(key);
    } catch (error) {
      throw PersistenceError.wrap(error, key, 'delete');
    }
  }
}
