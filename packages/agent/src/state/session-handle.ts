/**
 * @fileoverview Session-scoped state handles
 *
 * The writer handle is what the orchestrator holds for one request. Agents
 * get an AgentStateView built from it: the same reads and the same pure diff
 * builder, with no path to `commit`.
 */

import {
  SessionError,
  type Diff,
  type JsonObject,
  type NewTask,
  type SessionState,
  type StateUpdates,
} from '@wayfarer/core';
import type { StateManager } from './state-manager.js';

/**
 * Read-only capability handed to sub-agents
 */
export interface AgentStateView {
  readonly sessionId: string;
  /** Independent snapshot; mutating it has no effect on canonical state */
  getState(): SessionState;
  /** Build a diff from a partial state; does not apply it */
  proposeDiff(updates: StateUpdates): Diff;
}

/**
 * Mutating capability; only the orchestrator holds one
 */
export interface SessionStateWriter extends AgentStateView {
  commit(diff: Diff): Promise<SessionState>;
  addTask(task: NewTask): Promise<SessionState>;
  updateTravelInfo(updates: JsonObject): Promise<SessionState>;
  updateUserProfile(updates: JsonObject): Promise<SessionState>;
}

export class SessionStateHandle implements SessionStateWriter {
  readonly sessionId: string;
  private readonly manager: StateManager;
  private readonly onRelease: () => void;
  private released = false;

  constructor(manager: StateManager, sessionId: string, onRelease: () => void) {
    this.manager = manager;
    this.sessionId = sessionId;
    this.onRelease = onRelease;
  }

  getState(): SessionState {
    this.assertOpen();
    return this.manager.getState(this.sessionId);
  }

  proposeDiff(updates: StateUpdates): Diff {
    return this.manager.proposeDiff(updates);
  }

  commit(diff: Diff): Promise<SessionState> {
    this.assertOpen();
    return this.manager.commit(this.sessionId, diff);
  }

  addTask(task: NewTask): Promise<SessionState> {
    this.assertOpen();
    return this.manager.addTask(this.sessionId, task);
  }

  updateTravelInfo(updates: JsonObject): Promise<SessionState> {
    this.assertOpen();
    return this.manager.updateTravelInfo(this.sessionId, updates);
  }

  updateUserProfile(updates: JsonObject): Promise<SessionState> {
    this.assertOpen();
    return this.manager.updateUserProfile(this.sessionId, updates);
  }

  /** End of request; the manager evicts the session once every handle is released */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }

  private assertOpen(): void {
    if (this.released) {
      throw new SessionError(`State handle for session ${this.sessionId} has been released`, {
        sessionId: this.sessionId,
      });
    }
  }
}

/**
 * Frozen plain object exposing only the read side of `source`
 */
export function agentViewOf(source: AgentStateView): AgentStateView {
  return Object.freeze({
    sessionId: source.sessionId,
    getState: () => source.getState(),
    proposeDiff: (updates: StateUpdates) => source.proposeDiff(updates),
  });
}
