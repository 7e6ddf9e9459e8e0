/**
 * @fileoverview Session Service
 *
 * The surface a transport layer talks to: create, resume, message and clear
 * sessions. Each message is one request: its state handle is opened at the
 * start and released at the end, whatever the outcome.
 */

import { z } from 'zod';
import {
  createLogger,
  createRequestId,
  createSessionId,
  parseWithSchema,
  withLoggingContext,
  ErrorCodes,
  type SessionState,
} from '@wayfarer/core';
import type { Orchestrator, OrchestratorResponse } from '../orchestrator/orchestrator.js';
import type { StateManager } from '../state/state-manager.js';
import type { ConversationHistory } from './conversation-history.js';

// =============================================================================
// Schemas
// =============================================================================

const sessionIdSchema = z.string().trim().min(1, 'sessionId is required');

const submitMessageSchema = z.object({
  sessionId: sessionIdSchema,
  message: z.string().trim().min(1, 'message must not be empty'),
});

// =============================================================================
// Types
// =============================================================================

export interface SessionServiceConfig {
  stateManager: StateManager;
  orchestrator: Orchestrator;
  history: ConversationHistory;
  /** Conversation turns passed to the intake agent */
  historyContextMessages: number;
  now?: () => Date;
}

export interface CreatedSession {
  sessionId: string;
  createdAt: string;
}

// =============================================================================
// SessionService
// =============================================================================

export class SessionService {
  private readonly logger = createLogger('session:service');
  private readonly stateManager: StateManager;
  private readonly orchestrator: Orchestrator;
  private readonly history: ConversationHistory;
  private readonly historyContextMessages: number;
  private readonly now: () => Date;

  constructor(config: SessionServiceConfig) {
    this.stateManager = config.stateManager;
    this.orchestrator = config.orchestrator;
    this.history = config.history;
    this.historyContextMessages = config.historyContextMessages;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Allocate a session id. State is initialized lazily on first access.
   */
  createSession(): CreatedSession {
    const session = { sessionId: createSessionId(), createdAt: this.now().toISOString() };
    this.logger.info('Session created', { sessionId: session.sessionId });
    return session;
  }

  /**
   * Snapshot of a session's state, initializing it when it has none
   */
  async resumeSession(sessionId: string): Promise<SessionState> {
    const id = parseWithSchema(sessionIdSchema, sessionId, 'sessionId', ErrorCodes.INVALID_PARAMS);
    const handle = await this.stateManager.open(id);
    try {
      return handle.getState();
    } finally {
      handle.release();
    }
  }

  /**
   * Run one user message through the orchestrator
   *
   * @throws ValidationError for an empty session id or message
   * @throws PersistenceError when the session cannot be loaded or history cannot be written
   */
  async submitMessage(sessionId: string, message: string): Promise<OrchestratorResponse> {
    const params = parseWithSchema(
      submitMessageSchema,
      { sessionId, message },
      'submitMessage params',
      ErrorCodes.INVALID_PARAMS
    );
    const requestId = createRequestId();

    return withLoggingContext({ sessionId: params.sessionId, requestId }, async () => {
      const done = this.logger.startTimer('submitMessage');
      const context = await this.history.tail(params.sessionId, this.historyContextMessages);
      const handle = await this.stateManager.open(params.sessionId);
      let response: OrchestratorResponse;
      try {
        response = await this.orchestrator.run({ state: handle, history: context }, params.message);
      } finally {
        handle.release();
      }

      await this.history.append(
        params.sessionId,
        { role: 'user', content: params.message },
        { role: 'assistant', content: response.message }
      );
      done();
      this.logger.info('Message handled', { status: response.status, stage: response.stage });
      return response;
    });
  }

  /**
   * Delete a session's state and history
   */
  async clearSession(sessionId: string): Promise<void> {
    const id = parseWithSchema(sessionIdSchema, sessionId, 'sessionId', ErrorCodes.INVALID_PARAMS);
    await this.stateManager.clear(id);
    await this.history.clear(id);
    this.logger.info('Session cleared', { sessionId: id });
  }
}
