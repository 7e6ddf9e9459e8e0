/**
 * @fileoverview Conversation history
 *
 * Per-session message list stored as one JSON array under
 * `messages_<sessionId>`. Appends for the same session are serialized so
 * concurrent requests never drop each other's turns.
 */

import {
  chatHistorySchema,
  createLogger,
  PersistenceError,
  type ChatMessage,
  type ChatRole,
} from '@wayfarer/core';
import { KeyedMutex } from '../state/keyed-mutex.js';
import { historyKey } from '../store/keys.js';
import type { SessionStore } from '../store/types.js';

export interface ConversationHistoryConfig {
  store: SessionStore;
  now?: () => Date;
}

export class ConversationHistory {
  private readonly logger = createLogger('session:history');
  private readonly store: SessionStore;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  constructor(config: ConversationHistoryConfig) {
    this.store = config.store;
    this.now = config.now ?? (() => new Date());
  }

  async list(sessionId: string): Promise<ChatMessage[]> {
    return this.read(sessionId);
  }

  /**
   * Last `count` messages, oldest first
   */
  async tail(sessionId: string, count: number): Promise<ChatMessage[]> {
    if (count <= 0) return [];
    const messages = await this.read(sessionId);
    return messages.slice(-count);
  }

  /**
   * Append messages in order; returns the stored entries
   */
  async append(
    sessionId: string,
    ...entries: Array<{ role: ChatRole; content: string }>
  ): Promise<ChatMessage[]> {
    return this.locks.runExclusive(sessionId, async () => {
      const timestamp = this.now().toISOString();
      const added = entries.map((entry) => ({ role: entry.role, content: entry.content, timestamp }));
      const messages = [...(await this.read(sessionId)), ...added];
      const key = historyKey(sessionId);
      try {
        await this.store.set(key, JSON.stringify(messages));
      } catch (error) {
        throw PersistenceError.wrap(error, key, 'write');
      }
      this.logger.debug('History appended', { sessionId, added: added.length, total: messages.length });
      return added;
    });
  }

  async clear(sessionId: string): Promise<void> {
    await this.locks.runExclusive(sessionId, async () => {
      const key = historyKey(sessionId);
      try {
        await this.store.delete(key);
      } catch (error) {
        throw PersistenceError.wrap(error, key, 'delete');
      }
    });
  }

  private async read(sessionId: string): Promise<ChatMessage[]> {
    const key = historyKey(sessionId);
    let raw: string | undefined;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      throw PersistenceError.wrap(error, key, 'read');
    }
    if (raw === undefined) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Stored history at ${key} is not valid JSON`, { key, operation: 'read', cause: error });
    }
    const result = chatHistorySchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Stored history at ${key} is malformed`, {
        key,
        operation: 'read',
        cause: result.error,
      });
    }
    return result.data;
  }
}
