/**
 * @fileoverview SQLite session store
 *
 * Uses better-sqlite3 with a single key/value table. Statements run
 * synchronously; failures surface as PersistenceError.
 */

import Database from 'better-sqlite3';
import { createLogger, PersistenceError } from '@wayfarer/core';
import type { SessionStore } from './types.js';

export interface SqliteSessionStoreConfig {
  /** Database file, or ':memory:' */
  dbPath: string;
  enableWAL?: boolean;
}

interface ValueRow {
  value: string;
}

export class SqliteSessionStore implements SessionStore {
  private readonly logger = createLogger('store:sqlite');
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], ValueRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly deleteStmt: Database.Statement<[string]>;

  constructor(config: SqliteSessionStoreConfig) {
    this.db = new Database(config.dbPath);

    if (config.enableWAL !== false && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS session_store (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.selectStmt = this.db.prepare<[string], ValueRow>('SELECT value FROM session_store WHERE key = ?');
    this.upsertStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO session_store (key, value, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM session_store WHERE key = ?');

    this.logger.info('SQLite session store initialized', { dbPath: config.dbPath });
  }

  async get(key: string): Promise<string | undefined> {
    try {
      return this.selectStmt.get(key)?.value;
    } catch (error) {
      throw new PersistenceError(`Failed to read ${key}`, { key, operation: 'read', cause: error });
    }
  }

  async set(key: string, value: string): Promise<void> {
    try {
      this.upsertStmt.run(key, value, new Date().toISOString());
    } catch (error) {
      throw new PersistenceError(`Failed to write ${key}`, { key, operation: 'write', cause: error });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      this.deleteStmt.run(key);
    } catch (error) {
      throw new PersistenceError(`Failed to delete ${key}`, { key, operation: 'delete', cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
