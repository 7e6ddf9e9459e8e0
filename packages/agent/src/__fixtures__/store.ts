/**
 * @fileoverview Session store doubles
 */

import { InMemorySessionStore } from '../store/memory-store.js';

/**
 * In-memory store whose operations can be made to fail on demand
 */
export class FaultyStore extends InMemorySessionStore {
  /** Reject every `set` whose key starts with this prefix */
  failWritesTo: string | null = null;
  failReads = false;
  /** Delay applied to every `set` */
  writeDelayMs = 0;
  readonly writes: string[] = [];

  override async get(key: string): Promise<string | undefined> {
    if (this.failReads) throw new Error('disk unavailable');
    return super.get(key);
  }

  override async set(key: string, value: string): Promise<void> {
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (this.failWritesTo !== null && key.startsWith(this.failWritesTo)) {
      throw new Error('disk full');
    }
    this.writes.push(key);
    return super.set(key, value);
  }
}
