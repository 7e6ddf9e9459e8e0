/**
 * @fileoverview Per-key mutual exclusion
 *
 * Each key owns a promise chain; an acquirer waits for the tail of the chain
 * and appends its own slot. Keys never share a chain, so work on one session
 * never waits on another.
 *
 * A waiter that gives up (acquire timeout) still occupies its place in the
 * chain but releases it as soon as its predecessor finishes, so successors
 * are not held up by the abandoned slot.
 */

import { ConcurrencyTimeoutError } from '@wayfarer/core';

export type Release = () => void;

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Wait for exclusive access to `key`.
   *
   * @param timeoutMs - Longest wait; 0 waits indefinitely
   * @throws ConcurrencyTimeoutError when the wait exceeds `timeoutMs`
   */
  acquire(key: string, timeoutMs = 0): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseSlot: () => void = () => {};
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve;
    });
    const tail = previous.then(() => slot);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return new Promise<Release>((resolve, reject) => {
      let settled = false;
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              if (settled) return;
              settled = true;
              releaseSlot();
              reject(new ConcurrencyTimeoutError(key, timeoutMs));
            }, timeoutMs)
          : undefined;

      void previous.then(() => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          releaseSlot();
        });
      });
    });
  }

  /**
   * Run `fn` while holding `key`
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T, timeoutMs = 0): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Whether anyone holds or waits for `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiter */
  get size(): number {
    return this.tails.size;
  }
}
