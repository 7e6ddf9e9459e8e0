/**
 * @fileoverview Bounded worker pool
 *
 * At most `capacity` jobs run at once; the rest wait in a FIFO queue. One
 * pool is shared by every session, so it bounds total outbound calls.
 */

import { createLogger } from '@wayfarer/core';

export type PoolJob<T> = (signal: AbortSignal) => Promise<T>;

export interface SubmitOptions {
  /** Aborting drops a queued job or signals a running one */
  signal?: AbortSignal;
}

export class PoolAbortError extends Error {
  constructor() {
    super('Job aborted before it started');
    this.name = 'PoolAbortError';
  }
}

interface QueuedJob {
  start: () => void;
  cancel: () => void;
}

export class WorkerPool {
  private readonly logger = createLogger('executor:pool');
  private readonly queue: QueuedJob[] = [];
  private running = 0;

  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Worker pool capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Jobs currently running */
  get active(): number {
    return this.running;
  }

  /** Jobs waiting for a slot */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Run `job` when a slot frees. Rejects with PoolAbortError if the signal
   * aborts while the job is still queued.
   */
  submit<T>(job: PoolJob<T>, options: SubmitOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new PoolAbortError());
    }

    return new Promise<T>((resolve, reject) => {
      const entry: QueuedJob = {
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          this.running++;
          const controller = new AbortController();
          const forward = (): void => controller.abort();
          signal?.addEventListener('abort', forward, { once: true });

          void Promise.resolve()
            .then(() => job(controller.signal))
            .then(resolve, reject)
            .finally(() => {
              signal?.removeEventListener('abort', forward);
              this.running--;
              this.drain();
            });
        },
        cancel: () => reject(new PoolAbortError()),
      };

      const onAbort = (): void => {
        const index = this.queue.indexOf(entry);
        if (index >= 0) {
          this.queue.splice(index, 1);
          entry.cancel();
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.queue.push(entry);
      this.drain();
    });
  }

  private drain(): void {
    while (this.running < this.capacity) {
      const next = this.queue.shift();
      if (!next) return;
      next.start();
    }
    if (this.queue.length > 0) {
      this.logger.trace('Pool saturated', { active: this.running, pending: this.queue.length });
    }
  }
}
