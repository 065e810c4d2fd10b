import { setImmediate as scheduleImmediate } from 'node:timers';

interface Waiter {
  readonly grant: (release: () => void) => void;
  canceled: boolean;
}

export interface ConcurrencyAcquireOptions {
  signal?: AbortSignal;
}

export interface ConcurrencyStats {
  limit: number;
  inUse: number;
  waiting: number;
}

export class ConcurrencyAbortedError extends Error {
  constructor() {
    super('acquire aborted');
    this.name = 'AbortError';
  }
}

/**
 * Semaphore bounding concurrent dispatches. Waiters are served in FIFO order;
 * a waiter whose signal aborts leaves the queue without taking a slot.
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  public constructor(limit: number) {
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new Error(`Concurrency limit must be a positive finite number; received ${String(limit)}`);
    }
    this.limit = Math.floor(limit);
  }

  public stats(): ConcurrencyStats {
    return { limit: this.limit, inUse: this.active, waiting: this.waiters.length };
  }

  public async acquire(options: ConcurrencyAcquireOptions = {}): Promise<() => void> {
    const { signal } = options;
    if (signal?.aborted === true) throw new ConcurrencyAbortedError();
    if (this.active < this.limit) {
      this.active += 1;
      return this.createRelease();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = (): void => {
        waiter.canceled = true;
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new ConcurrencyAbortedError());
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
        canceled: false,
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active = Math.max(0, this.active - 1);
      this.grantNext();
    };
  }

  private grantNext(): void {
    while (this.active < this.limit && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (next === undefined || next.canceled) continue;
      this.active += 1;
      const release = this.createRelease();
      scheduleImmediate(() => {
        // aborted between dequeue and grant: hand the slot back
        if (next.canceled) release();
        else next.grant(release);
      });
      return;
    }
  }
}
