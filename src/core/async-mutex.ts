/**
 * Async Mutex
 *
 * FIFO mutual exclusion for async callers. acquire() resolves with a guard
 * token; holding the token is the only proof of ownership, and release()
 * hands the lock to the next waiter in arrival order.
 *
 * There is no acquire timeout: a waiter blocks until the holder releases or
 * its own AbortSignal fires.
 */

import { MemoryClientError } from '../api/errors.js';

export interface MutexGuard {
  readonly released: boolean;
  /** Idempotent. */
  release(): void;
}

interface Waiter {
  grant: (guard: MutexGuard) => void;
  signal?: AbortSignal;
  abortHandler?: () => void;
}

export class Mutex {
  private readonly name: string;
  private holder: MutexGuard | null = null;
  private readonly waiters: Waiter[] = [];

  constructor(name = 'mutex') {
    this.name = name;
  }

  get locked(): boolean {
    return this.holder !== null;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Check whether `guard` is the token currently holding this lock.
   */
  isHeldBy(guard: MutexGuard): boolean {
    return this.holder === guard && !guard.released;
  }

  acquire(signal?: AbortSignal): Promise<MutexGuard> {
    if (signal?.aborted) {
      return Promise.reject(this.abortError());
    }

    if (this.holder === null) {
      return Promise.resolve(this.grant());
    }

    return new Promise<MutexGuard>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };

      if (signal) {
        waiter.abortHandler = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(this.abortError());
        };
        signal.addEventListener('abort', waiter.abortHandler, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Acquire only if the lock is free right now.
   */
  tryAcquire(): MutexGuard | null {
    return this.holder === null ? this.grant() : null;
  }

  /**
   * Run `fn` while holding the lock.
   */
  async runExclusive<T>(fn: (guard: MutexGuard) => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const guard = await this.acquire(signal);
    try {
      return await fn(guard);
    } finally {
      guard.release();
    }
  }

  private grant(): MutexGuard {
    let released = false;
    const guard: MutexGuard = {
      get released() {
        return released;
      },
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (this.holder === guard) {
          this.holder = null;
          this.next();
        }
      },
    };
    this.holder = guard;
    return guard;
  }

  private next(): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }
    if (waiter.signal && waiter.abortHandler) {
      waiter.signal.removeEventListener('abort', waiter.abortHandler);
    }
    waiter.grant(this.grant());
  }

  private abortError(): MemoryClientError {
    return new MemoryClientError('Cancelled', `Aborted while waiting for ${this.name} lock`, {
      lock: this.name,
    });
  }
}
