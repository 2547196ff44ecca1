/**
 * Mutex - FIFO async lock that poisons on failure
 */

import { LineFreqError } from "./errors";

/** Releases a held lock. Calling it more than once has no effect. */
export type Release = () => void;

interface Waiter {
  resolve: (release: Release) => void;
  reject: (error: LineFreqError) => void;
}

/**
 * Async mutual exclusion. Waiters are granted the lock in the order they
 * asked for it. If a critical section run through `runExclusive` throws, the
 * mutex is poisoned: pending and later acquisitions fail with LockPoisoned.
 */
export class Mutex {
  private locked: boolean = false;
  private waiters: Waiter[] = [];
  private _poisoned: boolean = false;

  /**
   * Wait for the lock. Resolves with the function that releases it.
   */
  acquire(): Promise<Release> {
    if (this._poisoned) {
      return Promise.reject(this.poisonError());
    }

    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
    const release = await this.acquire();
    try {
      return await fn();
    } catch (error) {
      this.poison();
      throw error;
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get poisoned(): boolean {
    return this._poisoned;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  private poison(): void {
    this._poisoned = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(this.poisonError());
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this._poisoned ? undefined : this.waiters.shift();
      if (next) {
        next.resolve(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }

  private poisonError(): LineFreqError {
    return new LineFreqError(
      "LockPoisoned",
      "increment",
      "Lock poisoned: a previous holder failed inside its critical section"
    );
  }
}
