/**
 * A mutual-exclusion lock for async code. Waiters are served in FIFO order.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * await mutex.runExclusive(async () => {
 *   // ... one caller at a time
 * });
 * ```
 */
export class Mutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /** Resolves once the caller holds the lock. */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /** Hands the lock to the next waiter, or unlocks if there is none. */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }
}
