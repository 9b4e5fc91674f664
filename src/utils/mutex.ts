/**
 * @fileoverview FIFO async mutex.
 *
 * @module utils/mutex
 */

/**
 * Serializes async critical sections in arrival order.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * await mutex.withLock(async () => {
 *   const doc = await read();
 *   await write(next(doc));
 * });
 * ```
 */
export class Mutex {
  private locked = false;
  private waitQueue: (() => void)[] = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /** Hands the lock to the next waiter, or unlocks when none are queued. */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waitQueue.length;
  }
}
