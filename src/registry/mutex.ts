/**
 * Async mutual exclusion with FIFO hand-off.
 *
 * Release passes ownership straight to the oldest waiter, so a caller arriving
 * between a release and the waiter's wake-up cannot barge ahead of the queue.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Wait for the lock. Resolves to a release function; calling it more than
   * once is a no-op.
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>(resolve => {
        this.waiters.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Callers currently waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }
}
