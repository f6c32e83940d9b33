/**
 * AsyncMutex — exclusive lock for async sections.
 *
 * Holders run one at a time, waiters in FIFO order. Trace sessions take it
 * around each run, and the record store around each change.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves with the release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(this.createRelease()));
    });
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}
