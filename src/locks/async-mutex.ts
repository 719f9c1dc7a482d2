/**
 * FIFO mutual-exclusion lock for async sections on the event loop.
 *
 * Ownership is handed directly to the next waiter on release, so a lock
 * with queued waiters never reports itself as free in between.
 */
export class AsyncMutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves with a release function; calling it more
   * than once has no effect.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    return this.createRelease();
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers queued behind the current holder */
  pendingCount(): number {
    return this.waiters.length;
  }

  isIdle(): boolean {
    return !this.locked && this.waiters.length === 0;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
