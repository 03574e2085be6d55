/**
 * AsyncMutex — exclusive lock for async sections.
 *
 * Guards the shared lesson store: concurrent runs may all try to append a
 * lesson at termination, and a writer's check-then-append must not interleave
 * with another writer's. Waiters are served in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves with a release function; releasing twice is a no-op.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>(resolve => {
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

  get pending(): number {
    return this.waiters.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}
