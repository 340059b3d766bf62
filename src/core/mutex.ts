/**
 * AsyncMutex — Exclusive lock for async operations.
 *
 * Guards the container's lifecycle transitions. Only one holder at a time;
 * waiters are served in FIFO order so lifecycle requests run in call order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<(release: () => void) => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Try to acquire the lock without waiting.
   * Returns release function if acquired, null if lock is held.
   */
  tryAcquire(): (() => void) | null {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }
    return null;
  }

  /**
   * Run a function while holding the lock.
   */
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
    return this.queue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand the lock over in a microtask to avoid deep release chains
        queueMicrotask(() => next(this.createRelease()));
      } else {
        this.locked = false;
      }
    };
  }
}
