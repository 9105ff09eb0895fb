/**
 * Async mutex for serializing access to a shared slot.
 *
 * ```
 * const release = await mutex.acquire();
 * try {
 *   // critical section
 * } finally {
 *   release();
 * }
 * ```
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  /** Run `fn` while holding the lock. */
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

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the lock straight to the next waiter
      this.locked = false;
      next();
    } else {
      this.locked = false;
    }
  }
}
