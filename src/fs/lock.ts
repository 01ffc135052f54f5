/**
 * In-process mutual exclusion for async critical sections.
 *
 * Waiters are granted the lock in arrival order. The lock is not re-entrant:
 * acquiring it again from inside the critical section deadlocks.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers currently waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock. The returned function releases it; calling it more
   * than once has no further effect.
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  /**
   * Run `fn` while holding the lock. The lock is released whether `fn`
   * resolves or throws.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      // ownership passes directly, so `locked` stays true
      next();
    } else {
      this.locked = false;
    }
  }
}
