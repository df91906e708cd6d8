/**
 * Per-key async mutex.
 *
 * Uses Promise chains (not OS mutexes) to serialize async operations on the same
 * key while letting different keys proceed concurrently.
 */
export class KeyedMutex {
  private locks = new Map<string, Promise<void>>();

  /**
   * Acquire exclusive access for the given key.
   * Returns a release function that MUST be called in a finally block.
   */
  async acquire(key: string): Promise<() => void> {
    // Wait for any existing lock on this key
    for (let held = this.locks.get(key); held; held = this.locks.get(key)) {
      await held;
    }
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
      resolve = r;
    });
    this.locks.set(key, promise);
    return () => {
      this.locks.delete(key);
      resolve();
    };
  }

  /** Run fn while holding the lock for key */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Check if a key currently has an active lock (for diagnostics) */
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /** Get count of active locks (for diagnostics) */
  get activeLockCount(): number {
    return this.locks.size;
  }
}
