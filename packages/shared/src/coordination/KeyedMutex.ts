/**
 * KeyedMutex - one FIFO lock per key
 *
 * Callers working on different keys never wait on each other. Callers on the
 * same key run one at a time in arrival order. Idle keys are dropped so the
 * lock table only holds keys that are in use.
 */

interface LockState {
  locked: boolean;
  queue: Array<() => void>;
}

export class KeyedMutex {
  private locks: Map<string, LockState> = new Map();

  /**
   * Acquire the lock for a key, waiting behind earlier holders
   */
  async acquire(key: string): Promise<void> {
    const state = this.locks.get(key);
    if (!state) {
      this.locks.set(key, { locked: true, queue: [] });
      return;
    }

    if (!state.locked) {
      state.locked = true;
      return;
    }

    return new Promise((resolve) => {
      state.queue.push(() => {
        state.locked = true;
        resolve();
      });
    });
  }

  /**
   * Release the lock and hand it to the next waiter
   */
  release(key: string): void {
    const state = this.locks.get(key);
    if (!state) return;

    if (state.queue.length > 0) {
      const next = state.queue.shift();
      next?.();
    } else {
      this.locks.delete(key);
    }
  }

  /**
   * Run a task while holding the key's lock. The lock is released even when
   * the task rejects; the rejection reaches the caller.
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.locked ?? false;
  }

  /**
   * Number of callers waiting on a key (the holder is not counted)
   */
  pendingCount(key: string): number {
    return this.locks.get(key)?.queue.length ?? 0;
  }
}
