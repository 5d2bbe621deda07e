/**
 * Mutual exclusion for async callers.
 *
 * A single-slot lock with a FIFO wait queue. Releasing while callers are
 * queued hands the lock straight to the oldest waiter, so no late arrival can
 * slip in between.
 *
 * @example
 * ```typescript
 * import { createMutex } from 'burstgate';
 *
 * const lock = createMutex();
 *
 * const balance = await lock.runExclusive(() => {
 *   account.balance -= 10;
 *   return account.balance;
 * });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Mutex interface.
 */
export interface Mutex {
  /**
   * Wait until the lock is owned by the caller.
   * Every resolved `acquire()` must be paired with exactly one `release()`.
   */
  acquire(): Promise<void>;

  /**
   * Give up the lock, handing it to the next waiter if there is one.
   * @throws Error when the lock is not held
   */
  release(): void;

  /**
   * Run `fn` while holding the lock. The lock is released on every exit
   * path, including a throw or rejection from `fn`.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T>;

  /**
   * Whether some caller currently owns the lock.
   */
  isLocked(): boolean;

  /**
   * Number of callers waiting to acquire.
   */
  pendingCount(): number;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a mutex.
 *
 * The lock is not re-entrant: a caller that already holds it and calls
 * `acquire()` again waits forever.
 */
export function createMutex(): Mutex {
  let locked = false;
  const queue: Array<() => void> = [];

  function acquire(): Promise<void> {
    if (!locked) {
      locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  }

  function release(): void {
    if (!locked) {
      throw new Error("Mutex released while not locked");
    }

    const next = queue.shift();
    if (next) {
      // Ownership passes to the waiter; `locked` stays true.
      next();
    } else {
      locked = false;
    }
  }

  return {
    acquire,
    release,

    async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
      await acquire();
      try {
        return await fn();
      } finally {
        release();
      }
    },

    isLocked(): boolean {
      return locked;
    },

    pendingCount(): number {
      return queue.length;
    },
  };
}
