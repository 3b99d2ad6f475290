/**
 * Shared utility functions used across the rfuzz codebase.
 *
 * @module utils
 */

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @param v - Value to check
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// ============================================================================
// Concurrency Utilities
// ============================================================================

/**
 * A keyed lock for serializing async operations.
 *
 * Operations on the same key are serialized (run one at a time).
 * Operations on different keys run concurrently.
 *
 * Used to keep two monitors of the same fuzzer from fetching and
 * deleting the same device logs at once.
 *
 * Uses atomic promise chaining to guarantee FIFO ordering without race windows.
 * Each caller chains onto the current promise synchronously (before any await),
 * ensuring no two callers can enter the critical section simultaneously.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 *
 * // These run serially (same key):
 * await lock.withLock("10.0.0.2/foo_fuzzers/bar_fuzzer", async () => { ... });
 * await lock.withLock("10.0.0.2/foo_fuzzers/bar_fuzzer", async () => { ... });
 *
 * // These can run concurrently (different keys):
 * await Promise.all([
 *   lock.withLock("10.0.0.2/foo_fuzzers/bar_fuzzer", async () => { ... }),
 *   lock.withLock("10.0.0.2/foo_fuzzers/baz_fuzzer", async () => { ... }),
 * ]);
 * ```
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>();

  /**
   * Execute an async function while holding the lock for the given key.
   *
   * If another operation is in progress for the same key, this will wait
   * until that operation completes before starting. Operations are executed
   * in FIFO order.
   *
   * @param key - The key to lock on
   * @param fn - The async function to execute
   * @returns The result of the function
   * @throws Re-throws any error from the function after releasing the lock
   */
  public async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Capture predecessor BEFORE registering (synchronous - no race window)
    const predecessor = this.locks.get(key) ?? Promise.resolve();

    // Create our release signal
    let release: () => void = () => undefined;
    const ourLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    // CRITICAL: Register synchronously before any await - this is what
    // prevents the race condition. Multiple callers arriving "simultaneously"
    // will each chain onto the previous caller's promise atomically.
    this.locks.set(key, ourLock);

    try {
      await predecessor; // Wait for predecessor to complete
      return await fn(); // Execute critical section
    } finally {
      release(); // Signal next waiter
      // Only cleanup if we're still the tail (no one chained after us)
      if (this.locks.get(key) === ourLock) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Check if a key currently has an operation in progress.
   *
   * @param key - The key to check
   * @returns true if an operation is in progress for this key
   */
  public isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
