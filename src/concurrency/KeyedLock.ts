/**
 * Per-key async mutex.
 *
 * Calls sharing a key run one after another in arrival order; calls with
 * different keys never wait on each other. Each key holds a promise chain
 * that is dropped once its last holder finishes.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 * await lock.run('list all staff', async () => {
 *   const row = await repo.findByCanonical('list all staff');
 *   await repo.update(row.id, { success_count: row.success_count + 1 });
 * });
 * ```
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);

    // The tail must never reject or one failure would poison the key.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Whether any call currently holds or waits on `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder. */
  get size(): number {
    return this.tails.size;
  }
}
