/**
 * Fire-and-forget work that must not delay the caller.
 * Failures are logged, never rethrown. `drain()` waits for everything
 * scheduled so far (including tasks scheduled while draining).
 */

import type { ILogProvider } from '../providers/ILogProvider.js';

export class DeferredTasks {
  private readonly pending = new Set<Promise<void>>();
  private readonly byKey = new Map<string, Set<Promise<void>>>();

  constructor(private readonly logger: ILogProvider) {}

  /**
   * Schedule `task`. A `key` groups tasks so a later reader can wait for
   * writes about one entity via `settled(key)`.
   */
  run(label: string, task: () => Promise<unknown>, key?: string): void {
    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error(`Deferred task failed: ${label}`, {
            error: err instanceof Error ? err.message : String(err),
            ...(key !== undefined && { key }),
          });
        }
      )
      .finally(() => {
        this.pending.delete(tracked);
        if (key !== undefined) this.untrackKey(key, tracked);
      });

    this.pending.add(tracked);
    if (key !== undefined) {
      let group = this.byKey.get(key);
      if (!group) {
        group = new Set();
        this.byKey.set(key, group);
      }
      group.add(tracked);
    }
  }

  /** Wait for every task scheduled under `key` so far. */
  async settled(key: string): Promise<void> {
    const group = this.byKey.get(key);
    if (group) await Promise.all([...group]);
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get size(): number {
    return this.pending.size;
  }

  private untrackKey(key: string, task: Promise<void>): void {
    const group = this.byKey.get(key);
    if (!group) return;
    group.delete(task);
    if (group.size === 0) this.byKey.delete(key);
  }
}
