/**
 * Timeout helpers for collaborator calls.
 */

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`. Rejects with
 * `onTimeout()` if the deadline passes first; the losing call is aborted.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so an abort-triggered rejection cannot win the race.
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
