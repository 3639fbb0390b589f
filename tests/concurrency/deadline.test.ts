import { describe, it, expect } from 'vitest';
import { sleep, withDeadline } from '../../src/concurrency/deadline.js';
import { BackendTimeoutError } from '../../src/errors.js';

describe('withDeadline', () => {
  it('should resolve with the call result when it finishes in time', async () => {
    const result = await withDeadline(async () => 'done', 50, () => new Error('late'));
    expect(result).toBe('done');
  });

  it('should reject with the timeout error and abort the call', async () => {
    let signal: AbortSignal | undefined;

    await expect(
      withDeadline(
        (s) => {
          signal = s;
          return sleep(200);
        },
        10,
        () => new BackendTimeoutError('general', 10)
      )
    ).rejects.toBeInstanceOf(BackendTimeoutError);

    expect(signal?.aborted).toBe(true);
  });

  it('should report the timeout even when the call rejects on abort', async () => {
    await expect(
      withDeadline(
        (s) =>
          new Promise<never>((_, reject) => {
            s.addEventListener('abort', () => reject(new Error('aborted')));
          }),
        10,
        () => new BackendTimeoutError('specialized', 10)
      )
    ).rejects.toBeInstanceOf(BackendTimeoutError);
  });

  it('should propagate the call error unchanged', async () => {
    await expect(
      withDeadline(async () => Promise.reject(new Error('boom')), 50, () => new Error('late'))
    ).rejects.toThrow('boom');
  });
});
