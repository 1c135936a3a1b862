import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../../src/utils/retry.js';
import { RetriesExhaustedError } from '../../src/errors.js';

function failingTimes<T>(failures: number, value: T): { op: () => Promise<T>; calls: () => number } {
  let count = 0;
  return {
    op: async () => {
      count++;
      if (count <= failures) throw new Error(`failure ${count}`);
      return value;
    },
    calls: () => count,
  };
}

describe('withRetry', () => {
  it('returns the first success without retrying', async () => {
    const { op, calls } = failingTimes(0, 'ok');
    await expect(withRetry(op, { tries: 3, delayMs: 0 })).resolves.toBe('ok');
    expect(calls()).toBe(1);
  });

  it('makes k + 1 attempts after k failures', async () => {
    const { op, calls } = failingTimes(2, 42);
    await expect(withRetry(op, { tries: 3, delayMs: 0 })).resolves.toBe(42);
    expect(calls()).toBe(3);
  });

  it('throws RetriesExhaustedError carrying the last error', async () => {
    const { op, calls } = failingTimes(10, null);

    const error = await withRetry(op, { tries: 3, delayMs: 0, name: 'insert' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(calls()).toBe(3);
    if (error instanceof RetriesExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError).toBeInstanceOf(Error);
      expect(error.message).toBe('insert failed after 3 attempts: failure 3');
    }
  });

  it('grows the wait by the backoff factor up to the cap', async () => {
    const waits: number[] = [];
    const { op } = failingTimes(10, null);

    await expect(
      withRetry(op, {
        tries: 4,
        delayMs: 1,
        backoff: 2,
        maxIntervalMs: 3,
        onRetry: (_attempt, _error, waitMs) => waits.push(waitMs),
      })
    ).rejects.toBeInstanceOf(RetriesExhaustedError);

    // No wait after the last attempt.
    expect(waits).toEqual([1, 2, 3]);
  });

  it('stops at once when the signal aborts during a wait', async () => {
    const controller = new AbortController();
    const reason = new Error('shutdown');
    const op = vi.fn(async () => {
      throw new Error('boom');
    });

    const pending = withRetry(op, {
      tries: 5,
      delayMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(reason),
    });

    await expect(pending).rejects.toBe(reason);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    const op = vi.fn(async () => 'never');

    await expect(withRetry(op, { signal: controller.signal })).rejects.toThrow('cancelled');
    expect(op).not.toHaveBeenCalled();
  });
});
