import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, backoffDelay, retryWithBackoff, withTimeout } from '../retry';

describe('backoffDelay', () => {
  it('doubles from the base and stops at the cap', () => {
    const policy = { backoffBaseMs: 100, backoffCapMs: 1000 };
    expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(policy, attempt))).toEqual([
      100, 200, 400, 800, 1000, 1000,
    ]);
  });
});

describe('retryWithBackoff', () => {
  const policy = { maxAttempts: 3, backoffBaseMs: 100, backoffCapMs: 1000 };

  it('retries retryable failures and returns the first success', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn(async (_attempt: number) => 'ok')
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'));

    const result = await retryWithBackoff(fn, { ...policy, isRetryable: () => true, sleep });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('stops immediately on a non-retryable failure', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const cause = new Error('bad input');

    const promise = retryWithBackoff(async () => {
      throw cause;
    }, { ...policy, isRetryable: () => false, sleep });

    await expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(promise).rejects.toMatchObject({ attempts: 1, lastError: cause });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts with the last cause', async () => {
    let calls = 0;
    const promise = retryWithBackoff(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    }, { ...policy, isRetryable: () => true, sleep: async () => undefined });

    await expect(promise).rejects.toMatchObject({ attempts: 3 });
    await promise.catch((error) => {
      expect(error instanceof RetryExhaustedError && error.lastError).toEqual(new Error('failure 3'));
    });
    expect(calls).toBe(3);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error('late'))).resolves.toBe(7);
  });

  it('rejects with the timeout error when the promise hangs', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, () => new Error('late'))).rejects.toThrow('late');
  });
});
