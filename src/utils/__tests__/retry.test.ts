import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry } from '../retry.js';
import { PermanentFetchError, TransientFetchError } from '../errors.js';

const fast = { initialDelayMs: 0, maxDelayMs: 0 };

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { ...fast, maxAttempts: 3 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until an attempt succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientFetchError(1, 'HTTP 503'))
      .mockRejectedValueOnce(new TransientFetchError(1, 'HTTP 503'))
      .mockResolvedValue('item');

    await expect(withRetry(fn, { ...fast, maxAttempts: 3 })).resolves.toBe('item');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientFetchError(7, 'timed out'));

    await expect(withRetry(fn, { ...fast, maxAttempts: 2 })).rejects.toBeInstanceOf(TransientFetchError);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors rejected by shouldRetry', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new PermanentFetchError(9, 'Item 9 is dead'));

    await expect(
      withRetry(fn, {
        ...fast,
        maxAttempts: 5,
        shouldRetry: (error) => error instanceof TransientFetchError,
      })
    ).rejects.toThrow('Item 9 is dead');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue('boom');

    await expect(withRetry(fn, { ...fast, maxAttempts: 1 })).rejects.toThrow('boom');
  });

  it('doubles the wait after each failure up to the maximum delay', async () => {
    vi.useFakeTimers();
    const start = Date.now();
    const attemptsAt: number[] = [];
    const fn = vi.fn(async (): Promise<string> => {
      attemptsAt.push(Date.now() - start);
      throw new TransientFetchError(1, 'HTTP 503');
    });

    const outcome = withRetry(fn, { maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 300, factor: 2 }).catch(
      (error: unknown) => error
    );
    await vi.runAllTimersAsync();

    expect(await outcome).toBeInstanceOf(TransientFetchError);
    expect(attemptsAt).toEqual([0, 100, 300, 600, 900]);
  });
});
