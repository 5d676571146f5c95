import { describe, it, expect, vi, afterEach } from 'vitest';
import { ItemFetcher } from '../item-fetcher.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import { PermanentFetchError, TransientFetchError } from '../../utils/errors.js';
import { FakeContentSource } from '../../__tests__/fakes.js';
import { NO_DELAY_RETRY } from '../../__tests__/harness.js';
import type { SourceItem } from '../../types/index.js';

class FlakySource extends FakeContentSource {
  failuresLeft = 2;
  readonly attemptTimes: number[] = [];

  override async getItem(id: number): Promise<SourceItem> {
    this.requested.push(id);
    this.attemptTimes.push(Date.now());
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new TransientFetchError(id, 'HTTP 503', { status: 503 });
    }
    return { id, type: 'story', title: 'Recovered', time: 1_700_000_000 };
  }
}

describe('ItemFetcher', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries transient errors with backoff', async () => {
    const source = new FlakySource(10);
    const fetcher = new ItemFetcher(source, new RateLimiter(0), NO_DELAY_RETRY);

    await expect(fetcher.fetchItem(3)).resolves.toMatchObject({ id: 3, title: 'Recovered' });
    expect(source.requested).toEqual([3, 3, 3]);
  });

  it('gives up after the configured attempts', async () => {
    const source = new FlakySource(10);
    source.failuresLeft = 5;
    const fetcher = new ItemFetcher(source, new RateLimiter(0), NO_DELAY_RETRY);

    await expect(fetcher.fetchItem(4)).rejects.toBeInstanceOf(TransientFetchError);
    expect(source.requested).toHaveLength(3);
  });

  it('honors a per-call attempt override', async () => {
    const source = new FlakySource(10);
    const fetcher = new ItemFetcher(source, new RateLimiter(0), NO_DELAY_RETRY);

    await expect(fetcher.fetchItem(4, 1)).rejects.toBeInstanceOf(TransientFetchError);
    expect(source.requested).toEqual([4]);
  });

  it('does not retry permanent errors', async () => {
    const source = new FakeContentSource(10);
    const fetcher = new ItemFetcher(source, new RateLimiter(0), NO_DELAY_RETRY);

    await expect(fetcher.fetchItem(99)).rejects.toBeInstanceOf(PermanentFetchError);
    expect(source.requested).toEqual([99]);
  });

  it('waits with exponential backoff between transient failures', async () => {
    vi.useFakeTimers();
    const source = new FlakySource(10);
    source.failuresLeft = 3;
    const fetcher = new ItemFetcher(source, new RateLimiter(0), {
      maxAttempts: 4,
      initialDelayMs: 100,
      maxDelayMs: 150,
      factor: 2,
    });

    const pending = fetcher.fetchItem(5);
    await vi.runAllTimersAsync();

    await expect(pending).resolves.toMatchObject({ id: 5 });
    const first = source.attemptTimes[0] ?? 0;
    expect(source.attemptTimes.map((time) => time - first)).toEqual([0, 100, 250, 400]);
  });
});
