/**
 * Item Fetcher
 *
 * Throttled, retrying access to the content source. Only transient errors are
 * retried; permanent ones surface on the first attempt.
 */

import { withRetry } from '../utils/retry.js';
import { TransientFetchError } from '../utils/errors.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { ContentSource, RetryConfig, SourceItem, StoryList } from '../types/index.js';

const isTransient = (error: Error): boolean => error instanceof TransientFetchError;

export class ItemFetcher {
  constructor(
    private readonly source: ContentSource,
    private readonly limiter: RateLimiter,
    private readonly retry: RetryConfig
  ) {}

  /**
   * Fetch with backoff; `maxAttempts` overrides the configured budget
   */
  async fetchItem(id: number, maxAttempts: number = this.retry.maxAttempts): Promise<SourceItem> {
    return withRetry(() => this.limiter.execute(() => this.source.getItem(id)), {
      ...this.retry,
      maxAttempts,
      shouldRetry: isTransient,
      label: `item ${id}`,
    });
  }

  async maxItemId(): Promise<number> {
    return withRetry(() => this.limiter.execute(() => this.source.getMaxItemId()), {
      ...this.retry,
      shouldRetry: isTransient,
      label: 'maxitem',
    });
  }

  async storyListIds(list: StoryList, limit: number): Promise<number[]> {
    return withRetry(() => this.limiter.execute(() => this.source.getStoryListIds(list, limit)), {
      ...this.retry,
      shouldRetry: isTransient,
      label: `${list}stories`,
    });
  }
}
