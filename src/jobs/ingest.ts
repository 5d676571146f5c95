/**
 * Story Ingestion
 *
 * Fetch one item id and idempotently upsert it. Fetch errors become outcomes;
 * anything else (database down) propagates and aborts the calling run.
 */

import { toStoryInput } from '../scraper/normalize.js';
import { PermanentFetchError, TransientFetchError } from '../utils/errors.js';
import type { ItemFetcher } from '../scraper/item-fetcher.js';
import type { Logger } from '../utils/logger.js';
import type { SourceItem, Story, StoryRepository } from '../types/index.js';

export type IngestOutcome =
  | { kind: 'stored'; story: Story; created: boolean }
  | { kind: 'skipped'; reason: string }
  | { kind: 'transient'; error: TransientFetchError }
  | { kind: 'before-horizon'; sourceCreatedAt: Date };

export interface IngestOptions {
  /** Items created before this instant are reported, not stored */
  horizon?: Date;
  /** Overrides the fetcher's retry budget */
  maxAttempts?: number;
}

export class StoryIngestor {
  constructor(
    private readonly fetcher: ItemFetcher,
    private readonly stories: StoryRepository,
    private readonly logger: Logger
  ) {}

  async ingest(id: number, options: IngestOptions = {}): Promise<IngestOutcome> {
    let item: SourceItem;
    try {
      item = await this.fetcher.fetchItem(id, options.maxAttempts);
    } catch (error) {
      if (error instanceof PermanentFetchError) {
        this.logger.debug({ itemId: id, error: error.message }, 'Skipping item');
        return { kind: 'skipped', reason: error.message };
      }
      if (error instanceof TransientFetchError) {
        this.logger.warn({ itemId: id, error: error.message }, 'Item fetch failed after retries');
        return { kind: 'transient', error };
      }
      throw error;
    }

    const input = toStoryInput(item);
    if (!input) {
      return { kind: 'skipped', reason: item.type === 'story' ? 'incomplete story' : `not a story (${item.type})` };
    }

    if (options.horizon && input.sourceCreatedAt < options.horizon) {
      return { kind: 'before-horizon', sourceCreatedAt: input.sourceCreatedAt };
    }

    const { story, created } = await this.stories.upsertStory(input);
    return { kind: 'stored', story, created };
  }
}
