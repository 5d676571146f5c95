/**
 * Continuous Sync Job
 *
 * Polls forward from the last applied item id. Ids are applied in chunks of
 * the enrichment batch size; the cursor moves only after a chunk's upserts
 * and enrichment are done, so a crash replays at most one chunk. The curated
 * top/new/best lists are refreshed after the scan.
 */

import { TransientFetchError } from '../utils/errors.js';
import type { EnrichmentStage } from '../summarizer/enrichment-stage.js';
import type { ItemFetcher } from '../scraper/item-fetcher.js';
import type { Logger } from '../utils/logger.js';
import type { StoryIngestor } from './ingest.js';
import { STORY_LISTS, type FetchFailureLedger, type ProgressStore, type Story } from '../types/index.js';

const JOB = 'continuous';

export interface ContinuousSyncSettings {
  batchSize: number;
  startId: number | null;
  /** Ids taken from each curated list per run; 0 disables the refresh */
  curatedLimit: number;
  chunkSize: number;
}

export interface ContinuousSyncDeps {
  progress: ProgressStore;
  fetcher: ItemFetcher;
  ingestor: StoryIngestor;
  enrichment: EnrichmentStage;
  ledger: FetchFailureLedger;
  logger: Logger;
}

export interface ContinuousSyncResult {
  startCursor: number;
  endCursor: number;
  maxItemId: number;
  itemsProcessed: number;
  storiesFound: number;
  newStories: number;
  skipped: number;
  deferred: number;
  enriched: number;
  enrichmentFailed: number;
  curatedRefreshed: number;
}

export class ContinuousSyncJob {
  readonly name = JOB;

  constructor(
    private readonly deps: ContinuousSyncDeps,
    private readonly settings: ContinuousSyncSettings
  ) {}

  async run(): Promise<ContinuousSyncResult> {
    const { progress, fetcher, logger } = this.deps;

    const maxItemId = await fetcher.maxItemId();
    let cursor = await progress.getCursor(JOB);

    if (cursor === null) {
      cursor = this.settings.startId ?? Math.max(0, maxItemId - 1);
      await progress.advanceCursor(JOB, cursor);
      logger.info({ cursor }, 'Initialized continuous cursor');
    }

    const result: ContinuousSyncResult = {
      startCursor: cursor,
      endCursor: cursor,
      maxItemId,
      itemsProcessed: 0,
      storiesFound: 0,
      newStories: 0,
      skipped: 0,
      deferred: 0,
      enriched: 0,
      enrichmentFailed: 0,
      curatedRefreshed: 0,
    };

    const end = Math.min(maxItemId, cursor + this.settings.batchSize);
    if (end <= cursor) {
      logger.debug({ cursor, maxItemId }, 'No new items');
    }

    for (let chunkStart = cursor + 1; chunkStart <= end; chunkStart += this.settings.chunkSize) {
      const chunkEnd = Math.min(end, chunkStart + this.settings.chunkSize - 1);
      await this.applyChunk(chunkStart, chunkEnd, result);
      result.endCursor = chunkEnd;
    }

    if (this.settings.curatedLimit > 0) {
      await this.refreshCuratedLists(result);
    }

    logger.info(
      {
        startCursor: result.startCursor,
        endCursor: result.endCursor,
        maxItemId,
        storiesFound: result.storiesFound,
        deferred: result.deferred,
        enriched: result.enriched,
      },
      'Continuous sync completed'
    );

    return result;
  }

  private async applyChunk(first: number, last: number, result: ContinuousSyncResult): Promise<void> {
    const { progress, ingestor, ledger } = this.deps;
    const pending: Story[] = [];
    let storiesFound = 0;

    for (let id = first; id <= last; id++) {
      const outcome = await ingestor.ingest(id);

      switch (outcome.kind) {
        case 'stored':
          storiesFound++;
          if (outcome.created) {
            result.newStories++;
          }
          if (outcome.story.status === 'pending') {
            pending.push(outcome.story);
          }
          break;
        case 'transient':
          await ledger.record(id, JOB, outcome.error.message);
          result.deferred++;
          break;
        case 'skipped':
        case 'before-horizon':
          result.skipped++;
          break;
      }
    }

    await this.enrich(pending, result);

    const itemsProcessed = last - first + 1;
    await progress.advanceCursor(JOB, last, { itemsProcessed, storiesFound });
    result.itemsProcessed += itemsProcessed;
    result.storiesFound += storiesFound;
  }

  /**
   * Re-fetch the top, new and best lists for score/comment refreshes and
   * stories the id scan has not reached; leaves the cursor alone
   */
  private async refreshCuratedLists(result: ContinuousSyncResult): Promise<void> {
    const { ingestor } = this.deps;
    const ids = await this.curatedIds();

    const pending: Story[] = [];
    for (const id of ids) {
      const outcome = await ingestor.ingest(id);
      if (outcome.kind !== 'stored') {
        continue;
      }
      result.curatedRefreshed++;
      if (outcome.created) {
        result.newStories++;
      }
      if (outcome.story.status === 'pending') {
        pending.push(outcome.story);
      }
    }

    await this.enrich(pending, result);
  }

  /**
   * Union of the curated lists in list order; an unavailable list is skipped
   */
  private async curatedIds(): Promise<number[]> {
    const { fetcher, logger } = this.deps;
    const ids = new Set<number>();

    for (const list of STORY_LISTS) {
      try {
        for (const id of await fetcher.storyListIds(list, this.settings.curatedLimit)) {
          ids.add(id);
        }
      } catch (error) {
        if (error instanceof TransientFetchError) {
          logger.warn({ list, error: error.message }, 'Story list unavailable, skipping');
          continue;
        }
        throw error;
      }
    }

    return [...ids];
  }

  private async enrich(stories: Story[], result: ContinuousSyncResult): Promise<void> {
    if (stories.length === 0) {
      return;
    }
    const report = await this.deps.enrichment.enrich(stories);
    result.enriched += report.summarized + report.tagged;
    result.enrichmentFailed += report.failed;
  }
}
