/**
 * Backfill Job
 *
 * Walks backward through historical items. The cursor is the lowest id
 * already processed; each batch covers the ids just below it. The walk ends
 * for good at the day horizon or at id 1, until the progress is reset.
 */

import { DAY_MS } from '../config/index.js';
import type { EnrichmentStage } from '../summarizer/enrichment-stage.js';
import type { ItemFetcher } from '../scraper/item-fetcher.js';
import type { Logger } from '../utils/logger.js';
import type { StoryIngestor } from './ingest.js';
import type { FetchFailureLedger, ProgressStore, Story, StoryRepository } from '../types/index.js';

const JOB = 'backfill';

export interface BackfillSettings {
  batchSize: number;
  maxBatches: number;
  horizonDays: number;
  startId: number | null;
}

export interface BackfillDeps {
  progress: ProgressStore;
  fetcher: ItemFetcher;
  ingestor: StoryIngestor;
  enrichment: EnrichmentStage;
  stories: StoryRepository;
  ledger: FetchFailureLedger;
  logger: Logger;
  now?: () => Date;
}

export type BackfillStatus = 'already-completed' | 'in-progress' | 'completed';

export interface BackfillResult {
  status: BackfillStatus;
  startCursor: number | null;
  endCursor: number | null;
  batches: number;
  itemsProcessed: number;
  storiesFound: number;
  deferred: number;
  enriched: number;
  enrichmentFailed: number;
  /** Why the walk finished, when it did */
  completedReason: 'horizon' | 'id-floor' | null;
}

export class BackfillJob {
  readonly name = JOB;

  constructor(
    private readonly deps: BackfillDeps,
    private readonly settings: BackfillSettings
  ) {}

  async run(): Promise<BackfillResult> {
    const { progress, logger } = this.deps;
    const now = this.deps.now?.() ?? new Date();

    const record = await progress.getProgress(JOB);
    if (record?.completedAt) {
      logger.debug({ completedAt: record.completedAt.toISOString() }, 'Backfill already completed');
      return this.emptyResult('already-completed', record.cursor);
    }

    let cursor = record?.cursor ?? null;
    if (cursor === null) {
      cursor = await this.initialCursor();
      await progress.advanceCursor(JOB, cursor);
      logger.info({ cursor }, 'Initialized backfill cursor');
    }

    const horizon = new Date(now.getTime() - this.settings.horizonDays * DAY_MS);
    const result = this.emptyResult('in-progress', cursor);

    for (let batch = 0; batch < this.settings.maxBatches; batch++) {
      if (cursor <= 1) {
        result.completedReason = 'id-floor';
        break;
      }

      const high = cursor - 1;
      const low = Math.max(1, cursor - this.settings.batchSize);
      const { lowestProcessed, reachedHorizon } = await this.applyBatch(high, low, horizon, result);
      result.batches++;

      if (lowestProcessed !== null) {
        cursor = lowestProcessed;
        result.endCursor = cursor;
      }

      if (reachedHorizon) {
        result.completedReason = 'horizon';
        break;
      }
    }

    if (result.completedReason === null && cursor <= 1) {
      result.completedReason = 'id-floor';
    }

    if (result.completedReason !== null) {
      await progress.markCompleted(JOB);
      result.status = 'completed';
      logger.info({ cursor, reason: result.completedReason, horizon: horizon.toISOString() }, 'Backfill completed');
    }

    logger.info(
      {
        startCursor: result.startCursor,
        endCursor: result.endCursor,
        batches: result.batches,
        itemsProcessed: result.itemsProcessed,
        storiesFound: result.storiesFound,
      },
      'Backfill run finished'
    );

    return result;
  }

  private async initialCursor(): Promise<number> {
    if (this.settings.startId !== null) {
      return this.settings.startId + 1;
    }
    const lowest = await this.deps.stories.getMinExternalId();
    if (lowest !== null) {
      return lowest;
    }
    return (await this.deps.fetcher.maxItemId()) + 1;
  }

  /**
   * Process ids high..low descending; stops early at the first item older than the horizon
   */
  private async applyBatch(
    high: number,
    low: number,
    horizon: Date,
    result: BackfillResult
  ): Promise<{ lowestProcessed: number | null; reachedHorizon: boolean }> {
    const { ingestor, ledger, progress } = this.deps;
    const pending: Story[] = [];
    let lowestProcessed: number | null = null;
    let reachedHorizon = false;
    let storiesFound = 0;

    for (let id = high; id >= low; id--) {
      const outcome = await ingestor.ingest(id, { horizon });

      if (outcome.kind === 'before-horizon') {
        reachedHorizon = true;
        break;
      }

      if (outcome.kind === 'stored') {
        storiesFound++;
        if (outcome.story.status === 'pending') {
          pending.push(outcome.story);
        }
      } else if (outcome.kind === 'transient') {
        await ledger.record(id, JOB, outcome.error.message);
        result.deferred++;
      }

      lowestProcessed = id;
    }

    if (pending.length > 0) {
      const report = await this.deps.enrichment.enrich(pending);
      result.enriched += report.summarized + report.tagged;
      result.enrichmentFailed += report.failed;
    }

    const itemsProcessed = lowestProcessed === null ? 0 : high - lowestProcessed + 1;
    if (lowestProcessed !== null) {
      await progress.advanceCursor(JOB, lowestProcessed, { itemsProcessed, storiesFound });
    }

    result.itemsProcessed += itemsProcessed;
    result.storiesFound += storiesFound;
    return { lowestProcessed, reachedHorizon };
  }

  private emptyResult(status: BackfillStatus, cursor: number | null): BackfillResult {
    return {
      status,
      startCursor: cursor,
      endCursor: cursor,
      batches: 0,
      itemsProcessed: 0,
      storiesFound: 0,
      deferred: 0,
      enriched: 0,
      enrichmentFailed: 0,
      completedReason: null,
    };
  }
}
