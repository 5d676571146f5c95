/**
 * Enrichment Stage
 *
 * Shared by every job that produces stories. Splits its input into batches,
 * makes one service call per batch and turns the outcome into persisted
 * status: results become summaries/tags, a failed call parks the whole batch
 * in `failed_pending` for the recovery sweep.
 */

import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { EnrichmentCallError, errorMessage } from '../utils/errors.js';
import type { EnrichmentResult, EnrichmentService, Story, StoryRepository } from '../types/index.js';

export interface EnrichmentReport {
  requested: number;
  summarized: number;
  tagged: number;
  failed: number;
}

export class EnrichmentStage {
  constructor(
    private readonly service: EnrichmentService,
    private readonly stories: StoryRepository,
    private readonly batchSize: number,
    private readonly logger: Logger = rootLogger
  ) {}

  async enrich(stories: Story[]): Promise<EnrichmentReport> {
    const report: EnrichmentReport = {
      requested: stories.length,
      summarized: 0,
      tagged: 0,
      failed: 0,
    };

    for (let start = 0; start < stories.length; start += this.batchSize) {
      await this.enrichBatch(stories.slice(start, start + this.batchSize), report);
    }

    if (stories.length > 0) {
      this.logger.info(
        {
          requested: report.requested,
          summarized: report.summarized,
          tagged: report.tagged,
          failed: report.failed,
        },
        'Enrichment completed'
      );
    }

    return report;
  }

  private async enrichBatch(batch: Story[], report: EnrichmentReport): Promise<void> {
    let results: EnrichmentResult[];
    try {
      results = await this.service.enrichBatch(
        batch.map((story) => ({ storyId: story.id, title: story.title, url: story.url }))
      );
    } catch (error) {
      const callError =
        error instanceof EnrichmentCallError
          ? error
          : new EnrichmentCallError(
              batch.map((story) => story.id),
              errorMessage(error),
              { cause: error }
            );
      this.logger.warn({ storyIds: callError.storyIds, error: callError.message }, 'Enrichment batch failed');
      await this.markFailed(batch, report);
      return;
    }

    const byId = new Map(results.map((result) => [result.storyId, result]));
    const missing: Story[] = [];

    for (const story of batch) {
      const result = byId.get(story.id);
      if (!result) {
        missing.push(story);
        continue;
      }
      const status = await this.stories.saveEnrichment(result, this.service.model);
      if (status === 'tagged') {
        report.tagged++;
      } else {
        report.summarized++;
      }
    }

    if (missing.length > 0) {
      this.logger.warn(
        { externalIds: missing.map((story) => story.externalId) },
        'Stories missing from enrichment response'
      );
      await this.markFailed(missing, report);
    }
  }

  private async markFailed(batch: Story[], report: EnrichmentReport): Promise<void> {
    const updated = await this.stories.recordEnrichmentFailure(batch.map((story) => story.id));
    report.failed += batch.length;
    if (updated.length > 0) {
      this.logger.info(
        { stories: updated.map((story) => ({ externalId: story.externalId, attempts: story.attemptCount })) },
        'Stories parked for recovery'
      );
    }
  }
}
