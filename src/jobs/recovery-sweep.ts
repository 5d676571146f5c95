/**
 * Recovery Sweep Job
 *
 * Retries enrichment for stories parked in `failed_pending` and fetches for
 * ids parked in the failure ledger. Selection is by explicit failure status
 * only, so stories that were enriched are never touched.
 */

import { ExhaustedRecoveryAttemptsError } from '../utils/errors.js';
import type { EnrichmentStage } from '../summarizer/enrichment-stage.js';
import type { Logger } from '../utils/logger.js';
import type { StoryIngestor } from './ingest.js';
import type { FetchFailureLedger, Story, StoryRepository } from '../types/index.js';

const JOB = 'recovery';

export interface RecoverySettings {
  maxAttempts: number;
  graceMs: number;
  batchLimit: number;
}

export interface RecoveryDeps {
  stories: StoryRepository;
  ledger: FetchFailureLedger;
  ingestor: StoryIngestor;
  enrichment: EnrichmentStage;
  logger: Logger;
  now?: () => Date;
}

export interface RecoveryResult {
  selected: number;
  recovered: number;
  failedAgain: number;
  exhausted: number;
  ledgerRetried: number;
  ledgerResolved: number;
  ledgerAbandoned: number;
}

export class RecoverySweepJob {
  readonly name = JOB;

  constructor(
    private readonly deps: RecoveryDeps,
    private readonly settings: RecoverySettings
  ) {}

  async run(): Promise<RecoveryResult> {
    const { stories, enrichment, logger } = this.deps;
    const now = this.deps.now?.() ?? new Date();

    const result: RecoveryResult = {
      selected: 0,
      recovered: 0,
      failedAgain: 0,
      exhausted: 0,
      ledgerRetried: 0,
      ledgerResolved: 0,
      ledgerAbandoned: 0,
    };

    result.exhausted += await this.retireExhausted();

    const candidates = await stories.findRecoverable({
      maxAttempts: this.settings.maxAttempts,
      olderThan: new Date(now.getTime() - this.settings.graceMs),
      limit: this.settings.batchLimit,
    });
    result.selected = candidates.length;

    if (candidates.length > 0) {
      const report = await enrichment.enrich(candidates);
      result.recovered = report.summarized + report.tagged;
      result.failedAgain = report.failed;
      result.exhausted += await this.retireExhausted();
    }

    await this.retryLedger(result);

    logger.info({ ...result }, 'Recovery sweep completed');
    return result;
  }

  private async retireExhausted(): Promise<number> {
    const retired = await this.deps.stories.retireExhausted(this.settings.maxAttempts);
    for (const story of retired) {
      const error = new ExhaustedRecoveryAttemptsError(story.id, story.externalId, story.attemptCount);
      this.deps.logger.error({ storyId: story.id, externalId: story.externalId, error }, error.message);
    }
    return retired.length;
  }

  /**
   * One fetch attempt per ledger entry; the entry is abandoned once it reaches the attempt budget
   */
  private async retryLedger(result: RecoveryResult): Promise<void> {
    const { ledger, ingestor, enrichment, logger } = this.deps;
    const entries = await ledger.listPending(this.settings.batchLimit);
    const pending: Story[] = [];

    for (const entry of entries) {
      result.ledgerRetried++;
      const outcome = await ingestor.ingest(entry.itemId, { maxAttempts: 1 });

      switch (outcome.kind) {
        case 'stored':
          if (outcome.story.status === 'pending') {
            pending.push(outcome.story);
          }
          await ledger.resolve(entry.itemId);
          result.ledgerResolved++;
          break;
        case 'skipped':
        case 'before-horizon':
          await ledger.resolve(entry.itemId);
          result.ledgerResolved++;
          break;
        case 'transient': {
          const updated = await ledger.recordRetryFailure(
            entry.itemId,
            outcome.error.message,
            this.settings.maxAttempts
          );
          if (updated?.status === 'abandoned') {
            result.ledgerAbandoned++;
            logger.error({ itemId: entry.itemId, attempts: updated.attempts }, 'Giving up on item fetch');
          }
          break;
        }
      }
    }

    if (pending.length > 0) {
      await enrichment.enrich(pending);
    }
  }
}
