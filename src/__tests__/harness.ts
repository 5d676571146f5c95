import { ItemFetcher } from '../scraper/item-fetcher.js';
import { StoryIngestor } from '../jobs/ingest.js';
import { EnrichmentStage } from '../summarizer/enrichment-stage.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { logger } from '../utils/logger.js';
import {
  FakeContentSource,
  FakeEnrichmentService,
  InMemoryFetchFailureLedger,
  InMemoryProgressStore,
  InMemoryStoryRepository,
  type Clock,
} from './fakes.js';
import type { RetryConfig } from '../types/index.js';

export const NO_DELAY_RETRY: RetryConfig = { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0, factor: 2 };

export interface HarnessOptions {
  maxItemId?: number;
  enrichmentBatchSize?: number;
  clock?: Clock;
}

export function createHarness(options: HarnessOptions = {}) {
  const source = new FakeContentSource(options.maxItemId ?? 0);
  const stories = new InMemoryStoryRepository(options.clock);
  const ledger = new InMemoryFetchFailureLedger();
  const progress = new InMemoryProgressStore();
  const enrichmentService = new FakeEnrichmentService();
  const fetcher = new ItemFetcher(source, new RateLimiter(0), NO_DELAY_RETRY);
  const ingestor = new StoryIngestor(fetcher, stories, logger);
  const enrichment = new EnrichmentStage(enrichmentService, stories, options.enrichmentBatchSize ?? 5, logger);

  return { source, stories, ledger, progress, enrichmentService, fetcher, ingestor, enrichment, logger };
}

export type Harness = ReturnType<typeof createHarness>;
