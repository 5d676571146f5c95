/**
 * Service Wiring
 *
 * Builds the four jobs and the scheduler from configuration plus the
 * storage and external-service collaborators. Nothing here holds global
 * state; the progress store is handed to every job and to the scheduler.
 */

import { HttpContentSource, ItemFetcher } from './scraper/index.js';
import { EnrichmentStage, OpenAiEnrichmentService, createOpenAiClient } from './summarizer/index.js';
import { StoryIngestor } from './jobs/ingest.js';
import { ContinuousSyncJob } from './jobs/continuous-sync.js';
import { BackfillJob } from './jobs/backfill.js';
import { RecoverySweepJob } from './jobs/recovery-sweep.js';
import { TaxonomyAgentJob } from './jobs/taxonomy-agent.js';
import { TagCatalog, type TaxonomyDefinition } from './taxonomy/levels.js';
import { OpenAiTagAdvisor, type TagAdvisor } from './taxonomy/advisor.js';
import { PgProgressStore } from './db/progress-store.js';
import { PgStoryRepository } from './db/story-repository.js';
import { PgFetchFailureLedger } from './db/fetch-ledger.js';
import { PgTaxonomyRepository } from './db/taxonomy-repository.js';
import { Scheduler } from './scheduler.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { logger } from './utils/logger.js';
import type { AppConfig } from './config/index.js';
import type {
  ContentSource,
  EnrichmentService,
  FetchFailureLedger,
  JobName,
  ProgressStore,
  StoryRepository,
  TaxonomyRepository,
} from './types/index.js';

export interface ServiceDependencies {
  progress: ProgressStore;
  stories: StoryRepository;
  ledger: FetchFailureLedger;
  taxonomy: TaxonomyRepository;
  source: ContentSource;
  enrichmentService: EnrichmentService;
  catalog: TagCatalog;
  tagAdvisor?: TagAdvisor | null;
  now?: () => Date;
}

export interface SyncService {
  progress: ProgressStore;
  stories: StoryRepository;
  continuous: ContinuousSyncJob;
  backfill: BackfillJob;
  recovery: RecoverySweepJob;
  taxonomy: TaxonomyAgentJob;
  scheduler: Scheduler;
}

/**
 * Production collaborators: PostgreSQL repositories, the HTTP item API and OpenAI;
 * the tag review shares the enrichment client
 */
export function createDefaultDependencies(
  config: AppConfig,
  taxonomy: TaxonomyDefinition
): ServiceDependencies {
  const completions = createOpenAiClient(config.openai);
  return {
    progress: new PgProgressStore(),
    stories: new PgStoryRepository(),
    ledger: new PgFetchFailureLedger(),
    taxonomy: new PgTaxonomyRepository(),
    source: new HttpContentSource({ baseUrl: config.source.baseUrl, timeoutMs: config.source.timeoutMs }),
    enrichmentService: new OpenAiEnrichmentService(completions, config.openai.model),
    catalog: new TagCatalog(taxonomy),
    tagAdvisor: config.agent.llmReview ? new OpenAiTagAdvisor(completions, config.openai.model, taxonomy) : null,
  };
}

export function createSyncService(config: AppConfig, deps: ServiceDependencies): SyncService {
  const shared =
    config.source.sharedRateLimitMs !== null ? new RateLimiter(config.source.sharedRateLimitMs) : null;

  const jobLogger = (job: JobName) => logger.child({ job });

  // Each job gets its own limiter unless one shared budget is configured
  const ingestionFor = (job: JobName, intervalMs: number) => {
    const log = jobLogger(job);
    const fetcher = new ItemFetcher(deps.source, shared ?? new RateLimiter(intervalMs), config.retry);
    return {
      logger: log,
      fetcher,
      ingestor: new StoryIngestor(fetcher, deps.stories, log),
      enrichment: new EnrichmentStage(deps.enrichmentService, deps.stories, config.enrichment.batchSize, log),
    };
  };

  const continuous = new ContinuousSyncJob(
    { progress: deps.progress, ledger: deps.ledger, ...ingestionFor('continuous', config.continuous.delayMs) },
    {
      batchSize: config.continuous.batchSize,
      startId: config.continuous.startId,
      curatedLimit: config.continuous.curatedLimit,
      chunkSize: config.enrichment.batchSize,
    }
  );

  const backfill = new BackfillJob(
    {
      progress: deps.progress,
      stories: deps.stories,
      ledger: deps.ledger,
      now: deps.now,
      ...ingestionFor('backfill', config.backfill.delayMs),
    },
    {
      batchSize: config.backfill.batchSize,
      maxBatches: config.backfill.maxBatches,
      horizonDays: config.backfill.horizonDays,
      startId: config.backfill.startId,
    }
  );

  const recovery = new RecoverySweepJob(
    {
      stories: deps.stories,
      ledger: deps.ledger,
      now: deps.now,
      ...ingestionFor('recovery', config.continuous.delayMs),
    },
    {
      maxAttempts: config.recovery.maxAttempts,
      graceMs: config.recovery.graceMs,
      batchLimit: config.recovery.batchLimit,
    }
  );

  const taxonomy = new TaxonomyAgentJob(
    { taxonomy: deps.taxonomy, logger: jobLogger('taxonomy'), advisor: deps.tagAdvisor, now: deps.now },
    {
      windowDays: config.agent.windowDays,
      minTagUsage: config.agent.minTagUsage,
      maxProposals: config.agent.maxProposals,
      autoApprove: config.agent.autoApprove,
      autoApproveMaxAffected: config.agent.autoApproveMaxAffected,
      duplicateSimilarity: config.agent.duplicateSimilarity,
      maxCategoryTags: config.agent.maxCategoryTags,
      catalog: deps.catalog,
    }
  );

  const scheduler = new Scheduler(
    deps.progress,
    [
      { name: 'continuous', schedule: config.continuous.schedule, run: () => continuous.run() },
      { name: 'backfill', schedule: config.backfill.schedule, run: () => backfill.run() },
      { name: 'recovery', schedule: config.recovery.schedule, run: () => recovery.run() },
      { name: 'taxonomy', schedule: config.agent.schedule, run: () => taxonomy.run() },
    ],
    { timezone: config.scheduler.timezone }
  );

  return { progress: deps.progress, stories: deps.stories, continuous, backfill, recovery, taxonomy, scheduler };
}
