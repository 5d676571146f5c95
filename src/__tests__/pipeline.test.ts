import { describe, it, expect } from 'vitest';
import { createSyncService } from '../pipeline.js';
import { buildConfig, parseEnv } from '../config/index.js';
import { TagCatalog } from '../taxonomy/levels.js';
import {
  FakeContentSource,
  FakeEnrichmentService,
  InMemoryFetchFailureLedger,
  InMemoryProgressStore,
  InMemoryStoryRepository,
  InMemoryTaxonomyRepository,
} from './fakes.js';

function createService() {
  const config = buildConfig(
    parseEnv({
      DATABASE_URL: 'postgres://localhost:5432/test',
      OPENAI_API_KEY: 'test-secret',
      NODE_ENV: 'test',
      CONTINUOUS_START_ID: '100',
      CONTINUOUS_CURATED_LIMIT: '0',
      CONTINUOUS_DELAY_MS: '0',
      BACKFILL_DELAY_MS: '0',
      BACKFILL_BATCH_SIZE: '10',
      BACKFILL_MAX_BATCHES: '1',
      FETCH_BACKOFF_INITIAL_MS: '0',
      FETCH_BACKOFF_MAX_MS: '0',
    })
  );
  const source = new FakeContentSource(103);
  const stories = new InMemoryStoryRepository();
  const progress = new InMemoryProgressStore();
  const service = createSyncService(config, {
    progress,
    stories,
    ledger: new InMemoryFetchFailureLedger(),
    taxonomy: new InMemoryTaxonomyRepository(stories),
    source,
    enrichmentService: new FakeEnrichmentService(),
    catalog: new TagCatalog({ levelOne: ['Tech'], categories: {} }),
  });
  return { service, source, stories, progress };
}

describe('createSyncService', () => {
  it('runs continuous sync through the scheduler', async () => {
    const { service, source, stories, progress } = createService();
    for (const id of [101, 102, 103]) {
      source.addStory(id);
    }

    const outcome = await service.scheduler.runNow('continuous');

    expect(outcome.status).toBe('completed');
    expect(await progress.getCursor('continuous')).toBe(103);
    expect((await stories.countByStatus()).tagged).toBe(3);
  });

  it('shares one story store between the jobs', async () => {
    const { service, source, stories } = createService();
    source.addStory(101);
    await service.scheduler.runNow('continuous');

    const outcome = await service.scheduler.runNow('backfill');

    expect(outcome.status).toBe('completed');
    expect(source.requested.slice(-10)).toEqual([100, 99, 98, 97, 96, 95, 94, 93, 92, 91]);
    expect(stories.stories.size).toBe(1);
  });

  it('runs the taxonomy agent and records the run', async () => {
    const { service } = createService();

    const outcome = await service.scheduler.runNow('taxonomy');

    expect(outcome).toMatchObject({ status: 'completed', result: { runId: 1, tagsAnalyzed: 0, applied: 0 } });
    expect((await service.taxonomy.listRuns(5)).map((run) => run.status)).toEqual(['completed']);
  });
});
