#!/usr/bin/env node
/**
 * Story Sync
 *
 * Keeps a PostgreSQL store in step with a paginated item API:
 * 1. Continuous sync polls forward from the newest applied item
 * 2. Backfill walks backward to a day horizon
 * 3. Recovery sweep retries failed enrichment and deferred fetches
 * 4. Taxonomy agent reports on tag health and proposes merges, renames and
 *    retirements
 *
 * Usage: see `USAGE` in cli.ts; default is service mode.
 */

import { loadConfig, loadTagTaxonomy, type AppConfig } from './config/index.js';
import { configureLogger, logger } from './utils/logger.js';
import { ConfigurationError } from './utils/errors.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { createDefaultDependencies, createSyncService, type SyncService } from './pipeline.js';
import { parseCommand, USAGE, type Command } from './cli.js';

async function printStatus(service: SyncService): Promise<void> {
  const [progress, counts] = await Promise.all([service.progress.listProgress(), service.stories.countByStatus()]);

  for (const record of progress) {
    logger.info(
      {
        job: record.jobName,
        status: record.status,
        cursor: record.cursor,
        failureCount: record.failureCount,
        lastError: record.lastError,
        lastRunAt: record.lastRunAt?.toISOString() ?? 'never',
        completedAt: record.completedAt?.toISOString() ?? null,
        itemsProcessed: record.itemsProcessed,
        storiesFound: record.storiesFound,
      },
      'Job progress'
    );
  }
  logger.info({ stories: counts }, 'Stories by enrichment status');
}

async function runCommand(command: Command, service: SyncService, config: AppConfig): Promise<boolean> {
  switch (command.kind) {
    case 'run': {
      const outcome = await service.scheduler.runNow(command.job);
      logger.info({ job: command.job, ...outcome }, 'Run finished');
      return outcome.status !== 'failed';
    }
    case 'status':
      await printStatus(service);
      return true;
    case 'reset':
      await service.progress.resetProgress(command.job, command.cursor);
      logger.info({ job: command.job, cursor: command.cursor }, 'Progress reset');
      return true;
    case 'proposals': {
      const proposals = await service.taxonomy.listProposals('pending-approval');
      for (const proposal of proposals) {
        logger.info({ ...proposal }, 'Pending proposal');
      }
      logger.info({ count: proposals.length }, 'Proposals awaiting approval');
      return true;
    }
    case 'agent-runs': {
      const runs = await service.taxonomy.listRuns(command.limit);
      for (const run of runs) {
        logger.info(
          {
            runId: run.id,
            status: run.status,
            startedAt: run.startedAt.toISOString(),
            finishedAt: run.finishedAt?.toISOString() ?? null,
            summary: run.summary,
            error: run.error,
          },
          'Taxonomy agent run'
        );
      }
      return true;
    }
    case 'apply-proposal':
      await service.taxonomy.applyProposal(command.id);
      return true;
    case 'reject-proposal':
      await service.taxonomy.rejectProposal(command.id);
      return true;
    case 'service':
      await startService(service, config);
      return true;
  }
}

async function startService(service: SyncService, config: AppConfig): Promise<void> {
  const released = await service.progress.releaseInterruptedRuns();
  if (released.length > 0) {
    logger.warn({ jobs: released }, 'Released runs interrupted by a previous process');
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    service.scheduler.stop();
    await closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  if (!config.scheduler.enabled) {
    logger.warn('Scheduler disabled (SCHEDULER_ENABLED=false); waiting for signals');
    setInterval(() => {
      logger.debug('Service heartbeat');
    }, 60000);
    return;
  }

  service.scheduler.start();
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

async function main(): Promise<void> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (error) {
    logger.fatal({ error }, `Invalid arguments\n${USAGE}`);
    process.exit(1);
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, error.message);
      process.exit(1);
    }
    throw error;
  }

  configureLogger(config.logging);
  logger.info({ env: config.app.env, mode: command.kind }, 'Starting application');

  try {
    await initDatabase(config.database);
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    process.exit(1);
  }

  const service = createSyncService(config, createDefaultDependencies(config, loadTagTaxonomy()));

  if (command.kind === 'service') {
    await runCommand(command, service, config);
    return;
  }

  let ok = false;
  try {
    ok = await runCommand(command, service, config);
  } finally {
    await closeDatabase();
  }
  process.exit(ok ? 0 : 1);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
