/**
 * Scheduler
 *
 * One cron task per job. Overlap protection comes from the progress store
 * rather than process memory, so it also holds across processes.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import type { JobName, ProgressStore, RunOutcome } from './types/index.js';

export interface JobDefinition {
  name: JobName;
  schedule: string;
  run: () => Promise<unknown>;
}

export type TriggerResult =
  | { status: 'skipped' }
  | { status: 'completed'; result: unknown }
  | { status: 'failed'; error: string };

export interface SchedulerOptions {
  timezone: string;
}

export class Scheduler {
  private readonly jobs = new Map<JobName, JobDefinition>();
  private readonly tasks = new Map<JobName, ScheduledTask>();

  constructor(
    private readonly progress: ProgressStore,
    jobs: JobDefinition[],
    private readonly options: SchedulerOptions
  ) {
    for (const job of jobs) {
      this.jobs.set(job.name, job);
    }
  }

  /**
   * Run a job once if no other run of it is in flight
   */
  async runNow(name: JobName): Promise<TriggerResult> {
    const job = this.jobs.get(name);
    if (!job) {
      throw new Error(`Unknown job: ${name}`);
    }

    let acquired: boolean;
    try {
      acquired = await this.progress.tryBeginRun(name);
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ job: name, error }, 'Could not start job');
      await this.progress.recordFailure(name, message).catch((recordError: unknown) => {
        logger.error({ job: name, error: recordError }, 'Could not record job failure');
      });
      return { status: 'failed', error: message };
    }

    if (!acquired) {
      logger.warn({ job: name }, 'Job already running, skipping this execution');
      return { status: 'skipped' };
    }

    const startTime = new Date();
    logger.info({ job: name, startTime: startTime.toISOString() }, 'Job starting');

    let outcome: RunOutcome = { ok: false, error: 'Run did not complete' };
    try {
      const result = await job.run();
      outcome = { ok: true };
      logger.info({ job: name, durationMs: Date.now() - startTime.getTime() }, 'Job completed');
      return { status: 'completed', result };
    } catch (error) {
      const message = errorMessage(error);
      outcome = { ok: false, error: message };
      logger.error({ job: name, error, durationMs: Date.now() - startTime.getTime() }, 'Job failed');
      return { status: 'failed', error: message };
    } finally {
      await this.progress.endRun(name, outcome).catch((endError: unknown) => {
        logger.error({ job: name, error: endError }, 'Could not record end of run');
      });
    }
  }

  /**
   * Schedule every job; throws ConfigurationError before scheduling anything if a cron expression is invalid
   */
  start(): void {
    const invalid = [...this.jobs.values()]
      .filter((job) => !cron.validate(job.schedule))
      .map((job) => `${job.name}: invalid cron expression "${job.schedule}"`);
    if (invalid.length > 0) {
      throw new ConfigurationError('Schedule validation failed', invalid);
    }

    for (const job of this.jobs.values()) {
      if (this.tasks.has(job.name)) {
        continue;
      }

      const task = cron.schedule(
        job.schedule,
        () => {
          this.runNow(job.name).catch((error: unknown) => {
            logger.error({ job: job.name, error }, 'Scheduled execution failed');
          });
        },
        { timezone: this.options.timezone }
      );
      this.tasks.set(job.name, task);

      logger.info({ job: job.name, schedule: job.schedule, timezone: this.options.timezone }, 'Job scheduled');
    }

    logger.info({ jobs: this.tasks.size }, 'Scheduler started');
  }

  stop(): void {
    if (this.tasks.size === 0) {
      return;
    }
    for (const task of this.tasks.values()) {
      task.stop();
    }
    this.tasks.clear();
    logger.info('Scheduler stopped');
  }

  isRunning(): boolean {
    return this.tasks.size > 0;
  }
}
