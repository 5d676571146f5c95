/**
 * PostgreSQL Progress Store
 *
 * One row per job. Run ownership is claimed with a conditional upsert so two
 * processes (or two ticks) cannot both hold `running`.
 */

import { query, queryOne } from './index.js';
import { oneOf, toNumber, toNullableNumber } from './columns.js';
import {
  CURSOR_DIRECTION,
  JOB_NAMES,
  type JobName,
  type ProgressCounters,
  type ProgressRecord,
  type ProgressStore,
  type RunOutcome,
  type RunStatus,
} from '../types/index.js';

const RUN_STATUSES: readonly RunStatus[] = ['idle', 'running', 'error'];

interface ProgressRow {
  job_name: string;
  cursor: string | null;
  status: string;
  last_run_at: Date | null;
  started_at: Date | null;
  failure_count: number;
  last_error: string | null;
  completed_at: Date | null;
  items_processed: string;
  stories_found: string;
}

function mapProgressRow(row: ProgressRow): ProgressRecord {
  return {
    jobName: oneOf(JOB_NAMES, row.job_name, 'progress.job_name'),
    cursor: toNullableNumber(row.cursor),
    status: oneOf(RUN_STATUSES, row.status, 'progress.status'),
    lastRunAt: row.last_run_at,
    startedAt: row.started_at,
    failureCount: row.failure_count,
    lastError: row.last_error,
    completedAt: row.completed_at,
    itemsProcessed: toNumber(row.items_processed),
    storiesFound: toNumber(row.stories_found),
  };
}

export class PgProgressStore implements ProgressStore {
  async getCursor(job: JobName): Promise<number | null> {
    const row = await queryOne<{ cursor: string | null }>('SELECT cursor FROM progress WHERE job_name = $1', [job]);
    return row ? toNullableNumber(row.cursor) : null;
  }

  async getProgress(job: JobName): Promise<ProgressRecord | null> {
    const row = await queryOne<ProgressRow>('SELECT * FROM progress WHERE job_name = $1', [job]);
    return row ? mapProgressRow(row) : null;
  }

  async listProgress(): Promise<ProgressRecord[]> {
    const rows = await query<ProgressRow>('SELECT * FROM progress ORDER BY job_name');
    return rows.map(mapProgressRow);
  }

  async tryBeginRun(job: JobName): Promise<boolean> {
    const row = await queryOne<{ job_name: string }>(
      `INSERT INTO progress (job_name, status, started_at)
       VALUES ($1, 'running', NOW())
       ON CONFLICT (job_name) DO UPDATE
         SET status = 'running', started_at = NOW()
         WHERE progress.status <> 'running'
       RETURNING job_name`,
      [job]
    );
    return row !== null;
  }

  async advanceCursor(job: JobName, value: number, counters: Partial<ProgressCounters> = {}): Promise<void> {
    const direction = CURSOR_DIRECTION[job];
    if (direction === null) {
      throw new Error(`Job ${job} has no cursor`);
    }

    const guard = direction === 'forward' ? 'GREATEST(progress.cursor, $2::bigint)' : 'LEAST(progress.cursor, $2::bigint)';

    await query(
      `INSERT INTO progress (job_name, cursor, items_processed, stories_found)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (job_name) DO UPDATE
         SET cursor = CASE WHEN progress.cursor IS NULL THEN $2::bigint ELSE ${guard} END,
             items_processed = progress.items_processed + $3,
             stories_found = progress.stories_found + $4`,
      [job, value, counters.itemsProcessed ?? 0, counters.storiesFound ?? 0]
    );
  }

  async markCompleted(job: JobName): Promise<void> {
    await query(
      `INSERT INTO progress (job_name, completed_at) VALUES ($1, NOW())
       ON CONFLICT (job_name) DO UPDATE SET completed_at = NOW()`,
      [job]
    );
  }

  async endRun(job: JobName, outcome: RunOutcome): Promise<void> {
    if (outcome.ok) {
      await query(
        `UPDATE progress
         SET status = 'idle', last_run_at = NOW(), failure_count = 0, last_error = NULL
         WHERE job_name = $1`,
        [job]
      );
      return;
    }

    await query(
      `UPDATE progress
       SET status = 'error', failure_count = failure_count + 1, last_error = $2
       WHERE job_name = $1`,
      [job, outcome.error]
    );
  }

  async recordFailure(job: JobName, error: string): Promise<void> {
    await query(
      `INSERT INTO progress (job_name, failure_count, last_error) VALUES ($1, 1, $2)
       ON CONFLICT (job_name) DO UPDATE
         SET failure_count = progress.failure_count + 1, last_error = $2`,
      [job, error]
    );
  }

  async resetProgress(job: JobName, cursor: number | null = null): Promise<void> {
    await query(
      `INSERT INTO progress (job_name, cursor) VALUES ($1, $2)
       ON CONFLICT (job_name) DO UPDATE
         SET cursor = $2, status = 'idle', completed_at = NULL,
             failure_count = 0, last_error = NULL,
             items_processed = 0, stories_found = 0`,
      [job, cursor]
    );
  }

  async releaseInterruptedRuns(): Promise<JobName[]> {
    const rows = await query<{ job_name: string }>(
      `UPDATE progress
       SET status = 'error', failure_count = failure_count + 1,
           last_error = 'Run interrupted by process exit'
       WHERE status = 'running'
       RETURNING job_name`
    );
    return rows.map((row) => oneOf(JOB_NAMES, row.job_name, 'progress.job_name'));
  }
}
