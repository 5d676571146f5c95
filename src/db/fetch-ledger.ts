/**
 * PostgreSQL Fetch Failure Ledger
 */

import { query, queryOne } from './index.js';
import { oneOf, toNumber } from './columns.js';
import {
  JOB_NAMES,
  type FetchFailure,
  type FetchFailureLedger,
  type FetchFailureStatus,
  type JobName,
} from '../types/index.js';

const FAILURE_STATUSES: readonly FetchFailureStatus[] = ['pending', 'abandoned'];

interface FetchFailureRow {
  item_id: string;
  job_name: string;
  attempts: number;
  last_error: string;
  status: string;
  created_at: Date;
  updated_at: Date;
}

function mapFetchFailureRow(row: FetchFailureRow): FetchFailure {
  return {
    itemId: toNumber(row.item_id),
    jobName: oneOf(JOB_NAMES, row.job_name, 'fetch_failures.job_name'),
    attempts: row.attempts,
    lastError: row.last_error,
    status: oneOf(FAILURE_STATUSES, row.status, 'fetch_failures.status'),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgFetchFailureLedger implements FetchFailureLedger {
  async record(itemId: number, jobName: JobName, error: string): Promise<void> {
    await query(
      `INSERT INTO fetch_failures (item_id, job_name, last_error)
       VALUES ($1, $2, $3)
       ON CONFLICT (item_id) DO UPDATE SET
         attempts = fetch_failures.attempts + 1,
         last_error = EXCLUDED.last_error,
         updated_at = NOW()`,
      [itemId, jobName, error]
    );
  }

  async listPending(limit: number): Promise<FetchFailure[]> {
    const rows = await query<FetchFailureRow>(
      `SELECT * FROM fetch_failures
       WHERE status = 'pending'
       ORDER BY updated_at ASC
       LIMIT $1`,
      [limit]
    );
    return rows.map(mapFetchFailureRow);
  }

  async resolve(itemId: number): Promise<void> {
    await query('DELETE FROM fetch_failures WHERE item_id = $1', [itemId]);
  }

  async recordRetryFailure(itemId: number, error: string, maxAttempts: number): Promise<FetchFailure | null> {
    const row = await queryOne<FetchFailureRow>(
      `UPDATE fetch_failures SET
         attempts = attempts + 1,
         last_error = $2,
         status = CASE WHEN attempts + 1 >= $3 THEN 'abandoned' ELSE 'pending' END,
         updated_at = NOW()
       WHERE item_id = $1
       RETURNING *`,
      [itemId, error, maxAttempts]
    );
    return row ? mapFetchFailureRow(row) : null;
  }
}
