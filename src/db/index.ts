/**
 * PostgreSQL Database Connection
 */

import pg from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import { SCHEMA } from './schema.js';
import { logger } from '../utils/logger.js';

const { Pool } = pg;

export interface DatabaseSettings {
  url: string;
  poolMax: number;
  statementTimeoutMs: number;
}

let pool: pg.Pool | null = null;

/**
 * Get the initialized pool
 */
export function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(settings: DatabaseSettings): Promise<void> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return;
  }

  const created = new Pool({
    connectionString: settings.url,
    max: settings.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: settings.statementTimeoutMs,
  });

  created.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await created.connect();
    logger.info({ poolMax: settings.poolMax }, 'Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await created.end();
    throw error;
  }

  pool = created;
  await initSchema(created);
}

async function initSchema(target: pg.Pool): Promise<void> {
  try {
    await target.query(SCHEMA);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Execute a query and return rows
 */
export async function query<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const result = await getPool().query<T>(text, params);
  return result.rows;
}

/**
 * Execute a query and return first row or null
 */
export async function queryOne<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const result = await getPool().query<T>(text, params);
  return result.rows[0] ?? null;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client; rolls back on error
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error({ error: rollbackError }, 'Rollback failed');
    });
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}

export type { PoolClient };
