/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { ConfigurationError } from '../utils/errors.js';

const optionalInt = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().int().positive().optional()
);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60000),
  ENRICHMENT_SDK_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  ENRICHMENT_BATCH_SIZE: z.coerce.number().int().min(1).max(50).default(5),

  // Content source
  SOURCE_API_BASE_URL: z.string().url().default('https://hacker-news.firebaseio.com/v0'),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_BACKOFF_INITIAL_MS: z.coerce.number().int().min(0).default(500),
  FETCH_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8000),
  SHARED_FETCH_RATE_LIMIT_MS: optionalInt,

  // Continuous sync
  CONTINUOUS_CRON: z.string().default('*/2 * * * *'),
  CONTINUOUS_BATCH_SIZE: z.coerce.number().int().min(1).default(50),
  CONTINUOUS_DELAY_MS: z.coerce.number().int().min(0).default(50),
  CONTINUOUS_START_ID: optionalInt,
  CONTINUOUS_CURATED_LIMIT: z.coerce.number().int().min(0).max(500).default(30),

  // Backfill
  BACKFILL_CRON: z.string().default('*/5 * * * *'),
  BACKFILL_BATCH_SIZE: z.coerce.number().int().min(1).default(100),
  BACKFILL_MAX_BATCHES: z.coerce.number().int().min(1).default(50),
  BACKFILL_DAYS: optionalInt,
  BACKFILL_DELAY_MS: z.coerce.number().int().min(0).default(50),
  BACKFILL_START_ID: optionalInt,

  // Recovery sweep
  RECOVERY_CRON: z.string().default('*/5 * * * *'),
  RECOVERY_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(2, 'RECOVERY_MAX_ATTEMPTS must allow at least one retry')
    .default(3),
  RECOVERY_GRACE_MINUTES: z.coerce.number().min(0).default(10),
  RECOVERY_BATCH_LIMIT: z.coerce.number().int().min(1).default(50),

  // Taxonomy agent
  AGENT_CRON: z.string().default('0 4 * * 1'),
  AGENT_WINDOW_DAYS: z.coerce.number().int().min(1).default(30),
  AGENT_MIN_TAG_USAGE: z.coerce.number().int().min(1).default(3),
  AGENT_MAX_PROPOSALS: z.coerce.number().int().min(1).default(10),
  AGENT_AUTO_APPROVE: booleanFlag,
  AGENT_AUTO_APPROVE_MAX_AFFECTED: z.coerce.number().int().min(0).default(5),
  AGENT_DUPLICATE_SIMILARITY: z.coerce.number().gt(0).max(1).default(0.75),
  AGENT_MAX_CATEGORY_TAGS: z.coerce.number().int().min(1).default(15),
  AGENT_LLM_REVIEW: booleanFlag,

  // Scheduling
  SCHEDULER_ENABLED: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1'),
  TZ: z.string().default('UTC'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map; throws ConfigurationError listing every issue
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Environment validation failed', issues);
  }

  return result.data;
}
