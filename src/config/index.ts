/**
 * Application configuration
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import cron from 'node-cron';
import { z } from 'zod';
import { parseEnv, type Env } from './env.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { slugify } from '../taxonomy/slug.js';
import type { TaxonomyDefinition } from '../taxonomy/levels.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildConfig(env: Env) {
  return {
    app: {
      name: 'story-sync',
      version: '1.0.0',
      env: env.NODE_ENV,
    },

    database: {
      url: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.ENRICHMENT_TIMEOUT_MS,
      maxRetries: env.ENRICHMENT_SDK_RETRIES,
    },

    source: {
      baseUrl: env.SOURCE_API_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: env.SOURCE_TIMEOUT_MS,
      sharedRateLimitMs: env.SHARED_FETCH_RATE_LIMIT_MS ?? null,
    },

    retry: {
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      initialDelayMs: env.FETCH_BACKOFF_INITIAL_MS,
      maxDelayMs: Math.max(env.FETCH_BACKOFF_MAX_MS, env.FETCH_BACKOFF_INITIAL_MS),
      factor: 2,
    },

    enrichment: {
      batchSize: env.ENRICHMENT_BATCH_SIZE,
    },

    continuous: {
      schedule: env.CONTINUOUS_CRON,
      batchSize: env.CONTINUOUS_BATCH_SIZE,
      delayMs: env.CONTINUOUS_DELAY_MS,
      startId: env.CONTINUOUS_START_ID ?? null,
      curatedLimit: env.CONTINUOUS_CURATED_LIMIT,
    },

    backfill: {
      schedule: env.BACKFILL_CRON,
      batchSize: env.BACKFILL_BATCH_SIZE,
      maxBatches: env.BACKFILL_MAX_BATCHES,
      horizonDays: env.BACKFILL_DAYS ?? (env.NODE_ENV === 'production' ? 30 : 7),
      delayMs: env.BACKFILL_DELAY_MS,
      startId: env.BACKFILL_START_ID ?? null,
    },

    recovery: {
      schedule: env.RECOVERY_CRON,
      maxAttempts: env.RECOVERY_MAX_ATTEMPTS,
      graceMs: env.RECOVERY_GRACE_MINUTES * 60 * 1000,
      batchLimit: env.RECOVERY_BATCH_LIMIT,
    },

    agent: {
      schedule: env.AGENT_CRON,
      windowDays: env.AGENT_WINDOW_DAYS,
      minTagUsage: env.AGENT_MIN_TAG_USAGE,
      maxProposals: env.AGENT_MAX_PROPOSALS,
      autoApprove: env.AGENT_AUTO_APPROVE,
      autoApproveMaxAffected: env.AGENT_AUTO_APPROVE_MAX_AFFECTED,
      duplicateSimilarity: env.AGENT_DUPLICATE_SIMILARITY,
      maxCategoryTags: env.AGENT_MAX_CATEGORY_TAGS,
      llmReview: env.AGENT_LLM_REVIEW,
    },

    scheduler: {
      enabled: env.SCHEDULER_ENABLED,
      timezone: env.TZ,
    },

    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE,
    },
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Reject cron expressions node-cron cannot parse, before anything is scheduled
 */
export function validateSchedules(config: AppConfig): void {
  const schedules: Record<string, string> = {
    CONTINUOUS_CRON: config.continuous.schedule,
    BACKFILL_CRON: config.backfill.schedule,
    RECOVERY_CRON: config.recovery.schedule,
    AGENT_CRON: config.agent.schedule,
  };

  const issues = Object.entries(schedules)
    .filter(([, expression]) => !cron.validate(expression))
    .map(([key, expression]) => `${key}: invalid cron expression "${expression}"`);

  if (issues.length > 0) {
    throw new ConfigurationError('Schedule validation failed', issues);
  }
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const config = buildConfig(parseEnv(source));
  validateSchedules(config);
  return config;
}

const taxonomyFileSchema = z.object({
  levelOne: z.array(z.string().trim().min(1)).min(1),
  categories: z.record(z.array(z.string().trim().min(1)).min(1)),
});

/**
 * Tag levels and parent categories; level 1 and 2 names are canonical
 */
export function loadTagTaxonomy(path: string = join(__dirname, 'tag-taxonomy.json')): TaxonomyDefinition {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read tag taxonomy from ${path}: ${errorMessage(error)}`);
  }

  const result = taxonomyFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid tag taxonomy in ${path}`, issues);
  }

  const seen = new Map<string, string>();
  const duplicates: string[] = [];
  const names = [...result.data.levelOne, ...Object.values(result.data.categories).flat()];
  for (const name of names) {
    const slug = slugify(name);
    const first = seen.get(slug);
    if (first !== undefined) {
      duplicates.push(`"${name}" collides with "${first}"`);
    } else {
      seen.set(slug, name);
    }
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError(`Invalid tag taxonomy in ${path}`, duplicates);
  }

  return result.data;
}

export { DAY_MS };
export { parseEnv, type Env } from './env.js';
