/**
 * PostgreSQL Story Repository
 *
 * Stories are keyed by external id and only ever upserted. `updated_at`
 * tracks enrichment transitions; score/comment refreshes leave it alone so a
 * re-fetch does not push a failed story out of the recovery window.
 */

import { query, queryOne, withTransaction, type PoolClient } from './index.js';
import { oneOf, toNumber } from './columns.js';
import { slugify } from '../taxonomy/slug.js';
import {
  ENRICHMENT_STATUSES,
  type EnrichmentStatus,
  type RecoverableQuery,
  type Story,
  type StoryEnrichment,
  type StoryInput,
  type StoryRepository,
  type StorySummary,
  type UpsertResult,
} from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Row Types
// ═══════════════════════════════════════════════════════════════════════════════

interface StoryRow {
  id: number;
  external_id: string;
  title: string;
  url: string | null;
  score: number;
  author: string;
  comment_count: number;
  source_created_at: Date;
  status: string;
  attempt_count: number;
  created_at: Date;
  updated_at: Date;
}

interface SummaryRow {
  story_id: number;
  text: string;
  model: string;
  created_at: Date;
}

function mapStoryRow(row: StoryRow): Story {
  return {
    id: row.id,
    externalId: toNumber(row.external_id),
    title: row.title,
    url: row.url,
    score: row.score,
    author: row.author,
    commentCount: row.comment_count,
    sourceCreatedAt: row.source_created_at,
    status: oneOf(ENRICHMENT_STATUSES, row.status, 'stories.status'),
    attemptCount: row.attempt_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Repository
// ═══════════════════════════════════════════════════════════════════════════════

export class PgStoryRepository implements StoryRepository {
  async upsertStory(input: StoryInput): Promise<UpsertResult> {
    const row = await queryOne<StoryRow & { inserted: boolean }>(
      `INSERT INTO stories (external_id, title, url, score, author, comment_count, source_created_at)
       VALUES ($1, $2, $3, GREATEST($4::int, 0), $5, $6, $7)
       ON CONFLICT (external_id) DO UPDATE SET
         title = EXCLUDED.title,
         url = EXCLUDED.url,
         score = EXCLUDED.score,
         comment_count = EXCLUDED.comment_count
       RETURNING *, (xmax = 0) AS inserted`,
      [
        input.externalId,
        input.title,
        input.url,
        input.score,
        input.author,
        input.commentCount,
        input.sourceCreatedAt,
      ]
    );

    if (!row) {
      throw new Error(`Upsert of story ${input.externalId} returned no row`);
    }

    return { story: mapStoryRow(row), created: row.inserted };
  }

  async getByExternalId(externalId: number): Promise<Story | null> {
    const row = await queryOne<StoryRow>('SELECT * FROM stories WHERE external_id = $1', [externalId]);
    return row ? mapStoryRow(row) : null;
  }

  async getSummary(storyId: number): Promise<StorySummary | null> {
    const row = await queryOne<SummaryRow>(
      'SELECT story_id, text, model, created_at FROM summaries WHERE story_id = $1',
      [storyId]
    );
    return row
      ? { storyId: row.story_id, text: row.text, model: row.model, createdAt: row.created_at }
      : null;
  }

  async getTagNames(storyId: number): Promise<string[]> {
    const rows = await query<{ name: string }>(
      `SELECT t.name FROM tags t
       INNER JOIN story_tags st ON st.tag_id = t.id
       WHERE st.story_id = $1
       ORDER BY t.name`,
      [storyId]
    );
    return rows.map((row) => row.name);
  }

  async getMinExternalId(): Promise<number | null> {
    const row = await queryOne<{ min: string | null }>('SELECT MIN(external_id) AS min FROM stories');
    return row?.min != null ? toNumber(row.min) : null;
  }

  async saveEnrichment(result: StoryEnrichment, model: string): Promise<EnrichmentStatus> {
    return withTransaction(async (client) => {
      await client.query(
        `INSERT INTO summaries (story_id, text, model)
         VALUES ($1, $2, $3)
         ON CONFLICT (story_id) DO UPDATE SET
           text = EXCLUDED.text,
           model = EXCLUDED.model,
           created_at = NOW()`,
        [result.storyId, result.summary, model]
      );

      // Re-enrichment replaces the previous tag set
      await client.query('DELETE FROM story_tags WHERE story_id = $1', [result.storyId]);

      let linked = 0;
      for (const name of result.tags) {
        const tagId = await resolveActiveTag(client, name);
        if (tagId === null) {
          continue;
        }
        const link = await client.query(
          'INSERT INTO story_tags (story_id, tag_id) VALUES ($1, $2) ON CONFLICT DO NOTHING',
          [result.storyId, tagId]
        );
        linked += link.rowCount ?? 0;
      }

      const status: EnrichmentStatus = linked > 0 ? 'tagged' : 'summarized';
      await client.query('UPDATE stories SET status = $2, updated_at = NOW() WHERE id = $1', [
        result.storyId,
        status,
      ]);
      return status;
    });
  }

  async recordEnrichmentFailure(storyIds: number[]): Promise<Story[]> {
    if (storyIds.length === 0) {
      return [];
    }
    const rows = await query<StoryRow>(
      `UPDATE stories
       SET status = 'failed_pending', attempt_count = attempt_count + 1, updated_at = NOW()
       WHERE id = ANY($1::int[]) AND status IN ('pending', 'failed_pending')
       RETURNING *`,
      [storyIds]
    );
    return rows.map(mapStoryRow);
  }

  async retireExhausted(maxAttempts: number): Promise<Story[]> {
    const rows = await query<StoryRow>(
      `UPDATE stories
       SET status = 'failed', updated_at = NOW()
       WHERE status = 'failed_pending' AND attempt_count >= $1
       RETURNING *`,
      [maxAttempts]
    );
    return rows.map(mapStoryRow);
  }

  async findRecoverable({ maxAttempts, olderThan, limit }: RecoverableQuery): Promise<Story[]> {
    const rows = await query<StoryRow>(
      `SELECT * FROM stories
       WHERE status = 'failed_pending' AND attempt_count < $1 AND updated_at <= $2
       ORDER BY updated_at ASC
       LIMIT $3`,
      [maxAttempts, olderThan, limit]
    );
    return rows.map(mapStoryRow);
  }

  async countByStatus(): Promise<Record<EnrichmentStatus, number>> {
    const rows = await query<{ status: string; count: string }>(
      'SELECT status, COUNT(*) AS count FROM stories GROUP BY status'
    );
    const counts: Record<EnrichmentStatus, number> = {
      pending: 0,
      summarized: 0,
      tagged: 0,
      failed_pending: 0,
      failed: 0,
    };
    for (const row of rows) {
      counts[oneOf(ENRICHMENT_STATUSES, row.status, 'stories.status')] = toNumber(row.count);
    }
    return counts;
  }
}

/**
 * Find or create a tag by slug; null for retired tags and empty slugs
 */
async function resolveActiveTag(client: PoolClient, name: string): Promise<number | null> {
  const slug = slugify(name);
  if (!slug) {
    return null;
  }

  const result = await client.query<{ id: number; retired_at: Date | null }>(
    `INSERT INTO tags (name, slug) VALUES ($1, $2)
     ON CONFLICT (slug) DO UPDATE SET slug = EXCLUDED.slug
     RETURNING id, retired_at`,
    [name.trim(), slug]
  );
  const tag = result.rows[0];
  return tag && tag.retired_at === null ? tag.id : null;
}
