/**
 * PostgreSQL Taxonomy Repository
 *
 * Tag usage aggregation, agent run records and proposal persistence. Applying a proposal only
 * touches `tags` and `story_tags`, never story enrichment status.
 */

import { query, queryOne, withTransaction, type PoolClient } from './index.js';
import { oneOf, toNumber } from './columns.js';
import { slugify } from '../taxonomy/slug.js';
import {
  OPEN_PROPOSAL_STATUSES,
  type AgentRun,
  type AgentRunReport,
  type AgentRunStatus,
  type ProposalAction,
  type ProposalStatus,
  type TagProposal,
  type TagProposalInput,
  type TagUsage,
  type TaxonomyRepository,
  type WindowStats,
} from '../types/index.js';

const RUN_STATUSES: readonly AgentRunStatus[] = ['running', 'completed', 'failed'];
const PROPOSAL_ACTIONS: readonly ProposalAction[] = ['merge', 'rename', 'retire'];
const PROPOSAL_STATUSES: readonly ProposalStatus[] = [
  'proposed',
  'auto-approved',
  'pending-approval',
  'approved',
  'rejected',
  'applied',
];

interface TagUsageRow {
  id: number;
  name: string;
  slug: string;
  window_count: string;
  total_count: string;
}

interface ProposalRow {
  id: number;
  action: string;
  source_tag_id: number;
  source_tag: string;
  target_tag: string | null;
  reason: string;
  affected_count: number;
  status: string;
  created_at: Date;
  applied_at: Date | null;
}

interface AgentRunRow {
  id: number;
  status: string;
  summary: string | null;
  report: unknown;
  error: string | null;
  started_at: Date;
  finished_at: Date | null;
}

function mapRunRow(row: AgentRunRow): AgentRun {
  return {
    id: row.id,
    status: oneOf(RUN_STATUSES, row.status, 'agent_runs.status'),
    summary: row.summary,
    report: row.report,
    error: row.error,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function mapProposalRow(row: ProposalRow): TagProposal {
  return {
    id: row.id,
    action: oneOf(PROPOSAL_ACTIONS, row.action, 'tag_proposals.action'),
    sourceTagId: row.source_tag_id,
    sourceTag: row.source_tag,
    targetTag: row.target_tag,
    reason: row.reason,
    affectedCount: row.affected_count,
    status: oneOf(PROPOSAL_STATUSES, row.status, 'tag_proposals.status'),
    createdAt: row.created_at,
    appliedAt: row.applied_at,
  };
}

export class PgTaxonomyRepository implements TaxonomyRepository {
  async getTagUsage(since: Date): Promise<TagUsage[]> {
    const rows = await query<TagUsageRow>(
      `SELECT t.id, t.name, t.slug,
              COUNT(DISTINCT st.story_id) FILTER (WHERE s.source_created_at >= $1) AS window_count,
              COUNT(DISTINCT st.story_id) AS total_count
       FROM tags t
       LEFT JOIN story_tags st ON st.tag_id = t.id
       LEFT JOIN stories s ON s.id = st.story_id
       WHERE t.retired_at IS NULL
       GROUP BY t.id
       ORDER BY t.id`,
      [since]
    );
    return rows.map((row) => ({
      tagId: row.id,
      name: row.name,
      slug: row.slug,
      windowCount: toNumber(row.window_count),
      totalCount: toNumber(row.total_count),
    }));
  }

  async getWindowStats(since: Date, structuredTagIds: readonly number[]): Promise<WindowStats> {
    const row = await queryOne<{ stories: string; orphan_stories: string }>(
      `SELECT COUNT(*) AS stories,
              COUNT(*) FILTER (
                WHERE EXISTS (SELECT 1 FROM story_tags st WHERE st.story_id = s.id)
                  AND NOT EXISTS (
                    SELECT 1 FROM story_tags st WHERE st.story_id = s.id AND st.tag_id = ANY($2::int[])
                  )
              ) AS orphan_stories
       FROM stories s
       WHERE s.source_created_at >= $1`,
      [since, structuredTagIds]
    );
    return {
      stories: row ? toNumber(row.stories) : 0,
      orphanStories: row ? toNumber(row.orphan_stories) : 0,
    };
  }

  async getOpenProposalTagIds(): Promise<Set<number>> {
    const rows = await query<{ id: number }>(
      `SELECT source_tag_id AS id FROM tag_proposals WHERE status = ANY($1::text[])
       UNION
       SELECT t.id FROM tags t
       INNER JOIN tag_proposals p ON p.target_tag = t.name
       WHERE p.status = ANY($1::text[])`,
      [OPEN_PROPOSAL_STATUSES]
    );
    return new Set(rows.map((row) => row.id));
  }

  async createProposal(input: TagProposalInput, status: ProposalStatus): Promise<TagProposal> {
    const row = await queryOne<ProposalRow>(
      `INSERT INTO tag_proposals (action, source_tag_id, source_tag, target_tag, reason, affected_count, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        input.action,
        input.sourceTagId,
        input.sourceTag,
        input.targetTag,
        input.reason,
        input.affectedCount,
        status,
      ]
    );
    if (!row) {
      throw new Error(`Failed to create ${input.action} proposal for tag ${input.sourceTag}`);
    }
    return mapProposalRow(row);
  }

  async getProposal(id: number): Promise<TagProposal | null> {
    const row = await queryOne<ProposalRow>('SELECT * FROM tag_proposals WHERE id = $1', [id]);
    return row ? mapProposalRow(row) : null;
  }

  async listProposals(status?: ProposalStatus): Promise<TagProposal[]> {
    const rows = status
      ? await query<ProposalRow>('SELECT * FROM tag_proposals WHERE status = $1 ORDER BY id', [status])
      : await query<ProposalRow>('SELECT * FROM tag_proposals ORDER BY id');
    return rows.map(mapProposalRow);
  }

  async setProposalStatus(id: number, status: ProposalStatus): Promise<void> {
    await query(
      `UPDATE tag_proposals
       SET status = $2,
           applied_at = CASE WHEN $2 IN ('applied', 'auto-approved') THEN NOW() ELSE applied_at END
       WHERE id = $1`,
      [id, status]
    );
  }

  async mergeTags(sourceTagId: number, targetName: string): Promise<number> {
    return withTransaction((client) => mergeInto(client, sourceTagId, targetName));
  }

  async renameTag(tagId: number, newName: string): Promise<void> {
    await withTransaction(async (client) => {
      const slug = slugify(newName);
      const owner = await client.query<{ id: number }>('SELECT id FROM tags WHERE slug = $1 AND id <> $2', [
        slug,
        tagId,
      ]);

      if (owner.rows.length > 0) {
        await mergeInto(client, tagId, newName);
        return;
      }

      await client.query('UPDATE tags SET name = $2, slug = $3 WHERE id = $1', [tagId, newName, slug]);
    });
  }

  async retireTag(tagId: number): Promise<number> {
    return withTransaction(async (client) => {
      const removed = await client.query('DELETE FROM story_tags WHERE tag_id = $1', [tagId]);
      await client.query('UPDATE tags SET retired_at = NOW() WHERE id = $1', [tagId]);
      return removed.rowCount ?? 0;
    });
  }

  async createRun(): Promise<AgentRun> {
    const row = await queryOne<AgentRunRow>(`INSERT INTO agent_runs (status) VALUES ('running') RETURNING *`);
    if (!row) {
      throw new Error('Failed to create agent run');
    }
    return mapRunRow(row);
  }

  async completeRun(id: number, summary: string, report: AgentRunReport): Promise<void> {
    await query(
      `UPDATE agent_runs
       SET status = 'completed', summary = $2, report = $3::jsonb, finished_at = NOW()
       WHERE id = $1`,
      [id, summary, JSON.stringify(report)]
    );
  }

  async failRun(id: number, error: string): Promise<void> {
    await query(
      `UPDATE agent_runs SET status = 'failed', error = $2, finished_at = NOW() WHERE id = $1`,
      [id, error]
    );
  }

  async listRuns(limit: number): Promise<AgentRun[]> {
    const rows = await query<AgentRunRow>('SELECT * FROM agent_runs ORDER BY id DESC LIMIT $1', [limit]);
    return rows.map(mapRunRow);
  }
}

/**
 * Move every link of the source tag onto the target (created or revived as
 * needed) and retire the source; returns links taken off the source
 */
async function mergeInto(client: PoolClient, sourceTagId: number, targetName: string): Promise<number> {
  const target = await client.query<{ id: number }>(
    `INSERT INTO tags (name, slug) VALUES ($1, $2)
     ON CONFLICT (slug) DO UPDATE SET retired_at = NULL
     RETURNING id`,
    [targetName, slugify(targetName)]
  );
  const targetId = target.rows[0]?.id;
  if (targetId === undefined || targetId === sourceTagId) {
    return 0;
  }

  await client.query(
    `INSERT INTO story_tags (story_id, tag_id)
     SELECT story_id, $2 FROM story_tags WHERE tag_id = $1
     ON CONFLICT DO NOTHING`,
    [sourceTagId, targetId]
  );
  const moved = await client.query('DELETE FROM story_tags WHERE tag_id = $1', [sourceTagId]);
  await client.query('UPDATE tags SET retired_at = NOW() WHERE id = $1', [sourceTagId]);
  return moved.rowCount ?? 0;
}
