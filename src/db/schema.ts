/**
 * PostgreSQL Database Schema
 *
 * Applied at startup; every statement is idempotent.
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Stories Table
-- One row per external item id; refreshed on re-fetch
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS stories (
  id SERIAL PRIMARY KEY,
  external_id BIGINT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  url TEXT,
  score INTEGER NOT NULL DEFAULT 0 CHECK (score >= 0),
  author TEXT NOT NULL DEFAULT 'unknown',
  comment_count INTEGER NOT NULL DEFAULT 0,
  source_created_at TIMESTAMPTZ NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'summarized', 'tagged', 'failed_pending', 'failed')),
  attempt_count INTEGER NOT NULL DEFAULT 0,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_stories_status_updated ON stories(status, updated_at);
CREATE INDEX IF NOT EXISTS idx_stories_source_created ON stories(source_created_at);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Summaries Table
-- At most one summary per story, overwritten on re-enrichment
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS summaries (
  id SERIAL PRIMARY KEY,
  story_id INTEGER NOT NULL UNIQUE REFERENCES stories(id) ON DELETE CASCADE,
  text TEXT NOT NULL,
  model TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Tags Tables
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS tags (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  slug TEXT NOT NULL UNIQUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  retired_at TIMESTAMPTZ
);

CREATE TABLE IF NOT EXISTS story_tags (
  story_id INTEGER NOT NULL REFERENCES stories(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (story_id, tag_id)
);

CREATE INDEX IF NOT EXISTS idx_story_tags_tag ON story_tags(tag_id);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Tag Proposals Table
-- Output of the taxonomy agent
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS tag_proposals (
  id SERIAL PRIMARY KEY,
  action TEXT NOT NULL CHECK (action IN ('merge', 'rename', 'retire')),
  source_tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  source_tag TEXT NOT NULL,
  target_tag TEXT,
  reason TEXT NOT NULL,
  affected_count INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'proposed'
    CHECK (status IN ('proposed', 'auto-approved', 'pending-approval', 'approved', 'rejected', 'applied')),
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  applied_at TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS idx_tag_proposals_status ON tag_proposals(status);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Agent Runs Table
-- One row per taxonomy agent run, with its report once completed
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS agent_runs (
  id SERIAL PRIMARY KEY,
  status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'completed', 'failed')),
  summary TEXT,
  report JSONB,
  error TEXT,
  started_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  finished_at TIMESTAMPTZ
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Progress Table
-- One row per job name
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS progress (
  job_name TEXT PRIMARY KEY,
  cursor BIGINT,
  status TEXT NOT NULL DEFAULT 'idle' CHECK (status IN ('idle', 'running', 'error')),
  last_run_at TIMESTAMPTZ,
  started_at TIMESTAMPTZ,
  failure_count INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  completed_at TIMESTAMPTZ,
  items_processed BIGINT NOT NULL DEFAULT 0,
  stories_found BIGINT NOT NULL DEFAULT 0
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Fetch Failures Table
-- Item ids whose fetch exhausted its retries
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS fetch_failures (
  item_id BIGINT PRIMARY KEY,
  job_name TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 1,
  last_error TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'abandoned')),
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;
