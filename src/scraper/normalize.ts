/**
 * Source item → StoryInput mapping
 */

import type { SourceItem, StoryInput } from '../types/index.js';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Keep http(s) URLs only; anything else (javascript:, data:, relative) is dropped
 */
export function sanitizeUrl(raw: string | undefined): string | null {
  if (!raw) {
    return null;
  }
  const trimmed = raw.trim();
  try {
    return ALLOWED_PROTOCOLS.has(new URL(trimmed).protocol) ? trimmed : null;
  } catch {
    return null;
  }
}

export function clampScore(score: number | undefined): number {
  if (score === undefined || !Number.isFinite(score)) {
    return 0;
  }
  return Math.max(0, Math.trunc(score));
}

function isStoryItem(item: SourceItem): boolean {
  return item.type === 'story';
}

/**
 * Null when the item is not a story, or lacks the title or timestamp a story row needs
 */
export function toStoryInput(item: SourceItem): StoryInput | null {
  if (!isStoryItem(item)) {
    return null;
  }

  const title = item.title?.trim();
  if (!title || item.time === undefined) {
    return null;
  }

  return {
    externalId: item.id,
    title,
    url: sanitizeUrl(item.url),
    score: clampScore(item.score),
    author: item.by?.trim() || 'unknown',
    commentCount: Math.max(0, Math.trunc(item.descendants ?? 0)),
    sourceCreatedAt: new Date(item.time * 1000),
  };
}
