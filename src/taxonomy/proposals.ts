/**
 * Tag Proposal Builder
 *
 * Turns a tag usage snapshot into merge, rename and retire proposals. Pure:
 * the taxonomy agent decides what gets persisted and applied.
 */

import { slugify } from './slug.js';
import { tagSimilarity } from './similarity.js';
import type { TagProposalInput, TagUsage } from '../types/index.js';

export interface ProposalOptions {
  minUsage: number;
  maxProposals: number;
  similarityThreshold: number;
  canonicalTags: readonly string[];
  /** Tags already referenced by an open proposal */
  excludeTagIds: ReadonlySet<number>;
}

export interface DuplicatePair {
  a: TagUsage;
  b: TagUsage;
  similarity: number;
}

export function buildProposals(usage: TagUsage[], options: ProposalOptions): TagProposalInput[] {
  const canonicalBySlug = new Map(options.canonicalTags.map((name) => [slugify(name), name]));
  const isCanonical = (tag: TagUsage): boolean => canonicalBySlug.get(tag.slug) === tag.name;

  const claimed = new Set(options.excludeTagIds);
  const candidates = usage.filter((tag) => !claimed.has(tag.tagId)).sort((a, b) => a.tagId - b.tagId);
  const activeNames = new Set(usage.map((tag) => tag.name));

  const merges: TagProposalInput[] = [];
  for (const { a, b, similarity } of findDuplicatePairs(candidates, options.similarityThreshold, isCanonical)) {
    if (claimed.has(a.tagId) || claimed.has(b.tagId)) {
      continue;
    }
    const [target, source] = preferredFirst(a, b, isCanonical);
    claimed.add(a.tagId);
    claimed.add(b.tagId);
    merges.push({
      action: 'merge',
      sourceTagId: source.tagId,
      sourceTag: source.name,
      targetTag: target.name,
      reason: `"${source.name}" duplicates "${target.name}" (similarity ${similarity.toFixed(2)})`,
      affectedCount: source.totalCount,
    });
  }

  const renames: TagProposalInput[] = [];
  for (const tag of candidates) {
    const canonicalName = canonicalBySlug.get(tag.slug);
    if (claimed.has(tag.tagId) || canonicalName === undefined || canonicalName === tag.name) {
      continue;
    }
    if (activeNames.has(canonicalName)) {
      continue;
    }
    claimed.add(tag.tagId);
    renames.push({
      action: 'rename',
      sourceTagId: tag.tagId,
      sourceTag: tag.name,
      targetTag: canonicalName,
      reason: `"${tag.name}" is a variant spelling of canonical tag "${canonicalName}"`,
      affectedCount: tag.totalCount,
    });
  }

  const retires: TagProposalInput[] = candidates
    .filter((tag) => !claimed.has(tag.tagId) && !canonicalBySlug.has(tag.slug))
    .filter((tag) => tag.windowCount < options.minUsage)
    .sort((a, b) => a.windowCount - b.windowCount || a.totalCount - b.totalCount || a.tagId - b.tagId)
    .map((tag) => ({
      action: 'retire' as const,
      sourceTagId: tag.tagId,
      sourceTag: tag.name,
      targetTag: null,
      reason: `Used by ${tag.windowCount} ${tag.windowCount === 1 ? 'story' : 'stories'} in the window (minimum ${options.minUsage})`,
      affectedCount: tag.totalCount,
    }));

  return [...merges, ...renames, ...retires].slice(0, options.maxProposals);
}

/**
 * Pairs at or over the threshold, most similar first; two canonical tags are never paired
 */
export function findDuplicatePairs(
  tags: TagUsage[],
  threshold: number,
  isCanonical: (tag: TagUsage) => boolean
): DuplicatePair[] {
  const pairs: DuplicatePair[] = [];

  for (let i = 0; i < tags.length; i++) {
    for (let j = i + 1; j < tags.length; j++) {
      const a = tags[i];
      const b = tags[j];
      if (!a || !b || (isCanonical(a) && isCanonical(b))) {
        continue;
      }
      const similarity = tagSimilarity(a.slug, b.slug);
      if (similarity >= threshold) {
        pairs.push({ a, b, similarity });
      }
    }
  }

  return pairs.sort((x, y) => y.similarity - x.similarity || x.a.tagId - y.a.tagId || x.b.tagId - y.b.tagId);
}

/**
 * Merge target first: canonical, then busier in the window, then overall, then older
 */
function preferredFirst(
  a: TagUsage,
  b: TagUsage,
  isCanonical: (tag: TagUsage) => boolean
): [TagUsage, TagUsage] {
  const score = (tag: TagUsage): number[] => [isCanonical(tag) ? 1 : 0, tag.windowCount, tag.totalCount, -tag.tagId];
  const sa = score(a);
  const sb = score(b);

  for (let i = 0; i < sa.length; i++) {
    const diff = (sa[i] ?? 0) - (sb[i] ?? 0);
    if (diff !== 0) {
      return diff > 0 ? [a, b] : [b, a];
    }
  }
  return [a, b];
}
