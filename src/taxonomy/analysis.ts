/**
 * Taxonomy Health Report
 *
 * Read-only view of the tag set over the analysis window. The agent stores
 * it with each run; proposals are built separately from the same usage.
 */

import { findDuplicatePairs } from './proposals.js';
import type { TagCatalog } from './levels.js';
import type {
  BloatedCategory,
  DistributionIssue,
  DuplicateCandidate,
  SparseTag,
  TagUsage,
  TaxonomyAnalysis,
  WindowStats,
} from '../types/index.js';

/** Percent of window stories above which a level 1 tag is overrepresented */
const OVERREPRESENTED_PERCENT = 30;
const UNDERREPRESENTED_PERCENT = 5;

export interface AnalysisOptions {
  windowDays: number;
  minUsage: number;
  similarityThreshold: number;
  /** Level 2 tags a category may hold before it counts as bloated */
  maxCategoryTags: number;
}

export function analyzeTaxonomy(
  usage: TagUsage[],
  stats: WindowStats,
  catalog: TagCatalog,
  options: AnalysisOptions
): TaxonomyAnalysis {
  const tags = [...usage].sort((a, b) => a.tagId - b.tagId);
  const placed = tags.map((tag) => ({ tag, ...catalog.placement(tag.name) }));

  const unevenDistribution: DistributionIssue[] = [];
  if (stats.stories > 0) {
    for (const { tag, level } of placed) {
      if (level !== 1) {
        continue;
      }
      const share = (tag.windowCount / stats.stories) * 100;
      const entry = { name: tag.name, count: tag.windowCount, percentage: round2(share) };
      if (share > OVERREPRESENTED_PERCENT) {
        unevenDistribution.push({ ...entry, issue: 'overrepresented' });
      } else if (share < UNDERREPRESENTED_PERCENT && tag.windowCount > 0) {
        unevenDistribution.push({ ...entry, issue: 'underrepresented' });
      }
    }
  }

  const byCategory = new Map<string, TagUsage[]>();
  for (const { tag, level, category } of placed) {
    if (level === 2 && category !== null) {
      byCategory.set(category, [...(byCategory.get(category) ?? []), tag]);
    }
  }
  const bloatedCategories: BloatedCategory[] = [...byCategory]
    .filter(([, members]) => members.length > options.maxCategoryTags)
    .map(([category, members]) => ({
      category,
      tagCount: members.length,
      tags: members
        .map((tag) => ({ name: tag.name, count: tag.windowCount }))
        .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name)),
    }));

  const sparseTags: SparseTag[] = placed
    .filter(({ tag, level }) => level >= 2 && tag.windowCount < options.minUsage)
    .map(({ tag, level, category }) => ({
      tagId: tag.tagId,
      name: tag.name,
      level,
      category,
      windowCount: tag.windowCount,
      totalCount: tag.totalCount,
    }))
    .sort((a, b) => a.level - b.level || a.windowCount - b.windowCount || a.tagId - b.tagId);

  const duplicateCandidates = findDuplicatePairs(tags, options.similarityThreshold, (tag) =>
    catalog.isCanonical(tag.name)
  ).map(({ a, b, similarity }): DuplicateCandidate => ({ tags: [a.name, b.name], similarity: round2(similarity) }));

  return {
    windowDays: options.windowDays,
    storiesAnalyzed: stats.stories,
    totalTags: tags.length,
    orphanStories: stats.orphanStories,
    unevenDistribution,
    bloatedCategories,
    sparseTags,
    duplicateCandidates,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
