/**
 * Retirement Review
 *
 * Asks the completion model whether a tag about to be retired belongs under
 * an existing tag instead, or should be kept. Advice can only turn a retire
 * proposal into a merge or drop it; every other proposal passes through.
 */

import { z } from 'zod';
import { slugify } from './slug.js';
import { TagReviewError, errorMessage } from '../utils/errors.js';
import type { TaxonomyDefinition } from './levels.js';
import type { CompletionClient } from '../summarizer/index.js';
import type { TagProposalInput, TagUsage } from '../types/index.js';

export interface RetirementAdvice {
  merges: Array<{ tag: string; target: string; reason: string }>;
  keep: Array<{ tag: string; reason: string }>;
}

export interface TagAdvisor {
  readonly model: string;
  reviewRetirements(candidates: TagUsage[], activeTags: readonly string[]): Promise<RetirementAdvice>;
}

const SYSTEM_PROMPT = `You are a taxonomy expert curating the tags of a technology news archive.

You receive tags that are about to be retired because few recent stories use them.
For each one decide:
- merge: its stories belong under one of the existing tags listed
- keep: it names a distinct, lasting topic worth keeping
- otherwise leave it out of your answer and it will be retired

Be conservative: only suggest a merge when the target clearly covers the tag.

Respond in JSON with this exact format:
{
  "merges": [{ "tag": "...", "target": "...", "reason": "..." }],
  "keep": [{ "tag": "...", "reason": "..." }]
}`;

const adviceSchema = z.object({
  merges: z
    .array(z.object({ tag: z.string(), target: z.string(), reason: z.string().default('') }))
    .default([]),
  keep: z.array(z.object({ tag: z.string(), reason: z.string().default('') })).default([]),
});

export function buildReviewPrompt(
  candidates: TagUsage[],
  activeTags: readonly string[],
  definition: TaxonomyDefinition
): string {
  const categories = Object.entries(definition.categories)
    .map(([category, names]) => `- ${category}: ${names.join(', ')}`)
    .join('\n');
  const retiring = candidates.map((tag) => ({
    tag: tag.name,
    recentStories: tag.windowCount,
    totalStories: tag.totalCount,
  }));

  return `Broad categories: ${definition.levelOne.join(', ')}
Topic groups:
${categories}

Existing tags: ${activeTags.join(', ')}

Tags to be retired:
${JSON.stringify(retiring, null, 2)}`;
}

export class OpenAiTagAdvisor implements TagAdvisor {
  constructor(
    private readonly client: CompletionClient,
    readonly model: string,
    private readonly definition: TaxonomyDefinition
  ) {}

  async reviewRetirements(candidates: TagUsage[], activeTags: readonly string[]): Promise<RetirementAdvice> {
    if (candidates.length === 0) {
      return { merges: [], keep: [] };
    }

    let content: string | null;
    try {
      content = await this.client.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildReviewPrompt(candidates, activeTags, this.definition) },
        ],
        this.model
      );
    } catch (error) {
      throw new TagReviewError(`Tag review call failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new TagReviewError('Empty response from OpenAI');
    }

    try {
      return adviceSchema.parse(JSON.parse(content));
    } catch (error) {
      throw new TagReviewError(`Invalid tag review response: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Redirect or drop retire proposals per the advice. A merge target must be
 * an active tag that no proposal or open proposal touches; keep wins over
 * merge for the same tag.
 */
export function applyRetirementAdvice(
  proposals: TagProposalInput[],
  advice: RetirementAdvice,
  usage: TagUsage[],
  excludeTagIds: ReadonlySet<number>
): TagProposalInput[] {
  const usageBySlug = new Map(usage.map((tag) => [tag.slug, tag]));
  const kept = new Set(advice.keep.map((entry) => slugify(entry.tag)));

  const blocked = new Set(excludeTagIds);
  for (const proposal of proposals) {
    blocked.add(proposal.sourceTagId);
    const target = proposal.targetTag === null ? undefined : usageBySlug.get(slugify(proposal.targetTag));
    if (target) {
      blocked.add(target.tagId);
    }
  }

  const redirects = new Map<number, TagProposalInput>();
  for (const entry of advice.merges) {
    const source = usageBySlug.get(slugify(entry.tag));
    const target = usageBySlug.get(slugify(entry.target));
    if (!source || !target || kept.has(source.slug) || redirects.has(source.tagId) || blocked.has(target.tagId)) {
      continue;
    }
    redirects.set(source.tagId, {
      action: 'merge',
      sourceTagId: source.tagId,
      sourceTag: source.name,
      targetTag: target.name,
      reason: entry.reason.trim() || `"${source.name}" is covered by "${target.name}"`,
      affectedCount: source.totalCount,
    });
  }

  const revised: TagProposalInput[] = [];
  for (const proposal of proposals) {
    if (proposal.action !== 'retire') {
      revised.push(proposal);
      continue;
    }
    const slug = slugify(proposal.sourceTag);
    if (kept.has(slug)) {
      continue;
    }
    revised.push(redirects.get(proposal.sourceTagId) ?? proposal);
  }
  return revised;
}
