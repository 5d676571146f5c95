import { describe, it, expect, vi } from 'vitest';
import { TaxonomyAgentJob, type TaxonomySettings } from '../taxonomy-agent.js';
import { TagCatalog } from '../../taxonomy/levels.js';
import { InMemoryStoryRepository, InMemoryTaxonomyRepository, fixedClock } from '../../__tests__/fakes.js';
import { logger } from '../../utils/logger.js';
import { TagReviewError } from '../../utils/errors.js';
import type { RetirementAdvice, TagAdvisor } from '../../taxonomy/advisor.js';
import type { TagUsage } from '../../types/index.js';

const clock = fixedClock('2024-06-01T00:00:00Z');
const RECENT = new Date('2024-05-31T00:00:00Z');
const OLD = new Date('2024-01-01T00:00:00Z');

const catalog = new TagCatalog({
  levelOne: ['Tech'],
  categories: { Business: ['Startups'], 'Tech Topics': ['Open Source'] },
});

class StubAdvisor implements TagAdvisor {
  readonly model = 'test-model';
  readonly requests: Array<{ candidates: string[]; activeTags: readonly string[] }> = [];

  constructor(private readonly reply: () => Promise<RetirementAdvice>) {}

  async reviewRetirements(candidates: TagUsage[], activeTags: readonly string[]): Promise<RetirementAdvice> {
    this.requests.push({ candidates: candidates.map((tag) => tag.name), activeTags });
    return this.reply();
  }
}

function setup(overrides: Partial<TaxonomySettings> = {}, advisor: TagAdvisor | null = null) {
  const stories = new InMemoryStoryRepository(clock);
  const taxonomy = new InMemoryTaxonomyRepository(stories, clock);
  const job = new TaxonomyAgentJob(
    { taxonomy, logger, advisor, now: clock },
    {
      windowDays: 30,
      minTagUsage: 3,
      maxProposals: 10,
      autoApprove: true,
      autoApproveMaxAffected: 5,
      duplicateSimilarity: 0.75,
      maxCategoryTags: 15,
      catalog,
      ...overrides,
    }
  );
  let nextExternalId = 1;

  /** Creates one story per call tagged with every given name */
  const tagStory = async (names: string[], sourceCreatedAt = RECENT): Promise<number> => {
    const { story } = await stories.upsertStory({
      externalId: nextExternalId++,
      title: 'Tagged story',
      url: null,
      score: 1,
      author: 'tester',
      commentCount: 0,
      sourceCreatedAt,
    });
    for (const name of names) {
      stories.linkTag(story.id, name);
    }
    return story.id;
  };

  return { stories, taxonomy, job, tagStory };
}

describe('TaxonomyAgentJob', () => {
  it('auto-applies retiring a rarely used tag', async () => {
    const { stories, taxonomy, job, tagStory } = setup();
    const first = await tagStory(['Tech', 'Quantum Widgets']);
    await tagStory(['Tech', 'Quantum Widgets']);
    await tagStory(['Tech']);

    const result = await job.run();

    expect(result).toMatchObject({ tagsAnalyzed: 2, applied: 1, pendingApproval: 0 });
    expect(taxonomy.proposals).toHaveLength(1);
    expect(taxonomy.proposals[0]).toMatchObject({
      action: 'retire',
      sourceTag: 'Quantum Widgets',
      affectedCount: 2,
      status: 'auto-approved',
    });
    expect(stories.tagByName('Quantum Widgets')?.retiredAt).toEqual(clock());
    expect(await stories.getTagNames(first)).toEqual(['Tech']);
  });

  it('queues proposals for approval when auto-approval is off', async () => {
    const { stories, taxonomy, job, tagStory } = setup({ autoApprove: false });
    await tagStory(['Quantum Widgets']);

    const result = await job.run();

    expect(result).toMatchObject({ applied: 0, pendingApproval: 1 });
    expect(taxonomy.proposals[0]?.status).toBe('pending-approval');
    expect(stories.tagByName('Quantum Widgets')?.retiredAt).toBeNull();
  });

  it('queues proposals that affect more stories than the auto-approval ceiling', async () => {
    const { taxonomy, job, tagStory } = setup();
    await tagStory(['Quantum Widgets']);
    for (let i = 0; i < 5; i++) {
      await tagStory(['Quantum Widgets'], OLD);
    }

    const result = await job.run();

    expect(result.pendingApproval).toBe(1);
    expect(taxonomy.proposals[0]).toMatchObject({ action: 'retire', affectedCount: 6, status: 'pending-approval' });
  });

  it('does not propose again for a tag with an open proposal', async () => {
    const { taxonomy, job, tagStory } = setup({ autoApprove: false });
    await tagStory(['Quantum Widgets']);

    await job.run();
    const second = await job.run();

    expect(second.proposals).toEqual([]);
    expect(taxonomy.proposals).toHaveLength(1);
  });

  it('merges a duplicate into the canonical tag', async () => {
    const { stories, job, tagStory } = setup();
    for (let i = 0; i < 4; i++) {
      await tagStory(['Startups']);
    }
    const duplicate = await tagStory(['Startup']);

    const result = await job.run();

    expect(result.proposals.map((proposal) => [proposal.action, proposal.sourceTag, proposal.targetTag])).toEqual([
      ['merge', 'Startup', 'Startups'],
    ]);
    expect(await stories.getTagNames(duplicate)).toEqual(['Startups']);
    expect(stories.tagByName('Startup')?.retiredAt).not.toBeNull();
  });

  it('renames a variant spelling to the canonical name', async () => {
    const { stories, job, tagStory } = setup();
    const storyId = await tagStory(['open-source']);

    await job.run();

    expect(await stories.getTagNames(storyId)).toEqual(['Open Source']);
  });

  it('applies a pending proposal on request', async () => {
    const { stories, taxonomy, job, tagStory } = setup({ autoApprove: false });
    await tagStory(['Quantum Widgets']);
    const { proposals } = await job.run();
    const id = proposals[0]?.id ?? -1;

    const applied = await job.applyProposal(id);

    expect(applied.status).toBe('applied');
    expect(taxonomy.proposals[0]).toMatchObject({ status: 'applied', appliedAt: clock() });
    expect(stories.tagByName('Quantum Widgets')?.retiredAt).not.toBeNull();
    await expect(job.rejectProposal(id)).rejects.toThrow(`Cannot reject proposal ${id} in status applied`);
  });

  it('rejects a pending proposal without touching the tag', async () => {
    const { stories, job, tagStory } = setup({ autoApprove: false });
    await tagStory(['Quantum Widgets']);
    const { proposals } = await job.run();
    const id = proposals[0]?.id ?? -1;

    await job.rejectProposal(id);

    expect(await job.listProposals('rejected')).toHaveLength(1);
    expect(stories.tagByName('Quantum Widgets')?.retiredAt).toBeNull();
    await expect(job.applyProposal(id)).rejects.toThrow(`Cannot apply proposal ${id} in status rejected`);
  });

  it('reports unknown proposals', async () => {
    const { job } = setup();

    await expect(job.applyProposal(99)).rejects.toThrow('Proposal 99 not found');
  });

  it('records a completed run with its report', async () => {
    const { taxonomy, job, tagStory } = setup({ autoApprove: false });
    await tagStory(['Tech', 'Quantum Widgets']);
    await tagStory(['Quantum Widgets']);
    await tagStory(['Tech']);
    await tagStory(['Tech'], OLD);

    const result = await job.run();

    expect(result.runId).toBe(1);
    expect(taxonomy.runs).toHaveLength(1);
    expect(taxonomy.runs[0]).toMatchObject({
      id: 1,
      status: 'completed',
      error: null,
      startedAt: clock(),
      finishedAt: clock(),
      summary:
        '2 tags over 3 stories; 1 proposals (0 applied, 1 pending approval); ' +
        '1 orphan stories, 0 bloated categories, 1 sparse tags, 0 duplicate candidates',
      report: {
        proposalIds: [1],
        applied: 0,
        pendingApproval: 1,
        analysis: {
          windowDays: 30,
          storiesAnalyzed: 3,
          orphanStories: 1,
          unevenDistribution: [{ name: 'Tech', count: 2, percentage: 66.67, issue: 'overrepresented' }],
        },
      },
    });
  });

  it('marks the run failed when the analysis throws', async () => {
    const { taxonomy, job } = setup();
    vi.spyOn(taxonomy, 'getTagUsage').mockRejectedValue(new Error('connection lost'));

    await expect(job.run()).rejects.toThrow('connection lost');

    expect(taxonomy.runs[0]).toMatchObject({ status: 'failed', error: 'connection lost', summary: null });
  });

  it('lists runs newest first', async () => {
    const { job } = setup();
    await job.run();
    await job.run();

    const runs = await job.listRuns(1);

    expect(runs.map((run) => run.id)).toEqual([2]);
  });

  it('redirects a retirement the advisor merges into an existing tag', async () => {
    const advisor = new StubAdvisor(async () => ({
      merges: [{ tag: 'Quantum Widgets', target: 'Tech', reason: 'Belongs under Tech' }],
      keep: [],
    }));
    const { stories, job, tagStory } = setup({}, advisor);
    const storyId = await tagStory(['Quantum Widgets']);
    for (let i = 0; i < 3; i++) {
      await tagStory(['Tech']);
    }

    const result = await job.run();

    expect(advisor.requests).toEqual([
      { candidates: ['Quantum Widgets'], activeTags: ['Quantum Widgets', 'Tech'] },
    ]);
    expect(result.proposals).toMatchObject([
      { action: 'merge', sourceTag: 'Quantum Widgets', targetTag: 'Tech', reason: 'Belongs under Tech' },
    ]);
    expect(await stories.getTagNames(storyId)).toEqual(['Tech']);
  });

  it('keeps the retire proposals when the advisor is unavailable', async () => {
    const advisor = new StubAdvisor(async () => {
      throw new TagReviewError('Tag review call failed: rate limited');
    });
    const { taxonomy, job, tagStory } = setup({ autoApprove: false }, advisor);
    await tagStory(['Quantum Widgets']);

    const result = await job.run();

    expect(result.proposals.map((proposal) => proposal.action)).toEqual(['retire']);
    expect(taxonomy.runs[0]?.status).toBe('completed');
  });

  it('does not consult the advisor without retire proposals', async () => {
    const advisor = new StubAdvisor(async () => ({ merges: [], keep: [] }));
    const { job, tagStory } = setup({}, advisor);
    for (let i = 0; i < 3; i++) {
      await tagStory(['Tech']);
    }

    await job.run();

    expect(advisor.requests).toEqual([]);
  });
});
