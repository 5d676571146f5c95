/**
 * Taxonomy Agent
 *
 * Periodic tag-health analysis. Every run is recorded with its report.
 * Proposals within the auto-approval ceiling are applied at once; the rest
 * wait for an administrator.
 */

import { DAY_MS } from '../config/index.js';
import { analyzeTaxonomy } from '../taxonomy/analysis.js';
import { applyRetirementAdvice, type TagAdvisor } from '../taxonomy/advisor.js';
import { buildProposals } from '../taxonomy/proposals.js';
import { TagReviewError, errorMessage } from '../utils/errors.js';
import type { TagCatalog } from '../taxonomy/levels.js';
import type { Logger } from '../utils/logger.js';
import {
  OPEN_PROPOSAL_STATUSES,
  type AgentRun,
  type ProposalStatus,
  type TagProposal,
  type TagProposalInput,
  type TagUsage,
  type TaxonomyAnalysis,
  type TaxonomyRepository,
} from '../types/index.js';

const JOB = 'taxonomy';

export interface TaxonomySettings {
  windowDays: number;
  minTagUsage: number;
  maxProposals: number;
  autoApprove: boolean;
  autoApproveMaxAffected: number;
  duplicateSimilarity: number;
  maxCategoryTags: number;
  catalog: TagCatalog;
}

export interface TaxonomyDeps {
  taxonomy: TaxonomyRepository;
  logger: Logger;
  /** Reviews retire proposals before they are stored */
  advisor?: TagAdvisor | null;
  now?: () => Date;
}

export interface TaxonomyResult {
  runId: number;
  tagsAnalyzed: number;
  analysis: TaxonomyAnalysis;
  proposals: TagProposal[];
  applied: number;
  pendingApproval: number;
}

function describeRun(result: TaxonomyResult): string {
  const { analysis } = result;
  return (
    `${analysis.totalTags} tags over ${analysis.storiesAnalyzed} stories; ` +
    `${result.proposals.length} proposals (${result.applied} applied, ${result.pendingApproval} pending approval); ` +
    `${analysis.orphanStories} orphan stories, ${analysis.bloatedCategories.length} bloated categories, ` +
    `${analysis.sparseTags.length} sparse tags, ${analysis.duplicateCandidates.length} duplicate candidates`
  );
}

export class TaxonomyAgentJob {
  readonly name = JOB;

  constructor(
    private readonly deps: TaxonomyDeps,
    private readonly settings: TaxonomySettings
  ) {}

  async run(): Promise<TaxonomyResult> {
    const { taxonomy } = this.deps;
    const run = await taxonomy.createRun();

    let result: TaxonomyResult;
    try {
      result = await this.analyze(run.id);
    } catch (error) {
      await taxonomy.failRun(run.id, errorMessage(error));
      throw error;
    }

    await taxonomy.completeRun(run.id, describeRun(result), {
      analysis: result.analysis,
      proposalIds: result.proposals.map((proposal) => proposal.id),
      applied: result.applied,
      pendingApproval: result.pendingApproval,
    });
    return result;
  }

  private async analyze(runId: number): Promise<TaxonomyResult> {
    const { taxonomy, logger } = this.deps;
    const { catalog } = this.settings;
    const now = this.deps.now?.() ?? new Date();
    const since = new Date(now.getTime() - this.settings.windowDays * DAY_MS);

    const usage = await taxonomy.getTagUsage(since);
    const structuredTagIds = usage.filter((tag) => catalog.placement(tag.name).level < 3).map((tag) => tag.tagId);
    const analysis = analyzeTaxonomy(usage, await taxonomy.getWindowStats(since, structuredTagIds), catalog, {
      windowDays: this.settings.windowDays,
      minUsage: this.settings.minTagUsage,
      similarityThreshold: this.settings.duplicateSimilarity,
      maxCategoryTags: this.settings.maxCategoryTags,
    });

    const excludeTagIds = await taxonomy.getOpenProposalTagIds();
    const inputs = await this.review(
      buildProposals(usage, {
        minUsage: this.settings.minTagUsage,
        maxProposals: this.settings.maxProposals,
        similarityThreshold: this.settings.duplicateSimilarity,
        canonicalTags: catalog.canonicalTags,
        excludeTagIds,
      }),
      usage,
      excludeTagIds
    );

    const result: TaxonomyResult = {
      runId,
      tagsAnalyzed: usage.length,
      analysis,
      proposals: [],
      applied: 0,
      pendingApproval: 0,
    };

    for (const input of inputs) {
      const autoApply =
        this.settings.autoApprove && input.affectedCount <= this.settings.autoApproveMaxAffected;

      if (!autoApply) {
        result.proposals.push(await taxonomy.createProposal(input, 'pending-approval'));
        result.pendingApproval++;
        continue;
      }

      const proposal = await taxonomy.createProposal(input, 'proposed');
      await this.execute(proposal);
      await taxonomy.setProposalStatus(proposal.id, 'auto-approved');
      result.proposals.push({ ...proposal, status: 'auto-approved' });
      result.applied++;
    }

    logger.info(
      {
        runId,
        since: since.toISOString(),
        tagsAnalyzed: result.tagsAnalyzed,
        storiesAnalyzed: analysis.storiesAnalyzed,
        orphanStories: analysis.orphanStories,
        unevenDistribution: analysis.unevenDistribution.map((entry) => `${entry.name} (${entry.issue})`),
        bloatedCategories: analysis.bloatedCategories.map((entry) => entry.category),
        proposals: result.proposals.length,
        applied: result.applied,
        pendingApproval: result.pendingApproval,
      },
      'Taxonomy analysis completed'
    );

    return result;
  }

  /**
   * Let the advisor redirect or drop retire proposals; without an answer the
   * deterministic proposals stand
   */
  private async review(
    inputs: TagProposalInput[],
    usage: TagUsage[],
    excludeTagIds: ReadonlySet<number>
  ): Promise<TagProposalInput[]> {
    const { advisor, logger } = this.deps;
    const retiring = new Set(inputs.filter((input) => input.action === 'retire').map((input) => input.sourceTagId));
    if (!advisor || retiring.size === 0) {
      return inputs;
    }

    try {
      const advice = await advisor.reviewRetirements(
        usage.filter((tag) => retiring.has(tag.tagId)),
        usage.map((tag) => tag.name)
      );
      const revised = applyRetirementAdvice(inputs, advice, usage, excludeTagIds);
      logger.info(
        {
          model: advisor.model,
          candidates: retiring.size,
          redirected: revised.filter((input) => input.action === 'merge' && retiring.has(input.sourceTagId)).length,
          kept: inputs.length - revised.length,
        },
        'Retire proposals reviewed'
      );
      return revised;
    } catch (error) {
      if (!(error instanceof TagReviewError)) {
        throw error;
      }
      logger.warn({ model: advisor.model, error: error.message }, 'Tag review unavailable, keeping retire proposals');
      return inputs;
    }
  }

  async listRuns(limit: number): Promise<AgentRun[]> {
    return this.deps.taxonomy.listRuns(limit);
  }

  async listProposals(status?: ProposalStatus): Promise<TagProposal[]> {
    return this.deps.taxonomy.listProposals(status);
  }

  /**
   * Apply an open proposal on administrator request
   */
  async applyProposal(id: number): Promise<TagProposal> {
    const proposal = await this.requireOpen(id, 'apply');
    await this.execute(proposal);
    await this.deps.taxonomy.setProposalStatus(id, 'applied');
    this.deps.logger.info({ proposalId: id, action: proposal.action, tag: proposal.sourceTag }, 'Proposal applied');
    return { ...proposal, status: 'applied' };
  }

  async rejectProposal(id: number): Promise<TagProposal> {
    const proposal = await this.requireOpen(id, 'reject');
    await this.deps.taxonomy.setProposalStatus(id, 'rejected');
    this.deps.logger.info({ proposalId: id, action: proposal.action, tag: proposal.sourceTag }, 'Proposal rejected');
    return { ...proposal, status: 'rejected' };
  }

  private async requireOpen(id: number, verb: string): Promise<TagProposal> {
    const proposal = await this.deps.taxonomy.getProposal(id);
    if (!proposal) {
      throw new Error(`Proposal ${id} not found`);
    }
    if (!OPEN_PROPOSAL_STATUSES.includes(proposal.status)) {
      throw new Error(`Cannot ${verb} proposal ${id} in status ${proposal.status}`);
    }
    return proposal;
  }

  private async execute(proposal: TagProposal): Promise<void> {
    const { taxonomy } = this.deps;

    switch (proposal.action) {
      case 'merge':
        if (proposal.targetTag === null) {
          throw new Error(`Merge proposal ${proposal.id} has no target tag`);
        }
        await taxonomy.mergeTags(proposal.sourceTagId, proposal.targetTag);
        break;
      case 'rename':
        if (proposal.targetTag === null) {
          throw new Error(`Rename proposal ${proposal.id} has no target tag`);
        }
        await taxonomy.renameTag(proposal.sourceTagId, proposal.targetTag);
        break;
      case 'retire':
        await taxonomy.retireTag(proposal.sourceTagId);
        break;
    }
  }
}
