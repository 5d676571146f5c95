/**
 * Core types for Story Sync
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Jobs & Progress
// ═══════════════════════════════════════════════════════════════════════════════

export const JOB_NAMES = ['continuous', 'backfill', 'recovery', 'taxonomy'] as const;

export type JobName = (typeof JOB_NAMES)[number];

export type RunStatus = 'idle' | 'running' | 'error';

/**
 * Direction a job's cursor is allowed to move in; null for jobs without one
 */
export const CURSOR_DIRECTION: Record<JobName, 'forward' | 'backward' | null> = {
  continuous: 'forward',
  backfill: 'backward',
  recovery: null,
  taxonomy: null,
};

export interface ProgressRecord {
  jobName: JobName;
  cursor: number | null;
  status: RunStatus;
  lastRunAt: Date | null;
  startedAt: Date | null;
  failureCount: number;
  lastError: string | null;
  completedAt: Date | null;
  itemsProcessed: number;
  storiesFound: number;
}

export interface ProgressCounters {
  itemsProcessed: number;
  storiesFound: number;
}

export type RunOutcome = { ok: true } | { ok: false; error: string };

/**
 * Durable per-job cursor and run-status records
 */
export interface ProgressStore {
  getCursor(job: JobName): Promise<number | null>;
  getProgress(job: JobName): Promise<ProgressRecord | null>;
  listProgress(): Promise<ProgressRecord[]>;
  /** Atomically claims the job; false when a run is already in flight */
  tryBeginRun(job: JobName): Promise<boolean>;
  /** Moves the cursor in the job's direction only; the first call sets it */
  advanceCursor(job: JobName, value: number, counters?: Partial<ProgressCounters>): Promise<void>;
  markCompleted(job: JobName): Promise<void>;
  endRun(job: JobName, outcome: RunOutcome): Promise<void>;
  recordFailure(job: JobName, error: string): Promise<void>;
  resetProgress(job: JobName, cursor?: number | null): Promise<void>;
  /** Moves runs left in `running` by a dead process to `error` */
  releaseInterruptedRuns(): Promise<JobName[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stories
// ═══════════════════════════════════════════════════════════════════════════════

export const ENRICHMENT_STATUSES = ['pending', 'summarized', 'tagged', 'failed_pending', 'failed'] as const;

export type EnrichmentStatus = (typeof ENRICHMENT_STATUSES)[number];

export interface StoryInput {
  externalId: number;
  title: string;
  url: string | null;
  score: number;
  author: string;
  commentCount: number;
  sourceCreatedAt: Date;
}

export interface Story extends StoryInput {
  id: number;
  status: EnrichmentStatus;
  attemptCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface StorySummary {
  storyId: number;
  text: string;
  model: string;
  createdAt: Date;
}

export interface UpsertResult {
  story: Story;
  created: boolean;
}

export interface StoryEnrichment {
  storyId: number;
  summary: string;
  tags: string[];
}

export interface RecoverableQuery {
  maxAttempts: number;
  olderThan: Date;
  limit: number;
}

export interface StoryRepository {
  /** Insert or merge by external id; score is clamped to >= 0 */
  upsertStory(input: StoryInput): Promise<UpsertResult>;
  getByExternalId(externalId: number): Promise<Story | null>;
  getSummary(storyId: number): Promise<StorySummary | null>;
  getTagNames(storyId: number): Promise<string[]>;
  getMinExternalId(): Promise<number | null>;
  /** Upserts the summary, links tags and moves the story to summarized/tagged */
  saveEnrichment(result: StoryEnrichment, model: string): Promise<EnrichmentStatus>;
  /** Increments attempt count and parks the stories in failed_pending */
  recordEnrichmentFailure(storyIds: number[]): Promise<Story[]>;
  /** failed_pending stories at or over the budget become terminal failed */
  retireExhausted(maxAttempts: number): Promise<Story[]>;
  findRecoverable(query: RecoverableQuery): Promise<Story[]>;
  countByStatus(): Promise<Record<EnrichmentStatus, number>>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Failure Ledger
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchFailureStatus = 'pending' | 'abandoned';

export interface FetchFailure {
  itemId: number;
  jobName: JobName;
  attempts: number;
  lastError: string;
  status: FetchFailureStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface FetchFailureLedger {
  record(itemId: number, jobName: JobName, error: string): Promise<void>;
  listPending(limit: number): Promise<FetchFailure[]>;
  resolve(itemId: number): Promise<void>;
  /** Bumps attempts; the entry is abandoned once attempts reach maxAttempts */
  recordRetryFailure(itemId: number, error: string, maxAttempts: number): Promise<FetchFailure | null>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Content Source
// ═══════════════════════════════════════════════════════════════════════════════

export interface SourceItem {
  id: number;
  type: string;
  by?: string;
  time?: number;
  title?: string;
  url?: string;
  score?: number;
  descendants?: number;
  deleted?: boolean;
  dead?: boolean;
}

/** Curated story id lists published by the source */
export const STORY_LISTS = ['top', 'new', 'best'] as const;

export type StoryList = (typeof STORY_LISTS)[number];

/**
 * Read-only paginated item API
 */
export interface ContentSource {
  getMaxItemId(): Promise<number>;
  /** Throws TransientFetchError or PermanentFetchError */
  getItem(id: number): Promise<SourceItem>;
  getStoryListIds(list: StoryList, limit: number): Promise<number[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Enrichment
// ═══════════════════════════════════════════════════════════════════════════════

export interface EnrichmentRequest {
  storyId: number;
  title: string;
  url: string | null;
}

export interface EnrichmentResult {
  storyId: number;
  summary: string;
  tags: string[];
}

/**
 * Summarization/tagging service; one call per batch, fallible as a unit
 */
export interface EnrichmentService {
  readonly model: string;
  enrichBatch(items: EnrichmentRequest[]): Promise<EnrichmentResult[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Taxonomy
// ═══════════════════════════════════════════════════════════════════════════════

export type ProposalAction = 'merge' | 'rename' | 'retire';

export type ProposalStatus =
  | 'proposed'
  | 'auto-approved'
  | 'pending-approval'
  | 'approved'
  | 'rejected'
  | 'applied';

export const OPEN_PROPOSAL_STATUSES: readonly ProposalStatus[] = ['proposed', 'pending-approval', 'approved'];

export interface TagUsage {
  tagId: number;
  name: string;
  slug: string;
  /** Distinct stories inside the analysis window */
  windowCount: number;
  /** Distinct stories overall */
  totalCount: number;
}

export interface TagProposalInput {
  action: ProposalAction;
  sourceTagId: number;
  sourceTag: string;
  targetTag: string | null;
  reason: string;
  affectedCount: number;
}

export interface TagProposal extends TagProposalInput {
  id: number;
  status: ProposalStatus;
  createdAt: Date;
  appliedAt: Date | null;
}

export type TagLevel = 1 | 2 | 3;

export interface WindowStats {
  /** Stories created inside the analysis window */
  stories: number;
  /** Window stories that carry tags, none of them level 1 or 2 */
  orphanStories: number;
}

export interface DistributionIssue {
  name: string;
  count: number;
  /** Share of window stories, rounded to two decimals */
  percentage: number;
  issue: 'overrepresented' | 'underrepresented';
}

export interface BloatedCategory {
  category: string;
  tagCount: number;
  /** Busiest first */
  tags: Array<{ name: string; count: number }>;
}

export interface SparseTag {
  tagId: number;
  name: string;
  level: TagLevel;
  category: string | null;
  windowCount: number;
  totalCount: number;
}

export interface DuplicateCandidate {
  tags: [string, string];
  similarity: number;
}

export interface TaxonomyAnalysis {
  windowDays: number;
  storiesAnalyzed: number;
  totalTags: number;
  orphanStories: number;
  unevenDistribution: DistributionIssue[];
  bloatedCategories: BloatedCategory[];
  sparseTags: SparseTag[];
  duplicateCandidates: DuplicateCandidate[];
}

export type AgentRunStatus = 'running' | 'completed' | 'failed';

export interface AgentRunReport {
  analysis: TaxonomyAnalysis;
  proposalIds: number[];
  applied: number;
  pendingApproval: number;
}

export interface AgentRun {
  id: number;
  status: AgentRunStatus;
  summary: string | null;
  /** Stored JSON; an AgentRunReport for completed runs */
  report: unknown;
  error: string | null;
  startedAt: Date;
  finishedAt: Date | null;
}

export interface TaxonomyRepository {
  getTagUsage(since: Date): Promise<TagUsage[]>;
  getWindowStats(since: Date, structuredTagIds: readonly number[]): Promise<WindowStats>;
  getOpenProposalTagIds(): Promise<Set<number>>;
  createProposal(input: TagProposalInput, status: ProposalStatus): Promise<TagProposal>;
  getProposal(id: number): Promise<TagProposal | null>;
  listProposals(status?: ProposalStatus): Promise<TagProposal[]>;
  setProposalStatus(id: number, status: ProposalStatus): Promise<void>;
  /** Moves story links from the source tag onto the target and retires the source */
  mergeTags(sourceTagId: number, targetName: string): Promise<number>;
  /** Renames in place, or merges when another active tag already owns the name */
  renameTag(tagId: number, newName: string): Promise<void>;
  /** Drops story links and retires the tag; returns links removed */
  retireTag(tagId: number): Promise<number>;
  createRun(): Promise<AgentRun>;
  completeRun(id: number, summary: string, report: AgentRunReport): Promise<void>;
  failRun(id: number, error: string): Promise<void>;
  /** Newest first */
  listRuns(limit: number): Promise<AgentRun[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
