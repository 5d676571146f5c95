/**
 * Error taxonomy
 *
 * Per-item and per-batch errors are converted into persisted status by the
 * jobs; only ConfigurationError is allowed to abort startup.
 */

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, timeout, throttling or 5xx from the content source
 */
export class TransientFetchError extends SyncError {
  readonly status: number | null;

  constructor(
    readonly itemId: number | null,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

/**
 * Item is missing, deleted, dead or malformed; retrying will not help
 */
export class PermanentFetchError extends SyncError {
  constructor(
    readonly itemId: number | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EnrichmentCallError extends SyncError {
  constructor(
    readonly storyIds: number[],
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The completion model could not review the retirement candidates
 */
export class TagReviewError extends SyncError {}

export class ExhaustedRecoveryAttemptsError extends SyncError {
  constructor(
    readonly storyId: number,
    readonly externalId: number,
    readonly attempts: number
  ) {
    super(`Story ${externalId} exhausted ${attempts} enrichment attempts`);
  }
}

export class ConfigurationError extends SyncError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
