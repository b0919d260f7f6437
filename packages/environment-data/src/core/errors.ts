/**
 * Environment Data Error Types
 *
 * Every failure raised by the pipeline carries the logical dataset name it
 * belongs to, so callers can report and retry per dataset.
 *
 * RECOVERY:
 * - NetworkError: retry the named dataset later (upstream outage, timeout)
 * - DatasetIOError: check permissions / free space on the downloads directory
 * - FormatError: upstream changed its file layout; inspect the cached file
 * - JoinIntegrityError: the table still has several rows per country after
 *   most-recent-year selection
 */

import type { DatasetName } from '../config/catalog.js';

export type ErrorCode =
  | 'NETWORK'
  | 'IO'
  | 'FORMAT'
  | 'JOIN_INTEGRITY'
  | 'BATCH'
  | 'CONFIG';

/**
 * Base class for all pipeline errors
 */
export class EnvironmentDataError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EnvironmentDataError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Remote retrieval failed: non-2xx status, timeout, DNS or connection failure
 */
export class NetworkError extends EnvironmentDataError {
  constructor(
    public readonly dataset: DatasetName,
    public readonly url: string,
    cause: unknown
  ) {
    super(`Failed to download "${dataset}" from ${url}: ${describeCause(cause)}`, 'NETWORK', {
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Local filesystem failure (write, read or archive extraction)
 */
export class DatasetIOError extends EnvironmentDataError {
  constructor(
    public readonly dataset: DatasetName,
    public readonly path: string,
    cause: unknown
  ) {
    super(`I/O failure for "${dataset}" at ${path}: ${describeCause(cause)}`, 'IO', { cause });
    this.name = 'DatasetIOError';
  }
}

/**
 * A file does not have the expected layout
 */
export class FormatError extends EnvironmentDataError {
  constructor(
    public readonly dataset: DatasetName,
    public readonly detail: string
  ) {
    super(`Unexpected format for "${dataset}": ${detail}`, 'FORMAT');
    this.name = 'FormatError';
  }
}

/**
 * A tabular dataset has more than one row for the same country at merge time
 */
export class JoinIntegrityError extends EnvironmentDataError {
  constructor(
    public readonly dataset: DatasetName,
    public readonly duplicateKeys: readonly string[]
  ) {
    const shown = duplicateKeys.slice(0, 5).join(', ');
    const more = duplicateKeys.length > 5 ? ` (+${duplicateKeys.length - 5} more)` : '';
    super(
      `Duplicate country keys in "${dataset}": ${shown}${more}`,
      'JOIN_INTEGRITY'
    );
    this.name = 'JoinIntegrityError';
  }
}

export type PipelineStage = 'download' | 'boundary' | 'merge';

export interface DatasetFailure {
  readonly dataset: DatasetName;
  readonly stage: PipelineStage;
  readonly error: Error;
}

/**
 * One or more datasets failed in a pipeline stage
 *
 * Raised only after every dataset of the stage was attempted, so the
 * failure list is complete.
 */
export class DatasetBatchError extends EnvironmentDataError {
  constructor(
    public readonly stage: PipelineStage,
    public readonly failures: readonly DatasetFailure[]
  ) {
    super(
      `${stage} failed for ${failures.length} dataset(s): ${failures
        .map((f) => `${f.dataset} (${f.error.message})`)
        .join('; ')}`,
      'BATCH'
    );
    this.name = 'DatasetBatchError';
  }

  get datasets(): readonly DatasetName[] {
    return this.failures.map((f) => f.dataset);
  }

  /**
   * Get formatted summary of the failures
   */
  getSummary(): string {
    const lines: string[] = [`${this.stage} failed for ${this.failures.length} dataset(s):`, ''];

    for (const failure of this.failures) {
      lines.push(`  ${failure.dataset}: [${failure.error.name}] ${failure.error.message}`);
    }

    return lines.join('\n');
  }
}

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export class ConfigError extends EnvironmentDataError {
  constructor(public readonly issues: readonly ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      'CONFIG'
    );
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
