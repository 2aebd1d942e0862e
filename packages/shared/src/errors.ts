// Error handling utilities shared by the pipeline and database packages

export type StratumErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MALFORMED_RECORD'
  | 'MERGE_INTEGRITY'
  | 'PIPELINE_ABORTED'
  | 'COMMIT_FAILED'
  | 'GRANT_STORE_ERROR';

export class StratumError extends Error {
  readonly code: StratumErrorCode;

  constructor(code: StratumErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConfigurationError extends StratumError {
  constructor(message: string, cause?: unknown) {
    super('CONFIGURATION_ERROR', message, { cause });
  }
}

/**
 * A record excluded from its batch. Carries enough context for an operator
 * to find the row in the source file.
 */
export class MalformedRecordError extends StratumError {
  constructor(
    message: string,
    readonly index: number,
    readonly businessKey: string | null = null,
    readonly ingestedFile: string | null = null
  ) {
    super('MALFORMED_RECORD', message);
  }
}

export class MergeIntegrityError extends StratumError {
  constructor(message: string, readonly businessKey: string) {
    super('MERGE_INTEGRITY', message);
  }
}

export class PipelineAbortedError extends StratumError {
  constructor(message = 'Pipeline run aborted before commit', cause?: unknown) {
    super('PIPELINE_ABORTED', message, { cause });
  }
}

export class CommitError extends StratumError {
  constructor(message: string, cause?: unknown) {
    super('COMMIT_FAILED', message, { cause });
  }
}

export class GrantStoreError extends StratumError {
  constructor(message: string, cause?: unknown) {
    super('GRANT_STORE_ERROR', message, { cause });
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

export function createError(message: string, cause?: unknown): Error {
  const error = new Error(message);
  if (cause) {
    error.cause = cause;
  }
  return error;
}
