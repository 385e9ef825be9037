/**
 * Domain errors raised at the ingestion boundary
 */

export const ERROR_CODES = ['VALIDATION_FAILED', 'DUPLICATE_RUN'] as const;

export type FlakeLensErrorCode = typeof ERROR_CODES[number];

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class ValidationError extends Error {
  public readonly code: FlakeLensErrorCode = 'VALIDATION_FAILED';
  public readonly issues: readonly ValidationIssue[];
  public readonly runId?: string;

  constructor(message: string, issues: readonly ValidationIssue[] = [], runId?: string) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    this.runId = runId;
  }
}

export class DuplicateRunError extends Error {
  public readonly code: FlakeLensErrorCode = 'DUPLICATE_RUN';

  constructor(
    public readonly runId: string,
    public readonly testId?: string
  ) {
    super(
      testId
        ? `Test ${testId} is already recorded for run ${runId}`
        : `Run ${runId} has already been ingested`
    );
    this.name = 'DuplicateRunError';
  }
}
