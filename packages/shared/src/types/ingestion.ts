/**
 * Ingestion types shared by the store, the report adapters and the command surface
 */

import type { RunRecord, TestStatus } from './analytics.js';

/**
 * A test result as handed over by a report adapter or an API client,
 * before the run id and timestamp are attached
 */
export interface NormalizedResult {
  readonly testId: string;
  readonly status: TestStatus;
  readonly durationSeconds: number;
  readonly errorMessage?: string;
  readonly timestamp?: Date;
  readonly position?: number;
}

export interface IngestOptions {
  readonly timestamp?: Date;
  readonly costPerRunUsd?: number;
  readonly source?: string;
}

export type FileIngestStatus = 'ingested' | 'duplicate' | 'invalid';

export interface FileIngestOutcome {
  readonly file: string;
  readonly runId: string;
  readonly status: FileIngestStatus;
  readonly testsRecorded: number;
  readonly message?: string;
  readonly run?: RunRecord;
}

export interface BatchIngestSummary {
  readonly filesIngested: number;
  readonly filesSkipped: number;
  readonly filesInvalid: number;
  readonly testsRecorded: number;
  readonly outcomes: readonly FileIngestOutcome[];
}

/**
 * Output of a report adapter for one file
 */
export interface ParsedReport {
  readonly results: readonly NormalizedResult[];
  readonly suites: number;
  readonly warnings: readonly string[];
}
