/**
 * FlakeLens analysis service
 *
 * The engine operations (ingest, detect, quarantine, stats, trends) over
 * a result store. Nothing derived is cached: every read recomputes from the
 * stored runs so rule or rate changes apply retroactively.
 */

import { relative } from 'path';

import {
  DEFAULT_TREND_OPTIONS,
  DuplicateRunError,
  ValidationError,
  validateResults,
  type BatchIngestSummary,
  type EngineStats,
  type FileIngestOutcome,
  type IngestOptions,
  type RunRecord,
  type TestResult,
  type TestStatistics,
  type TestTrend,
} from '@flakelens/shared';

import { FlakeDetectionEngine } from '../analytics/detection-engine.js';
import { TrendAnalyzer } from '../analytics/trends.js';
import { parseJUnitFile } from '../ingestion/junit-parser.js';
import type { ResultStore } from '../ingestion/store.js';
import { deriveRunId, findReportFiles, generateRunId, getFileStats } from '../ingestion/utils.js';
import { QuarantineSelector } from '../policy/engine.js';
import { resolveEngineOptions, type EngineOverrides } from '../policy/config.js';
import { logger } from '../utils/logger.js';

export interface FlakeAnalysisServiceOptions {
  /** Engine settings applied when a call passes no override for a field, highest precedence first */
  readonly defaults?: readonly EngineOverrides[];
  readonly clock?: () => Date;
}

export interface ReportIngestOptions extends IngestOptions {
  readonly runId?: string;
}

export class FlakeAnalysisService {
  private readonly defaults: readonly EngineOverrides[];
  private readonly clock: () => Date;

  constructor(
    private readonly store: ResultStore,
    options: FlakeAnalysisServiceOptions = {}
  ) {
    this.defaults = options.defaults ?? [];
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validate and store one run. All-or-nothing: an invalid entry rejects the run.
   */
  public async ingest(runId: string, input: readonly unknown[], options: IngestOptions = {}): Promise<RunRecord> {
    const id = runId.trim();
    if (!id) {
      throw new ValidationError('runId is required', [{ path: 'runId', message: 'runId is required' }]);
    }
    if (options.costPerRunUsd !== undefined && !(Number.isFinite(options.costPerRunUsd) && options.costPerRunUsd >= 0)) {
      throw new ValidationError(
        `Run ${id} rejected: costPerRunUsd must be a non-negative number`,
        [{ path: 'costPerRunUsd', message: 'Must be a non-negative number' }],
        id
      );
    }

    const normalized = validateResults(id, input);
    const ingestedAt = this.clock();
    const runTimestamp = options.timestamp ?? ingestedAt;

    const results: TestResult[] = normalized.map(result => ({
      testId: result.testId,
      runId: id,
      status: result.status,
      durationSeconds: result.durationSeconds,
      errorMessage: result.status === 'fail' || result.status === 'error' ? result.errorMessage : undefined,
      timestamp: result.timestamp ?? runTimestamp,
      position: result.position,
    }));

    const run = await this.store.ingestRun({
      runId: id,
      ingestedAt,
      costPerRunUsd: options.costPerRunUsd,
      source: options.source,
      resultCount: results.length,
    }, results);

    logger.info({ runId: id, results: results.length, source: options.source }, 'Run ingested');
    return run;
  }

  /**
   * Parse and ingest one JUnit report as one run
   */
  public async ingestReport(path: string, options: ReportIngestOptions = {}): Promise<RunRecord> {
    const runId = options.runId ?? generateRunId(this.clock());
    if (this.store.runs().has(runId)) {
      throw new DuplicateRunError(runId);
    }

    const report = await parseJUnitFile(path);
    for (const warning of report.warnings) {
      logger.warn({ path, runId }, warning);
    }

    return this.ingest(runId, report.results, {
      ...options,
      source: options.source ?? path,
    });
  }

  /**
   * Ingest every report below a directory, one run per file. Each file
   * succeeds or fails on its own; previously stored runs are never touched.
   */
  public async ingestDirectory(root: string, options: Omit<IngestOptions, 'source' | 'timestamp'> = {}): Promise<BatchIngestSummary> {
    const files = await findReportFiles(root);
    const outcomes: FileIngestOutcome[] = [];

    for (const file of files) {
      const runId = deriveRunId(root, file);
      const source = relative(root, file);
      try {
        const { mtime } = await getFileStats(file);
        const run = await this.ingestReport(file, { ...options, runId, source, timestamp: mtime });
        outcomes.push({ file: source, runId, status: 'ingested', testsRecorded: run.resultCount, run });
      } catch (error) {
        if (error instanceof DuplicateRunError) {
          outcomes.push({ file: source, runId, status: 'duplicate', testsRecorded: 0, message: error.message });
        } else if (error instanceof ValidationError) {
          logger.warn({ file: source, runId, issues: error.issues }, error.message);
          outcomes.push({ file: source, runId, status: 'invalid', testsRecorded: 0, message: error.message });
        } else {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn({ file: source, runId, err: error }, 'Report could not be read');
          outcomes.push({ file: source, runId, status: 'invalid', testsRecorded: 0, message });
        }
      }
    }

    const summary: BatchIngestSummary = {
      filesIngested: outcomes.filter(o => o.status === 'ingested').length,
      filesSkipped: outcomes.filter(o => o.status === 'duplicate').length,
      filesInvalid: outcomes.filter(o => o.status === 'invalid').length,
      testsRecorded: outcomes.reduce((sum, o) => sum + o.testsRecorded, 0),
      outcomes,
    };

    logger.info({
      root,
      filesIngested: summary.filesIngested,
      filesSkipped: summary.filesSkipped,
      filesInvalid: summary.filesInvalid,
    }, 'Batch ingestion finished');
    return summary;
  }

  /**
   * Run metadata in ingestion order
   */
  public runs(): readonly RunRecord[] {
    return this.store.runRecords();
  }

  /**
   * Statistics for every test, most expensive first, ties by test id
   */
  public detect(policy: EngineOverrides = {}): TestStatistics[] {
    const options = resolveEngineOptions([policy, ...this.defaults]);
    const engine = new FlakeDetectionEngine(options);
    return engine.detect(this.store.snapshot());
  }

  /**
   * Test ids to suppress, in the same order as the detect report
   */
  public quarantine(policy: EngineOverrides = {}): string[] {
    const options = resolveEngineOptions([policy, ...this.defaults]);
    const selector = new QuarantineSelector(options.quarantine);
    return selector.select(this.detect(policy));
  }

  public stats(policy: EngineOverrides = {}): EngineStats {
    const statistics = this.detect(policy);
    const flaky = statistics.filter(entry => entry.isFlaky);

    return {
      totalTests: statistics.length,
      totalRuns: this.store.runs().size,
      totalResults: this.store.allResults().length,
      flakyCount: flaky.length,
      insufficientDataCount: statistics.filter(entry => entry.verdict === 'insufficient_data').length,
      totalEstimatedCostUsd: flaky.reduce((sum, entry) => sum + entry.estimatedCostUsd, 0),
    };
  }

  /**
   * Failure trend per test over the last `windowDays` days, worsening first
   */
  public trends(windowDays: number = DEFAULT_TREND_OPTIONS.windowDays, policy: EngineOverrides = {}): TestTrend[] {
    if (!Number.isFinite(windowDays) || windowDays <= 0) {
      throw new ValidationError(`Trend window must be a positive number of days, received ${windowDays}`, [
        { path: 'days', message: 'must be a positive number' },
      ]);
    }

    const options = resolveEngineOptions([policy, ...this.defaults]);
    const analyzer = new TrendAnalyzer({ windowDays, minSampleSize: options.detection.minSampleSize });
    return analyzer.analyze(this.store.allResults(), this.clock());
  }
}
