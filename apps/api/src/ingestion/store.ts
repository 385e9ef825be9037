/**
 * Result store contract and the in-memory implementation
 *
 * The store is the only shared mutable resource. Writes go through a
 * single-writer lock so two ingestions can never both claim a run id.
 */

import {
  DuplicateRunError,
  ValidationError,
  type RunRecord,
  type TestResult,
} from '@flakelens/shared';

import type { DetectionSnapshot } from '../analytics/detection-engine.js';

export interface ResultStore {
  /** Append one result; rejects results of an ingested run and repeated (test, run) pairs */
  record(result: TestResult): Promise<void>;
  /** Store a whole run atomically: every result and the run record, or nothing */
  ingestRun(run: RunRecord, results: readonly TestResult[]): Promise<RunRecord>;
  /** Results in ingestion order */
  allResults(): readonly TestResult[];
  /** Every run id the store knows about */
  runs(): ReadonlySet<string>;
  runRecords(): readonly RunRecord[];
  snapshot(): DetectionSnapshot;
}

/**
 * Serializes async tasks: each one starts after the previous settled
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  public runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

interface StoreCheckpoint {
  readonly results: number;
  readonly runIds: ReadonlySet<string>;
  readonly runs: ReadonlySet<string>;
}

function pairKey(testId: string, runId: string): string {
  return `${runId}\u0000${testId}`;
}

export class InMemoryResultStore implements ResultStore {
  private readonly results: TestResult[] = [];
  private readonly pairs = new Set<string>();
  private readonly ingestedRuns = new Map<string, RunRecord>();
  private readonly knownRunIds = new Set<string>();
  private readonly lock = new WriteLock();

  public record(result: TestResult): Promise<void> {
    return this.lock.runExclusive(async () => {
      if (this.ingestedRuns.has(result.runId)) {
        throw new DuplicateRunError(result.runId);
      }
      if (this.pairs.has(pairKey(result.testId, result.runId))) {
        throw new DuplicateRunError(result.runId, result.testId);
      }

      const mark = this.checkpoint();
      this.append(result);
      await this.commit(mark);
    });
  }

  public ingestRun(run: RunRecord, results: readonly TestResult[]): Promise<RunRecord> {
    return this.lock.runExclusive(async () => {
      if (this.knownRunIds.has(run.runId)) {
        throw new DuplicateRunError(run.runId);
      }

      const batch = new Set<string>();
      for (const result of results) {
        if (result.runId !== run.runId) {
          throw new ValidationError(
            `Result for ${result.testId} belongs to run ${result.runId}, not ${run.runId}`,
            [{ path: 'runId', message: 'Result run id does not match the ingested run' }],
            run.runId
          );
        }
        if (batch.has(result.testId)) {
          throw new DuplicateRunError(run.runId, result.testId);
        }
        batch.add(result.testId);
      }

      const mark = this.checkpoint();
      const record = Object.freeze({ ...run, resultCount: results.length });
      for (const result of results) {
        this.append(result);
      }
      this.ingestedRuns.set(record.runId, record);
      this.knownRunIds.add(record.runId);
      await this.commit(mark);

      return record;
    });
  }

  public allResults(): readonly TestResult[] {
    return [...this.results];
  }

  public runs(): ReadonlySet<string> {
    return new Set(this.knownRunIds);
  }

  public runRecords(): readonly RunRecord[] {
    return [...this.ingestedRuns.values()];
  }

  public snapshot(): DetectionSnapshot {
    return {
      results: this.allResults(),
      runs: this.runRecords(),
    };
  }

  /**
   * Write hook for durable stores; runs inside the write lock after every change
   */
  protected async persist(): Promise<void> {}

  /**
   * Load previously persisted state without re-running the write path
   */
  protected restore(runs: readonly RunRecord[], results: readonly TestResult[]): void {
    for (const result of results) {
      this.append(result);
    }
    for (const run of runs) {
      this.ingestedRuns.set(run.runId, Object.freeze({ ...run }));
      this.knownRunIds.add(run.runId);
    }
  }

  private append(result: TestResult): void {
    this.results.push(Object.freeze({ ...result }));
    this.pairs.add(pairKey(result.testId, result.runId));
    this.knownRunIds.add(result.runId);
  }

  private checkpoint(): StoreCheckpoint {
    return {
      results: this.results.length,
      runIds: new Set(this.knownRunIds),
      runs: new Set(this.ingestedRuns.keys()),
    };
  }

  /**
   * Persist, or undo everything appended since the checkpoint
   */
  private async commit(mark: StoreCheckpoint): Promise<void> {
    try {
      await this.persist();
    } catch (error) {
      for (const removed of this.results.splice(mark.results)) {
        this.pairs.delete(pairKey(removed.testId, removed.runId));
      }
      for (const runId of [...this.knownRunIds]) {
        if (!mark.runIds.has(runId)) this.knownRunIds.delete(runId);
      }
      for (const runId of [...this.ingestedRuns.keys()]) {
        if (!mark.runs.has(runId)) this.ingestedRuns.delete(runId);
      }
      throw error;
    }
  }
}
