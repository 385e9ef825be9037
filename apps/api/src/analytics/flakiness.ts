import {
  DEFAULT_DETECTION_POLICY,
  type DetectionPolicy,
  type FlakinessVerdict,
  type FlipStatistics,
  type TestResult,
  type TestStatus,
} from '@flakelens/shared';

export type Outcome = 'pass' | 'fail';

/**
 * Collapse a status onto the two outcomes the flip walk compares.
 * Skipped observations have no outcome.
 */
export function toOutcome(status: TestStatus): Outcome | null {
  switch (status) {
    case 'pass':
      return 'pass';
    case 'fail':
    case 'error':
      return 'fail';
    case 'skipped':
      return null;
  }
}

export function isFailure(result: TestResult): boolean {
  return toOutcome(result.status) === 'fail';
}

/**
 * Chronological order: timestamp ascending, ties broken by run id
 */
export function compareChronologically(a: TestResult, b: TestResult): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.runId < b.runId ? -1 : a.runId > b.runId ? 1 : 0;
}

/**
 * Group results by test id. Groups come back in test id order and keep
 * the ingestion order of their members.
 */
export function groupByTest(results: readonly TestResult[]): Map<string, TestResult[]> {
  const groups = new Map<string, TestResult[]>();

  for (const result of results) {
    const group = groups.get(result.testId);
    if (group) {
      group.push(result);
    } else {
      groups.set(result.testId, [result]);
    }
  }

  const orderedIds = [...groups.keys()].sort();
  return new Map(orderedIds.map(testId => [testId, groups.get(testId) ?? []]));
}

/**
 * Flip-rate analysis over adjacent chronological run pairs.
 *
 * A test that fails in every run is broken, not flaky: only a change of
 * outcome between neighbouring runs counts as evidence of non-determinism.
 */
export class FlipRateAnalyzer {
  private readonly policy: DetectionPolicy;

  constructor(policy: Partial<DetectionPolicy> = {}) {
    this.policy = { ...DEFAULT_DETECTION_POLICY, ...policy };
  }

  /**
   * Sorted, non-skipped observations of one test
   */
  public observations(group: readonly TestResult[]): TestResult[] {
    return [...group]
      .sort(compareChronologically)
      .filter(result => toOutcome(result.status) !== null);
  }

  public computeStatistics(testId: string, group: readonly TestResult[]): FlipStatistics {
    if (group.length === 0) {
      throw new Error(`Cannot compute statistics for ${testId} with no results`);
    }

    const sorted = [...group].sort(compareChronologically);
    const observed = sorted.filter(result => toOutcome(result.status) !== null);

    let passCount = 0;
    let failCount = 0;
    let flipCount = 0;
    let previous: Outcome | null = null;

    for (const result of observed) {
      const outcome = toOutcome(result.status);
      if (outcome === 'pass') {
        passCount++;
      } else {
        failCount++;
      }
      if (previous !== null && outcome !== previous) {
        flipCount++;
      }
      previous = outcome;
    }

    const totalRuns = observed.length;
    const flipRate = totalRuns < 2 ? 0 : flipCount / Math.max(totalRuns - 1, 1);
    const verdict = this.verdictFor(totalRuns, passCount, failCount, flipRate);

    const first = sorted[0];
    const last = sorted[sorted.length - 1];
    if (!first || !last) {
      throw new Error(`Invalid result group for ${testId}`);
    }

    const meanDurationSeconds = totalRuns > 0
      ? observed.reduce((sum, result) => sum + result.durationSeconds, 0) / totalRuns
      : 0;

    return Object.freeze({
      testId,
      totalRuns,
      passCount,
      failCount,
      skippedCount: sorted.length - totalRuns,
      flipCount,
      flipRate,
      isFlaky: verdict === 'flaky',
      verdict,
      firstSeen: first.timestamp,
      lastSeen: last.timestamp,
      meanDurationSeconds,
    });
  }

  private verdictFor(
    totalRuns: number,
    passCount: number,
    failCount: number,
    flipRate: number
  ): FlakinessVerdict {
    if (totalRuns < this.policy.minSampleSize) {
      return 'insufficient_data';
    }
    if (failCount === 0) {
      return 'stable';
    }
    if (passCount === 0) {
      return 'broken';
    }
    return flipRate > 0 ? 'flaky' : 'stable';
  }
}
