import {
  DEFAULT_TREND_OPTIONS,
  type TestResult,
  type TestTrend,
  type TrendDirection,
  type TrendOptions,
} from '@flakelens/shared';

import { compareChronologically, groupByTest, isFailure, toOutcome } from './flakiness.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Ordinary least-squares slope of values against their index
 */
export function leastSquaresSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }

  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, value) => sum + value, 0) / n;

  let covariance = 0;
  let variance = 0;
  values.forEach((value, index) => {
    covariance += (index - meanX) * (value - meanY);
    variance += (index - meanX) ** 2;
  });

  return covariance / variance;
}

/**
 * Report order: worsening first (steepest slope), then test id
 */
export function compareBySlope(a: TestTrend, b: TestTrend): number {
  if (a.slope !== b.slope) {
    return b.slope - a.slope;
  }
  return a.testId < b.testId ? -1 : a.testId > b.testId ? 1 : 0;
}

/**
 * Failure trend per test over the runs recorded in the last `windowDays`.
 * A rising failure indicator means the test is getting worse.
 */
export class TrendAnalyzer {
  private readonly options: TrendOptions;

  constructor(options: Partial<TrendOptions> = {}) {
    this.options = { ...DEFAULT_TREND_OPTIONS, ...options };
  }

  public analyze(results: readonly TestResult[], now: Date): TestTrend[] {
    const since = now.getTime() - this.options.windowDays * DAY_MS;
    const recent = results.filter(result => result.timestamp.getTime() >= since);

    const trends: TestTrend[] = [];
    for (const [testId, group] of groupByTest(recent)) {
      const observed = [...group]
        .sort(compareChronologically)
        .filter(result => toOutcome(result.status) !== null);
      if (observed.length < this.options.minSampleSize) continue;

      const failures = observed.map(result => (isFailure(result) ? 1 : 0));
      const slope = leastSquaresSlope(failures);

      trends.push(Object.freeze({
        testId,
        totalRuns: observed.length,
        failRate: failures.reduce<number>((sum, value) => sum + value, 0) / observed.length,
        slope,
        trend: this.directionFor(slope),
      }));
    }

    return trends.sort(compareBySlope);
  }

  private directionFor(slope: number): TrendDirection {
    if (slope > this.options.slopeThreshold) {
      return 'worsening';
    }
    if (slope < -this.options.slopeThreshold) {
      return 'improving';
    }
    return 'stable';
  }
}
