import type { TestResult, TestStatus } from '@flakelens/shared';
import { describe, it, expect } from 'vitest';

import { BASE_TIME, sequence } from '../../__tests__/helpers/results.js';
import { TrendAnalyzer, leastSquaresSlope } from '../trends.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date(BASE_TIME + 10 * DAY_MS);
const RECENT = BASE_TIME + 5 * DAY_MS;

function recent(testId: string, statuses: readonly TestStatus[]): TestResult[] {
  return sequence(testId, statuses, index => ({
    runId: `recent-${index}`,
    timestamp: new Date(RECENT + index * 60_000),
  }));
}

describe('leastSquaresSlope', () => {
  it('should fit a line through the failure indicator', () => {
    expect(leastSquaresSlope([0, 0, 1, 1])).toBe(0.4);
    expect(leastSquaresSlope([1, 1, 0, 0])).toBe(-0.4);
    expect(leastSquaresSlope([0, 1, 0])).toBe(0);
  });

  it('should return zero for fewer than two values', () => {
    expect(leastSquaresSlope([])).toBe(0);
    expect(leastSquaresSlope([1])).toBe(0);
  });
});

describe('TrendAnalyzer', () => {
  const history = [
    // outside a 7-day window ending at NOW
    ...sequence('suite.test_worsening', ['fail', 'fail'], index => ({ runId: `old-${index}` })),
    ...recent('suite.test_worsening', ['pass', 'pass', 'fail', 'fail']),
    ...recent('suite.test_improving', ['fail', 'error', 'pass', 'pass']),
    ...recent('suite.test_steady', ['pass', 'skipped', 'pass', 'pass']),
    ...recent('suite.test_short', ['pass', 'fail']),
  ];

  it('should report tests in the window, worsening first', () => {
    const trends = new TrendAnalyzer({ windowDays: 7 }).analyze(history, NOW);

    expect(trends).toEqual([
      { testId: 'suite.test_worsening', totalRuns: 4, failRate: 0.5, slope: 0.4, trend: 'worsening' },
      { testId: 'suite.test_steady', totalRuns: 3, failRate: 0, slope: 0, trend: 'stable' },
      { testId: 'suite.test_improving', totalRuns: 4, failRate: 0.5, slope: -0.4, trend: 'improving' },
    ]);
  });

  it('should include older runs in a wider window', () => {
    const trends = new TrendAnalyzer({ windowDays: 30 }).analyze(history, NOW);
    const worsening = trends.find(trend => trend.testId === 'suite.test_worsening');

    // fail, fail, pass, pass, fail, fail
    expect(worsening?.totalRuns).toBe(6);
    expect(worsening?.failRate).toBeCloseTo(4 / 6, 10);
  });

  it('should treat slopes within the threshold as stable', () => {
    const trends = new TrendAnalyzer({ windowDays: 7, slopeThreshold: 0.5 }).analyze(history, NOW);

    expect(trends.map(trend => trend.trend)).toEqual(['stable', 'stable', 'stable']);
  });

  it('should honour the minimum sample size', () => {
    const trends = new TrendAnalyzer({ windowDays: 7, minSampleSize: 2 }).analyze(history, NOW);

    expect(trends.map(trend => trend.testId)).toContain('suite.test_short');
  });

  it('should return frozen entries', () => {
    const trends = new TrendAnalyzer({ windowDays: 7 }).analyze(history, NOW);
    expect(trends.every(trend => Object.isFrozen(trend))).toBe(true);
  });
});
