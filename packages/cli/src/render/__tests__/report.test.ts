import type { TestStatistics, TestTrend } from '@flakelens/shared';
import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';

import { createPalette } from '../palette.js';
import { formatUsd, renderDetectTable, renderStats, renderTrendTable, roundToCents } from '../report.js';

const plain = createPalette(false);

function statistics(testId: string, overrides: Partial<TestStatistics> = {}): TestStatistics {
  return {
    testId,
    totalRuns: 4,
    passCount: 2,
    failCount: 2,
    skippedCount: 0,
    flipCount: 3,
    flipRate: 1,
    isFlaky: true,
    verdict: 'flaky',
    firstSeen: new Date('2024-01-01T00:00:00.000Z'),
    lastSeen: new Date('2024-01-01T00:03:00.000Z'),
    meanDurationSeconds: 1,
    classification: 'timing',
    classificationEvidence: 'no other rule matched',
    estimatedCostUsd: 0.24,
    ...overrides,
  };
}

const columns = (line: string | undefined): string[] => (line ?? '').trim().split(/\s{2,}/);

describe('renderDetectTable', () => {
  const report = [
    statistics('suite.test_flaky'),
    statistics('suite.test_rare', { flipRate: 0.25, flipCount: 1, estimatedCostUsd: 0.08, classification: 'shared_state' }),
    statistics('suite.test_stable', {
      flipRate: 0,
      flipCount: 0,
      isFlaky: false,
      verdict: 'stable',
      classification: null,
      estimatedCostUsd: 0,
    }),
  ];

  it('should render flaky tests with a waste total', () => {
    const lines = renderDetectTable(report, plain).split('\n');

    expect(columns(lines[0])).toEqual(['TEST', 'RUNS', 'FLIP', 'CAUSE', 'COST']);
    expect(columns(lines[1])).toEqual(['suite.test_flaky', '4', '100.0%', 'timing', '$0.24']);
    expect(columns(lines[2])).toEqual(['suite.test_rare', '4', '25.0%', 'shared_state', '$0.08']);
    expect(lines.slice(3)).toEqual(['', 'Total CI waste: $0.32 across 2 flaky test(s)', '']);
  });

  it('should include every test with the all option', () => {
    const lines = renderDetectTable(report, plain, { all: true }).split('\n');

    expect(columns(lines[3])).toEqual(['suite.test_stable', '4', '0.0%', 'stable', '$0.00']);
    expect(lines[5]).toBe('Total CI waste: $0.32 across 2 flaky test(s)');
  });

  it('should keep the end of long test ids', () => {
    const testId = `tests.${'deeply.nested.'.repeat(5)}test_checkout_total`;
    const lines = renderDetectTable([statistics(testId)], plain).split('\n');

    expect(columns(lines[1])[0]).toBe('...' + testId.slice(testId.length - 57));
  });

  it('should colour high flip rates red and lower ones yellow', () => {
    const output = renderDetectTable(report, new Chalk({ level: 1 }));

    expect(output).toContain('\u001b[31m 100.0%\u001b[39m');
    expect(output).toContain('\u001b[33m  25.0%\u001b[39m');
  });

  it('should say so when nothing is flaky', () => {
    expect(renderDetectTable([], plain)).toBe('No flaky tests detected.\n');
  });
});

describe('renderTrendTable', () => {
  const trends: TestTrend[] = [
    { testId: 'suite.test_worse', totalRuns: 4, failRate: 0.5, slope: 0.4, trend: 'worsening' },
    { testId: 'suite.test_better', totalRuns: 5, failRate: 0.2, slope: -0.3, trend: 'improving' },
  ];

  it('should render one row per test under a titled header', () => {
    const lines = renderTrendTable(trends, plain, 30).split('\n');

    expect(lines[0]).toBe('Flakiness trends (last 30 days)');
    expect(columns(lines[1])).toEqual(['TEST', 'RUNS', 'FAIL', 'SLOPE', 'TREND']);
    expect(columns(lines[3])).toEqual(['suite.test_better', '5', '20.0%', '-0.3000', 'improving']);
  });

  it('should colour worsening red and improving green', () => {
    const output = renderTrendTable(trends, new Chalk({ level: 1 }), 30);

    expect(output).toContain('\u001b[31mworsening\u001b[39m');
    expect(output).toContain('\u001b[32mimproving\u001b[39m');
  });

  it('should say so when there is nothing to show', () => {
    expect(renderTrendTable([], plain, 30)).toBe('No trend data available.\n');
  });
});

describe('renderStats', () => {
  it('should print a one-line summary', () => {
    expect(renderStats({
      totalTests: 3,
      totalRuns: 4,
      totalResults: 12,
      flakyCount: 2,
      insufficientDataCount: 1,
      totalEstimatedCostUsd: 0.32,
    })).toBe('12 results | 3 unique tests | 4 CI runs | 2 flaky | 1 with too few runs | $0.32 estimated waste\n');
  });
});

describe('formatUsd', () => {
  it('should round exact amounts to cents only for display', () => {
    expect(roundToCents(1.234)).toBe(1.23);
    expect(formatUsd(0.1 + 0.2)).toBe('$0.30');
    expect(formatUsd(0.006)).toBe('$0.01');
    expect(formatUsd(0.004)).toBe('$0.00');
  });
});
