/**
 * Terminal rendering for detection reports, failure trends and store statistics
 */

import { truncateStart, type EngineStats, type TestStatistics, type TestTrend } from '@flakelens/shared';
import type { ChalkInstance } from 'chalk';

export const TEST_COLUMN_WIDTH = 60;
const CAUSE_COLUMN_WIDTH = 15;

/** Flip rate above which a row is shown in red instead of yellow */
export const HIGH_FLIP_RATE = 0.3;

export interface DetectTableOptions {
  /** Include tests that are not flaky */
  all?: boolean;
}

export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export const formatUsd = (value: number): string => `$${roundToCents(value).toFixed(2)}`;

export const formatPercent = (rate: number): string => `${(rate * 100).toFixed(1)}%`;

function headerRow(palette: ChalkInstance): string {
  return palette.bold(
    [
      'TEST'.padEnd(TEST_COLUMN_WIDTH),
      'RUNS'.padStart(5),
      'FLIP'.padStart(7),
      'CAUSE'.padEnd(CAUSE_COLUMN_WIDTH),
      'COST'.padStart(10),
    ].join('  ')
  );
}

function statisticsRow(entry: TestStatistics, palette: ChalkInstance): string {
  const flip = formatPercent(entry.flipRate).padStart(7);
  const flipColor = entry.flipRate > HIGH_FLIP_RATE ? palette.red : palette.yellow;

  return [
    truncateStart(entry.testId, TEST_COLUMN_WIDTH).padEnd(TEST_COLUMN_WIDTH),
    String(entry.totalRuns).padStart(5),
    entry.isFlaky ? flipColor(flip) : flip,
    (entry.classification ?? entry.verdict).padEnd(CAUSE_COLUMN_WIDTH),
    formatUsd(entry.estimatedCostUsd).padStart(10),
  ].join('  ');
}

/**
 * One row per test in report order, followed by the total CI waste of the
 * flaky tests shown
 */
export function renderDetectTable(
  statistics: readonly TestStatistics[],
  palette: ChalkInstance,
  options: DetectTableOptions = {}
): string {
  const rows = options.all ? statistics : statistics.filter(entry => entry.isFlaky);
  if (rows.length === 0) {
    return palette.green(options.all ? 'No test results recorded.' : 'No flaky tests detected.') + '\n';
  }

  const flaky = rows.filter(entry => entry.isFlaky);
  const waste = flaky.reduce((sum, entry) => sum + entry.estimatedCostUsd, 0);

  const lines = [
    headerRow(palette),
    ...rows.map(entry => statisticsRow(entry, palette)),
    '',
    palette.bold(`Total CI waste: ${formatUsd(waste)} across ${flaky.length} flaky test(s)`),
  ];
  return lines.join('\n') + '\n';
}

function trendLabel(entry: TestTrend, palette: ChalkInstance): string {
  switch (entry.trend) {
    case 'worsening':
      return palette.red(entry.trend);
    case 'improving':
      return palette.green(entry.trend);
    case 'stable':
      return entry.trend;
  }
}

function trendRow(entry: TestTrend, palette: ChalkInstance): string {
  return [
    truncateStart(entry.testId, TEST_COLUMN_WIDTH).padEnd(TEST_COLUMN_WIDTH),
    String(entry.totalRuns).padStart(5),
    formatPercent(entry.failRate).padStart(7),
    entry.slope.toFixed(4).padStart(8),
    trendLabel(entry, palette),
  ].join('  ');
}

/**
 * Failure trend table for the last `days` days
 */
export function renderTrendTable(trends: readonly TestTrend[], palette: ChalkInstance, days: number): string {
  if (trends.length === 0) {
    return palette.green('No trend data available.') + '\n';
  }

  const header = palette.bold(
    [
      'TEST'.padEnd(TEST_COLUMN_WIDTH),
      'RUNS'.padStart(5),
      'FAIL'.padStart(7),
      'SLOPE'.padStart(8),
      'TREND',
    ].join('  ')
  );

  const lines = [
    palette.bold(`Flakiness trends (last ${days} days)`),
    header,
    ...trends.map(entry => trendRow(entry, palette)),
  ];
  return lines.join('\n') + '\n';
}

export function renderStats(stats: EngineStats): string {
  return [
    `${stats.totalResults} results`,
    `${stats.totalTests} unique tests`,
    `${stats.totalRuns} CI runs`,
    `${stats.flakyCount} flaky`,
    `${stats.insufficientDataCount} with too few runs`,
    `${formatUsd(stats.totalEstimatedCostUsd)} estimated waste`,
  ].join(' | ') + '\n';
}
