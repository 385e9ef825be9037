import type { TestResult, TestStatus } from '@flakelens/shared';

export const BASE_TIME = Date.parse('2024-01-01T00:00:00.000Z');

export function runIdAt(index: number): string {
  return `run-${String(index).padStart(2, '0')}`;
}

export function makeResult(overrides: Partial<TestResult> & Pick<TestResult, 'testId' | 'status'>): TestResult {
  return {
    runId: runIdAt(0),
    durationSeconds: 1,
    timestamp: new Date(BASE_TIME),
    ...overrides,
  };
}

/**
 * One result per status, a minute apart, in run-00, run-01, ...
 */
export function sequence(
  testId: string,
  statuses: readonly TestStatus[],
  customize: (index: number) => Partial<TestResult> = () => ({})
): TestResult[] {
  return statuses.map((status, index) => ({
    testId,
    status,
    runId: runIdAt(index),
    durationSeconds: 1,
    timestamp: new Date(BASE_TIME + index * 60_000),
    ...customize(index),
  }));
}
