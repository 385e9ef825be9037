import type { TestStatistics } from '@flakelens/shared';
import { describe, it, expect } from 'vitest';

import { BASE_TIME } from '../../__tests__/helpers/results.js';
import { QuarantineSelector } from '../engine.js';

function statistics(testId: string, overrides: Partial<TestStatistics> = {}): TestStatistics {
  return {
    testId,
    totalRuns: 10,
    passCount: 5,
    failCount: 5,
    skippedCount: 0,
    flipCount: 5,
    flipRate: 5 / 9,
    isFlaky: true,
    verdict: 'flaky',
    firstSeen: new Date(BASE_TIME),
    lastSeen: new Date(BASE_TIME),
    meanDurationSeconds: 1,
    classification: 'timing',
    classificationEvidence: 'no other rule matched',
    estimatedCostUsd: 0.4,
    ...overrides,
  };
}

describe('QuarantineSelector', () => {
  it('should select every flaky test with the default policy', () => {
    const selector = new QuarantineSelector();

    expect(selector.select([
      statistics('a.flaky'),
      statistics('b.stable', { isFlaky: false, verdict: 'stable', flipRate: 0, estimatedCostUsd: 0 }),
      statistics('c.broken', { isFlaky: false, verdict: 'broken', flipRate: 0, estimatedCostUsd: 0 }),
    ])).toEqual(['a.flaky']);
  });

  it('should order selections by cost descending, then test id', () => {
    const selector = new QuarantineSelector();

    expect(selector.select([
      statistics('z.cheap', { estimatedCostUsd: 0.08 }),
      statistics('b.costly', { estimatedCostUsd: 1.2 }),
      statistics('a.costly', { estimatedCostUsd: 1.2 }),
    ])).toEqual(['a.costly', 'b.costly', 'z.cheap']);
  });

  it('should skip tests below the minimum flip rate', () => {
    const selector = new QuarantineSelector({ minFlipRate: 0.5 });

    expect(selector.evaluate(statistics('t', { flipRate: 0.25 }))).toEqual({
      testId: 't',
      quarantined: false,
      reason: 'below_flip_rate',
    });
    expect(selector.evaluate(statistics('t', { flipRate: 0.5 })).quarantined).toBe(true);
  });

  it('should skip tests below the minimum cost', () => {
    const selector = new QuarantineSelector({ minCostUsd: 1 });

    expect(selector.evaluate(statistics('t', { estimatedCostUsd: 0.99 })).reason).toBe('below_cost');
    expect(selector.evaluate(statistics('t', { estimatedCostUsd: 1 })).reason).toBe('selected');
  });

  it('should never select exempted tests, by id or glob', () => {
    const selector = new QuarantineSelector({ exemptTests: ['payments.test_refund', 'checkout.*'] });

    expect(selector.select([
      statistics('payments.test_refund'),
      statistics('checkout.test_cart'),
      statistics('search.test_query'),
    ])).toEqual(['search.test_query']);
  });

  it('should report non-flaky tests before checking thresholds', () => {
    const selector = new QuarantineSelector({ minFlipRate: 0.9, exemptTests: ['t'] });

    expect(selector.evaluate(statistics('t', { isFlaky: false, verdict: 'insufficient_data' })).reason).toBe('not_flaky');
  });

  it('should return an empty list when nothing is flaky', () => {
    expect(new QuarantineSelector().select([])).toEqual([]);
  });
});
