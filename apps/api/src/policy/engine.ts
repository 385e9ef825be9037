/**
 * Quarantine selection policy
 *
 * Picks the flaky tests to suppress and orders them by attributed cost.
 * Selection depends only on the statistics and the policy passed in.
 */

import {
  DEFAULT_QUARANTINE_POLICY,
  type QuarantinePolicy,
  type TestStatistics,
} from '@flakelens/shared';
import { minimatch } from 'minimatch';

import { compareByCost } from '../analytics/detection-engine.js';

export type QuarantineExclusion = 'not_flaky' | 'below_flip_rate' | 'below_cost' | 'exempted';

export interface QuarantineDecision {
  readonly testId: string;
  readonly quarantined: boolean;
  readonly reason: QuarantineExclusion | 'selected';
}

export class QuarantineSelector {
  private readonly policy: QuarantinePolicy;

  constructor(policy: Partial<QuarantinePolicy> = {}) {
    this.policy = { ...DEFAULT_QUARANTINE_POLICY, ...policy };
  }

  public evaluate(statistics: TestStatistics): QuarantineDecision {
    const { testId } = statistics;

    if (!statistics.isFlaky) {
      return { testId, quarantined: false, reason: 'not_flaky' };
    }

    if (this.policy.minFlipRate !== undefined && statistics.flipRate < this.policy.minFlipRate) {
      return { testId, quarantined: false, reason: 'below_flip_rate' };
    }

    if (this.policy.minCostUsd !== undefined && statistics.estimatedCostUsd < this.policy.minCostUsd) {
      return { testId, quarantined: false, reason: 'below_cost' };
    }

    if (this.isExempted(testId)) {
      return { testId, quarantined: false, reason: 'exempted' };
    }

    return { testId, quarantined: true, reason: 'selected' };
  }

  /**
   * Test ids to suppress, most expensive first, ties by test id
   */
  public select(statistics: readonly TestStatistics[]): string[] {
    return statistics
      .filter(entry => this.evaluate(entry).quarantined)
      .sort(compareByCost)
      .map(entry => entry.testId);
  }

  private isExempted(testId: string): boolean {
    return this.policy.exemptTests.some(pattern =>
      testId === pattern || minimatch(testId, pattern, { nocomment: true })
    );
  }
}
