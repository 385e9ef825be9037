import {
  DEFAULT_CLASSIFIER_THRESHOLDS,
  type Classification,
  type ClassifierThresholds,
  type TestResult,
} from '@flakelens/shared';

import { isFailure } from './flakiness.js';
import {
  ROOT_CAUSE_RULES,
  type ClassifierInput,
  type RootCauseRule,
  type RunFailureIndex,
} from './root-cause-rules.js';

/**
 * Failing test ids for every run, used for co-failure analysis
 */
export function buildRunFailureIndex(results: readonly TestResult[]): RunFailureIndex {
  const index = new Map<string, Set<string>>();
  for (const result of results) {
    if (!isFailure(result)) continue;
    const failed = index.get(result.runId);
    if (failed) {
      failed.add(result.testId);
    } else {
      index.set(result.runId, new Set([result.testId]));
    }
  }
  return index;
}

/**
 * Priority-ordered rule chain. Rules are pure functions of the input group,
 * so the same stored history always yields the same label.
 */
export class RootCauseClassifier {
  private readonly thresholds: ClassifierThresholds;

  constructor(
    thresholds: Partial<ClassifierThresholds> = {},
    private readonly rules: readonly RootCauseRule[] = ROOT_CAUSE_RULES
  ) {
    this.thresholds = { ...DEFAULT_CLASSIFIER_THRESHOLDS, ...thresholds };
  }

  public classify(input: ClassifierInput): Classification {
    for (const rule of this.rules) {
      const evidence = rule.match(input, this.thresholds);
      if (evidence !== null) {
        return { category: rule.category, evidence };
      }
    }

    return { category: 'timing', evidence: 'no other rule matched' };
  }
}
