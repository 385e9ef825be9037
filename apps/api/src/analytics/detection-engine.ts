import type {
  ClassifierThresholds,
  CostModel,
  DetectionPolicy,
  RunRecord,
  TestResult,
  TestStatistics,
} from '@flakelens/shared';

import { CostAttributor } from './cost.js';
import { FlipRateAnalyzer, groupByTest } from './flakiness.js';
import { RootCauseClassifier, buildRunFailureIndex } from './root-cause.js';

export interface DetectionOptions {
  readonly detection?: Partial<DetectionPolicy>;
  readonly cost?: Partial<CostModel>;
  readonly classifier?: Partial<ClassifierThresholds>;
}

/**
 * Read-only view of the store a detection pass works on
 */
export interface DetectionSnapshot {
  readonly results: readonly TestResult[];
  readonly runs: readonly RunRecord[];
}

/**
 * Report order: most expensive first, then test id ascending
 */
export function compareByCost(a: TestStatistics, b: TestStatistics): number {
  if (a.estimatedCostUsd !== b.estimatedCostUsd) {
    return b.estimatedCostUsd - a.estimatedCostUsd;
  }
  return a.testId < b.testId ? -1 : a.testId > b.testId ? 1 : 0;
}

/**
 * Runs the analyzer, classifier and cost attributor over one snapshot.
 * Statistics are rebuilt on every call and never cached, so rule or rate
 * changes apply to the whole history immediately.
 */
export class FlakeDetectionEngine {
  private readonly analyzer: FlipRateAnalyzer;
  private readonly classifier: RootCauseClassifier;
  private readonly costAttributor: CostAttributor;

  constructor(options: DetectionOptions = {}) {
    this.analyzer = new FlipRateAnalyzer(options.detection);
    this.classifier = new RootCauseClassifier(options.classifier);
    this.costAttributor = new CostAttributor(options.cost);
  }

  public detect(snapshot: DetectionSnapshot): TestStatistics[] {
    const runFailures = buildRunFailureIndex(snapshot.results);
    const runs = new Map(snapshot.runs.map(run => [run.runId, run]));

    const statistics: TestStatistics[] = [];
    for (const [testId, group] of groupByTest(snapshot.results)) {
      const flips = this.analyzer.computeStatistics(testId, group);
      const observations = this.analyzer.observations(group);

      const classification = flips.isFlaky
        ? this.classifier.classify({ statistics: flips, observations, runFailures })
        : null;

      statistics.push(Object.freeze({
        ...flips,
        classification: classification?.category ?? null,
        classificationEvidence: classification?.evidence ?? null,
        estimatedCostUsd: this.costAttributor.attribute(observations, runs),
      }));
    }

    return statistics.sort(compareByCost);
  }
}
