/**
 * Analytics module exports
 * Flip-rate analysis, root-cause classification, cost attribution and trends
 */

export {
  FlipRateAnalyzer,
  compareChronologically,
  groupByTest,
  isFailure,
  toOutcome,
  type Outcome,
} from './flakiness.js';

export { RootCauseClassifier, buildRunFailureIndex } from './root-cause.js';

export {
  ROOT_CAUSE_RULES,
  type ClassifierInput,
  type RootCauseRule,
  type RunFailureIndex,
} from './root-cause-rules.js';

export { CostAttributor } from './cost.js';

export { TrendAnalyzer, compareBySlope, leastSquaresSlope } from './trends.js';

export {
  FlakeDetectionEngine,
  compareByCost,
  type DetectionOptions,
  type DetectionSnapshot,
} from './detection-engine.js';
