/**
 * Analytics types for flip-rate analysis, root-cause classification,
 * cost attribution, failure trends and the quarantine policy
 */

export type TestStatus = 'pass' | 'fail' | 'error' | 'skipped';

/**
 * One observation of one test in one CI run
 */
export interface TestResult {
  readonly testId: string;
  readonly runId: string;
  readonly status: TestStatus;
  readonly durationSeconds: number;
  readonly errorMessage?: string;
  readonly timestamp: Date;
  /** Zero-based execution index inside the run, when the report format carries it */
  readonly position?: number;
}

export interface RunRecord {
  readonly runId: string;
  readonly ingestedAt: Date;
  readonly costPerRunUsd?: number;
  readonly source?: string;
  readonly resultCount: number;
}

export const ROOT_CAUSES = [
  'timing',
  'ordering',
  'shared_state',
  'race_condition',
  'resource_leak',
  'timezone',
  'float_precision',
] as const;

export type RootCause = typeof ROOT_CAUSES[number];

/**
 * Why a test was or was not reported as flaky
 */
export type FlakinessVerdict = 'flaky' | 'insufficient_data' | 'stable' | 'broken';

export interface Classification {
  readonly category: RootCause;
  readonly evidence: string;
}

/**
 * Flip statistics before classification and costing
 */
export interface FlipStatistics {
  readonly testId: string;
  readonly totalRuns: number;
  readonly passCount: number;
  readonly failCount: number;
  readonly skippedCount: number;
  readonly flipCount: number;
  readonly flipRate: number;
  readonly isFlaky: boolean;
  readonly verdict: FlakinessVerdict;
  readonly firstSeen: Date;
  readonly lastSeen: Date;
  readonly meanDurationSeconds: number;
}

export interface TestStatistics extends FlipStatistics {
  readonly classification: RootCause | null;
  readonly classificationEvidence: string | null;
  readonly estimatedCostUsd: number;
}

export interface DetectionPolicy {
  readonly minSampleSize: number;
}

export interface CostModel {
  readonly costPerRunUsd: number;
  readonly rerunMultiplier: number;
}

export interface ClassifierThresholds {
  /** Largest absolute difference between two compared floats still treated as a precision miss */
  readonly floatEpsilon: number;
  /** Failing observations needed before monotonic duration growth counts as a leak */
  readonly leakMinSamples: number;
  /** Relative pass/fail mean-duration delta below which a silent failure is treated as a race */
  readonly raceDurationTolerance: number;
  /** Failing duration spread, as a multiple of the median duration, that marks a timing problem */
  readonly timingSpreadFactor: number;
  /** Share of a test's failing runs in which other tests also failed */
  readonly coFailureRatio: number;
}

export interface QuarantinePolicy {
  readonly minFlipRate?: number;
  readonly minCostUsd?: number;
  readonly exemptTests: readonly string[];
}

export interface EngineOptions {
  readonly detection: DetectionPolicy;
  readonly cost: CostModel;
  readonly classifier: ClassifierThresholds;
  readonly quarantine: QuarantinePolicy;
}

export interface EngineStats {
  readonly totalTests: number;
  readonly totalRuns: number;
  readonly totalResults: number;
  readonly flakyCount: number;
  readonly insufficientDataCount: number;
  readonly totalEstimatedCostUsd: number;
}

export type TrendDirection = 'improving' | 'worsening' | 'stable';

/**
 * Direction of a test's failures over a recent window of runs
 */
export interface TestTrend {
  readonly testId: string;
  readonly totalRuns: number;
  readonly failRate: number;
  /** Least-squares slope of the failure indicator (1 fail, 0 pass) per run, oldest first */
  readonly slope: number;
  readonly trend: TrendDirection;
}

export interface TrendOptions {
  readonly windowDays: number;
  readonly minSampleSize: number;
  /** Slopes within plus or minus this value count as stable */
  readonly slopeThreshold: number;
}
