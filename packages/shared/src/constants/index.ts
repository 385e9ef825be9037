import type {
  ClassifierThresholds,
  CostModel,
  DetectionPolicy,
  QuarantinePolicy,
  TrendOptions,
} from '../types/analytics.js';

export const FLAKELENS_VERSION = '0.1.0';

export const API_ROUTES = {
  HEALTH: '/health',
  RUNS: '/v1/runs',
  TESTS: '/v1/tests',
  QUARANTINE: '/v1/quarantine',
  STATS: '/v1/stats',
  TRENDS: '/v1/trends',
} as const;

export const DEFAULT_DETECTION_POLICY: DetectionPolicy = {
  minSampleSize: 3,
};

// 10 re-run minutes at $0.008 per CI minute
export const DEFAULT_COST_MODEL: CostModel = {
  costPerRunUsd: 0.08,
  rerunMultiplier: 1.0,
};

export const DEFAULT_CLASSIFIER_THRESHOLDS: ClassifierThresholds = {
  floatEpsilon: 1e-6,
  leakMinSamples: 3,
  raceDurationTolerance: 0.1,
  timingSpreadFactor: 3,
  coFailureRatio: 0.5,
};

export const DEFAULT_QUARANTINE_POLICY: QuarantinePolicy = {
  exemptTests: [],
};

export const DEFAULT_TREND_OPTIONS: TrendOptions = {
  windowDays: 30,
  minSampleSize: DEFAULT_DETECTION_POLICY.minSampleSize,
  slopeThreshold: 0.01,
};

export const INGESTION_SETTINGS = {
  REPORT_EXTENSION: '.xml',
  MAX_ERROR_MESSAGE_LENGTH: 4000,
  RUN_ID_PREFIX: 'r-',
} as const;

export const POLICY_FILE_NAME = '.flakelens.yml';
