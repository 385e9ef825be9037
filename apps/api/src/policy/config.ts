/**
 * Policy-as-code for FlakeLens
 *
 * Loads .flakelens.yml, validates it with a Zod schema and layers it with
 * environment defaults and per-call overrides into the engine options.
 */

import { readFile } from 'fs/promises';

import {
  DEFAULT_CLASSIFIER_THRESHOLDS,
  DEFAULT_COST_MODEL,
  DEFAULT_DETECTION_POLICY,
  DEFAULT_QUARANTINE_POLICY,
  POLICY_FILE_NAME,
  ValidationError,
  toValidationIssues,
  type ClassifierThresholds,
  type EngineOptions,
} from '@flakelens/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { logger } from '../utils/logger.js';

export const policyConfigSchema = z.object({
  // Detection
  min_runs: z.number().int().min(1).optional(),

  // Quarantine thresholds
  min_flip_rate: z.number().min(0).max(1).optional(),
  min_cost_usd: z.number().min(0).optional(),
  exempted_tests: z.array(z.string().min(1)).optional(),

  // Cost model
  cost_per_run_usd: z.number().min(0).optional(),
  rerun_multiplier: z.number().min(0).optional(),

  // Classifier tuning
  classifier: z.object({
    float_epsilon: z.number().positive().optional(),
    leak_min_samples: z.number().int().min(2).optional(),
    race_duration_tolerance: z.number().min(0).max(1).optional(),
    timing_spread_factor: z.number().min(1).optional(),
    co_failure_ratio: z.number().min(0).max(1).optional(),
  }).strict().optional(),
}).strict();

export type PolicyConfig = z.infer<typeof policyConfigSchema>;

/**
 * One layer of engine settings; unset fields fall through to the next layer
 */
export interface EngineOverrides {
  readonly minSampleSize?: number;
  readonly costPerRunUsd?: number;
  readonly rerunMultiplier?: number;
  readonly minFlipRate?: number;
  readonly minCostUsd?: number;
  readonly exemptTests?: readonly string[];
  readonly classifier?: Partial<ClassifierThresholds>;
}

export function policyToOverrides(policy: PolicyConfig): EngineOverrides {
  return {
    minSampleSize: policy.min_runs,
    costPerRunUsd: policy.cost_per_run_usd,
    rerunMultiplier: policy.rerun_multiplier,
    minFlipRate: policy.min_flip_rate,
    minCostUsd: policy.min_cost_usd,
    exemptTests: policy.exempted_tests,
    classifier: policy.classifier && {
      floatEpsilon: policy.classifier.float_epsilon,
      leakMinSamples: policy.classifier.leak_min_samples,
      raceDurationTolerance: policy.classifier.race_duration_tolerance,
      timingSpreadFactor: policy.classifier.timing_spread_factor,
      coFailureRatio: policy.classifier.co_failure_ratio,
    },
  };
}

function firstDefined<T>(values: readonly (T | undefined)[]): T | undefined {
  return values.find((value): value is T => value !== undefined);
}

/**
 * Resolve engine options from layers ordered by precedence, highest first.
 * Defaults apply where no layer sets a value.
 */
export function resolveEngineOptions(layers: readonly EngineOverrides[]): EngineOptions {
  const pick = <T>(get: (layer: EngineOverrides) => T | undefined): T | undefined =>
    firstDefined(layers.map(get));

  return {
    detection: {
      minSampleSize: pick(l => l.minSampleSize) ?? DEFAULT_DETECTION_POLICY.minSampleSize,
    },
    cost: {
      costPerRunUsd: pick(l => l.costPerRunUsd) ?? DEFAULT_COST_MODEL.costPerRunUsd,
      rerunMultiplier: pick(l => l.rerunMultiplier) ?? DEFAULT_COST_MODEL.rerunMultiplier,
    },
    classifier: {
      floatEpsilon: pick(l => l.classifier?.floatEpsilon) ?? DEFAULT_CLASSIFIER_THRESHOLDS.floatEpsilon,
      leakMinSamples: pick(l => l.classifier?.leakMinSamples) ?? DEFAULT_CLASSIFIER_THRESHOLDS.leakMinSamples,
      raceDurationTolerance: pick(l => l.classifier?.raceDurationTolerance) ?? DEFAULT_CLASSIFIER_THRESHOLDS.raceDurationTolerance,
      timingSpreadFactor: pick(l => l.classifier?.timingSpreadFactor) ?? DEFAULT_CLASSIFIER_THRESHOLDS.timingSpreadFactor,
      coFailureRatio: pick(l => l.classifier?.coFailureRatio) ?? DEFAULT_CLASSIFIER_THRESHOLDS.coFailureRatio,
    },
    quarantine: {
      minFlipRate: pick(l => l.minFlipRate),
      minCostUsd: pick(l => l.minCostUsd),
      exemptTests: pick(l => l.exemptTests) ?? DEFAULT_QUARANTINE_POLICY.exemptTests,
    },
  };
}

export function parsePolicy(content: string, source: string = POLICY_FILE_NAME): PolicyConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ValidationError(
      `Policy file ${source} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file means "use the defaults"
  const parsed = policyConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Policy file ${source} is invalid`,
      toValidationIssues(parsed.error.issues)
    );
  }
  return parsed.data;
}

/**
 * Read a policy file; a missing file yields null
 */
export async function loadPolicyFile(path: string): Promise<PolicyConfig | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug({ path }, 'No policy file found, using defaults');
      return null;
    }
    throw error;
  }

  const policy = parsePolicy(content, path);
  logger.info({
    path,
    minRuns: policy.min_runs,
    minFlipRate: policy.min_flip_rate,
    exemptions: policy.exempted_tests?.length ?? 0,
  }, 'Loaded policy configuration');
  return policy;
}
