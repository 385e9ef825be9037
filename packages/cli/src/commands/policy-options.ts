import type { EngineOverrides } from '@flakelens/api';
import { ValidationError } from '@flakelens/shared';
import { InvalidArgumentError, type Command } from 'commander';

export interface PolicyOptions {
  minRuns?: number;
  minFlipRate?: number;
  minCost?: number;
  costPerRun?: number;
  ciCost?: number;
  rerunMin?: number;
  rerunMultiplier?: number;
  exempt?: string[];
}

export function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseNonNegative(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseRate(value: string): number {
  const parsed = parseNonNegative(value);
  if (parsed > 1) {
    throw new InvalidArgumentError('Expected a rate between 0 and 1.');
  }
  return parsed;
}

/**
 * Engine overrides shared by detect, quarantine and stats
 */
export function addPolicyOptions(command: Command): Command {
  return command
    .option('--min-runs <n>', 'observations required before a verdict', parsePositiveInteger)
    .option('--min-flip-rate <rate>', 'quarantine only tests flipping at least this often (0-1)', parseRate)
    .option('--min-cost <usd>', 'quarantine only tests wasting at least this much', parseNonNegative)
    .option('--cost-per-run <usd>', 'cost of one CI rerun', parseNonNegative)
    .option('--ci-cost <usd>', 'CI cost per minute, used with --rerun-min', parseNonNegative)
    .option('--rerun-min <minutes>', 'minutes one rerun takes, used with --ci-cost', parseNonNegative)
    .option('--rerun-multiplier <n>', 'reruns triggered by one flip', parseNonNegative)
    .option('--exempt <pattern...>', 'test ids or globs never to quarantine');
}

/**
 * --cost-per-run wins over the --ci-cost x --rerun-min product
 */
export function policyFromOptions(options: PolicyOptions): EngineOverrides {
  const hasCiCost = options.ciCost !== undefined;
  const hasRerunMinutes = options.rerunMin !== undefined;
  if (hasCiCost !== hasRerunMinutes) {
    throw new ValidationError('--ci-cost and --rerun-min must be given together');
  }

  const derivedCost = options.ciCost !== undefined && options.rerunMin !== undefined
    ? options.ciCost * options.rerunMin
    : undefined;

  return {
    minSampleSize: options.minRuns,
    minFlipRate: options.minFlipRate,
    minCostUsd: options.minCost,
    costPerRunUsd: options.costPerRun ?? derivedCost,
    rerunMultiplier: options.rerunMultiplier,
    exemptTests: options.exempt,
  };
}
