/**
 * Root-cause rules, evaluated in order. The first rule that returns
 * evidence decides the category; `timing` always matches.
 */

import type {
  ClassifierThresholds,
  FlipStatistics,
  RootCause,
  TestResult,
} from '@flakelens/shared';

import { isFailure } from './flakiness.js';

/**
 * Failing test ids per run id
 */
export type RunFailureIndex = ReadonlyMap<string, ReadonlySet<string>>;

export interface ClassifierInput {
  readonly statistics: FlipStatistics;
  /** Chronologically sorted, non-skipped observations */
  readonly observations: readonly TestResult[];
  readonly runFailures: RunFailureIndex;
}

export interface RootCauseRule {
  readonly category: RootCause;
  /** Returns the evidence that fired, or null when the rule does not apply */
  readonly match: (input: ClassifierInput, thresholds: ClassifierThresholds) => string | null;
}

// Durations below this are treated as 1ms so ratios stay finite
const MIN_DURATION_SECONDS = 0.001;

const TIMEZONE_PATTERNS = [
  /\b(?:utc|gmt)\s*[+-]\s*\d{1,2}(?::?\d{2})?/i,
  /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s?[+-]\d{2}:?\d{2}\b/,
  /\b(?:utc|gmt)\b/i,
  /\btime[\s_-]?zones?\b|\btz(?:info|data)?\b/i,
  /\bdaylight[\s_-]sav(?:ing|ings)\b|\bdst\b/i,
  /\bdatetime\b|\boffset-(?:naive|aware)\b/i,
];

const PRECISION_PATTERN =
  /\bprecision\b|\brounding\b|\bround-?off\b|\balmost[\s_]?equal\b|\bnot close\b|\bfloating[\s-]point\b|\bdecimal places\b|\btobecloseto\b|\bisclose\b/i;

const COMPARISON_PATTERN = /!==?|==|≠|<>|\bexpected\b|\bequal|\bto be\b|\bassert/i;

const NUMBER_PATTERN = /-?\d*\.?\d+(?:e[+-]?\d+)?/gi;

const RESOURCE_PATTERN =
  /too many open files|\bE[MN]FILE\b|\bfile (?:descriptor|handle)s?\b|out of memory|\bOOM\b|heap (?:out of memory|limit)|\bmemory (?:leak|exhausted|limit)|\b(?:connection )?pool (?:is )?exhausted|too many (?:connections|clients)|\bmax(?:imum)? (?:number of )?connections\b|\bResourceWarning\b|\bunclosed (?:file|socket|connection)|resource temporarily unavailable/i;

// Bare "thread" is left out: JVM failures all start with `Exception in thread "main"`
const CONCURRENCY_PATTERN =
  /\brace(?: condition)?\b|\bdata race\b|\bdeadlock|\bthread[\s-](?:safe(?:ty)?|pool|local|starvation)\b|\b(?:multiple|concurrent|other|worker) threads?\b|\bmutex|\block(?:s|ed|ing)?\b|\bsemaphore|\bconcurren|\basync(?:io)? tasks?\b|\bgoroutines?\b|\binterleav|\batomic/i;

const SHARED_STATE_PATTERN =
  /already exists|duplicate key|unique constraint|\bdirty\b|\bstale\b|\bleak(?:ed)? state\b|\bpolluted\b|\bglobal state\b|not (?:been )?(?:reset|cleaned)|\bleft ?over\b/i;

const ORDERING_PATTERN =
  /\bset[\s-]?up\b|\btear[\s-]?down\b|\bfixture|\b(?:before|after)(?:all|each)?\s?hook\b|\bdepends on\b|\bdependency\b|\bnot (?:yet )?initiali[sz]ed\b|\b(?:test|run|execution) order\b|\border[\s-]dependent\b|\bmust run (?:before|after)\b/i;

const TIMING_PATTERN =
  /\btimed?[\s-]?out\b|\btimeout|\bdeadline\b|\bexceeded\b|\bsleep|\bwait(?:ing|ed)?\b|\btook too long\b|\bslow\b|\belapsed\b/i;

function failingObservations(input: ClassifierInput): TestResult[] {
  return input.observations.filter(isFailure);
}

function passingObservations(input: ClassifierInput): TestResult[] {
  return input.observations.filter(result => !isFailure(result));
}

function failureMessages(input: ClassifierInput): string[] {
  return failingObservations(input)
    .map(result => result.errorMessage?.trim() ?? '')
    .filter(message => message.length > 0);
}

/**
 * First match of any pattern in any failure message
 */
function findInMessages(messages: readonly string[], patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    for (const message of messages) {
      const match = pattern.exec(message);
      if (match) {
        return match[0];
      }
    }
  }
  return null;
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return ((sorted[middle - 1] ?? upper) + upper) / 2;
}

function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

/**
 * Two distinct numbers in a comparison message that are closer than epsilon
 */
export function findNearEqualFloats(
  message: string,
  epsilon: number
): { readonly left: string; readonly right: string; readonly difference: number } | null {
  if (!COMPARISON_PATTERN.test(message)) {
    return null;
  }

  const tokens = message.match(NUMBER_PATTERN) ?? [];
  for (let i = 0; i < tokens.length; i++) {
    for (let j = i + 1; j < tokens.length; j++) {
      const left = tokens[i];
      const right = tokens[j];
      if (left === undefined || right === undefined) continue;
      if (!/[.e]/i.test(left) && !/[.e]/i.test(right)) continue;

      const difference = Math.abs(Number(left) - Number(right));
      if (Number.isFinite(difference) && difference > 0 && difference <= epsilon) {
        return { left, right, difference };
      }
    }
  }
  return null;
}

/**
 * Failing durations spread well beyond the test's usual runtime
 */
export function durationSpreadEvidence(
  input: ClassifierInput,
  thresholds: ClassifierThresholds
): string | null {
  const failing = failingObservations(input).map(result => result.durationSeconds);
  if (failing.length === 0) {
    return null;
  }

  const typical = Math.max(median(input.observations.map(result => result.durationSeconds)), MIN_DURATION_SECONDS);
  const slowest = Math.max(...failing);
  if (slowest > thresholds.timingSpreadFactor * typical) {
    return `failing duration ${seconds(slowest)} exceeds ${thresholds.timingSpreadFactor}x the median ${seconds(typical)}`;
  }
  return null;
}

function timingTextEvidence(input: ClassifierInput): string | null {
  const match = findInMessages(failureMessages(input), [TIMING_PATTERN]);
  return match ? `failure text references timing: "${match}"` : null;
}

export const timezoneRule: RootCauseRule = {
  category: 'timezone',
  match: input => {
    const match = findInMessages(failureMessages(input), TIMEZONE_PATTERNS);
    return match ? `failure text references time zones or datetimes: "${match}"` : null;
  },
};

export const floatPrecisionRule: RootCauseRule = {
  category: 'float_precision',
  match: (input, thresholds) => {
    const messages = failureMessages(input);
    for (const message of messages) {
      const pair = findNearEqualFloats(message, thresholds.floatEpsilon);
      if (pair) {
        return `near-equal floats ${pair.left} and ${pair.right} differ by ${pair.difference.toExponential(1)}`;
      }
    }
    const phrase = findInMessages(messages, [PRECISION_PATTERN]);
    return phrase ? `failure text references numeric precision: "${phrase}"` : null;
  },
};

export const resourceLeakRule: RootCauseRule = {
  category: 'resource_leak',
  match: (input, thresholds) => {
    const phrase = findInMessages(failureMessages(input), [RESOURCE_PATTERN]);
    if (phrase) {
      return `failure text references resource exhaustion: "${phrase}"`;
    }

    const durations = failingObservations(input).map(result => result.durationSeconds);
    if (durations.length < thresholds.leakMinSamples) {
      return null;
    }
    const growing = durations.every((duration, index) => {
      const previous = durations[index - 1];
      return previous === undefined || duration > previous;
    });
    if (!growing) {
      return null;
    }
    const first = durations[0] ?? 0;
    const last = durations[durations.length - 1] ?? 0;
    return `failing durations grow monotonically across ${durations.length} failures (${seconds(first)} to ${seconds(last)})`;
  },
};

export const raceConditionRule: RootCauseRule = {
  category: 'race_condition',
  match: (input, thresholds) => {
    const messages = failureMessages(input);
    const phrase = findInMessages(messages, [CONCURRENCY_PATTERN]);
    if (phrase) {
      return `failure text references concurrency: "${phrase}"`;
    }
    if (messages.length > 0) {
      return null;
    }

    const failing = failingObservations(input);
    const passing = passingObservations(input);
    if (failing.length === 0 || passing.length === 0) {
      return null;
    }

    const failMean = mean(failing.map(result => result.durationSeconds));
    const passMean = mean(passing.map(result => result.durationSeconds));
    const delta = Math.abs(failMean - passMean);
    if (delta <= thresholds.raceDurationTolerance * Math.max(failMean, passMean)) {
      return `silent intermittent failures with pass/fail mean durations within ${Math.round(thresholds.raceDurationTolerance * 100)}% (${seconds(passMean)} vs ${seconds(failMean)})`;
    }
    return null;
  },
};

export const sharedStateRule: RootCauseRule = {
  category: 'shared_state',
  match: (input, thresholds) => {
    const phrase = findInMessages(failureMessages(input), [SHARED_STATE_PATTERN]);
    if (phrase) {
      return `failure text references leftover state: "${phrase}"`;
    }

    if (timingTextEvidence(input) || durationSpreadEvidence(input, thresholds)) {
      return null;
    }

    const failing = failingObservations(input);
    if (failing.length === 0) {
      return null;
    }

    const testId = input.statistics.testId;
    const together = failing.filter(result => {
      const failedInRun = input.runFailures.get(result.runId);
      if (!failedInRun) return false;
      return [...failedInRun].some(other => other !== testId);
    }).length;

    const ratio = together / failing.length;
    if (together > 0 && ratio >= thresholds.coFailureRatio) {
      return `other tests failed in the same run for ${together} of ${failing.length} failures`;
    }
    return null;
  },
};

export const orderingRule: RootCauseRule = {
  category: 'ordering',
  match: input => {
    const phrase = findInMessages(failureMessages(input), [ORDERING_PATTERN]);
    if (phrase) {
      return `failure text references setup or execution order: "${phrase}"`;
    }

    const failing = failingObservations(input);
    const passing = passingObservations(input);
    if (failing.length === 0 || passing.length === 0) {
      return null;
    }

    const failPositions = failing.map(result => result.position);
    const passPositions = passing.map(result => result.position);
    if ([...failPositions, ...passPositions].some(position => position === undefined)) {
      return null;
    }

    const failed = failPositions.filter((position): position is number => position !== undefined);
    const passed = passPositions.filter((position): position is number => position !== undefined);
    const failMin = Math.min(...failed);
    const failMax = Math.max(...failed);
    const passMin = Math.min(...passed);
    const passMax = Math.max(...passed);

    if (failMax < passMin || failMin > passMax) {
      return `fails only at run positions ${failMin}-${failMax}, passes at ${passMin}-${passMax}`;
    }
    return null;
  },
};

export const timingRule: RootCauseRule = {
  category: 'timing',
  match: (input, thresholds) =>
    timingTextEvidence(input) ??
    durationSpreadEvidence(input, thresholds) ??
    'no other rule matched',
};

export const ROOT_CAUSE_RULES: readonly RootCauseRule[] = [
  timezoneRule,
  floatPrecisionRule,
  resourceLeakRule,
  raceConditionRule,
  sharedStateRule,
  orderingRule,
  timingRule,
];
