import type { TestResult } from '@flakelens/shared';
import { describe, it, expect } from 'vitest';

import { makeResult, runIdAt, sequence } from '../../__tests__/helpers/results.js';
import { FlipRateAnalyzer } from '../flakiness.js';
import { RootCauseClassifier, buildRunFailureIndex } from '../root-cause.js';
import { findNearEqualFloats, median, type ClassifierInput } from '../root-cause-rules.js';

const analyzer = new FlipRateAnalyzer({ minSampleSize: 1 });

function inputFor(results: readonly TestResult[], others: readonly TestResult[] = []): ClassifierInput {
  const testId = results[0]?.testId ?? 't';
  return {
    statistics: analyzer.computeStatistics(testId, results),
    observations: analyzer.observations(results),
    runFailures: buildRunFailureIndex([...results, ...others]),
  };
}

/** Alternating pass/fail with the same message on every failure */
function failingWith(message: string): TestResult[] {
  return sequence('suite.test_case', ['pass', 'fail', 'pass'], index =>
    index === 1 ? { errorMessage: message } : {}
  );
}

/** Silent alternating failures that run slower than passes, but not by much */
function silentSlowFailures(customize: (index: number) => Partial<TestResult> = () => ({})): TestResult[] {
  return sequence('suite.test_case', ['pass', 'fail', 'pass', 'fail'], index => ({
    durationSeconds: index % 2 === 1 ? 1.5 : 1,
    ...customize(index),
  }));
}

describe('RootCauseClassifier', () => {
  const classifier = new RootCauseClassifier();

  it('should classify time zone messages as timezone', () => {
    expect(classifier.classify(inputFor(failingWith('AssertionError: datetime mismatch across DST boundary')))).toEqual({
      category: 'timezone',
      evidence: 'failure text references time zones or datetimes: "DST"',
    });
  });

  it('should prefer timezone over timing when both appear', () => {
    const result = classifier.classify(inputFor(failingWith('timeout comparing UTC timestamps')));

    expect(result.category).toBe('timezone');
    expect(result.evidence).toBe('failure text references time zones or datetimes: "UTC"');
  });

  it('should classify near-equal float comparisons as float_precision', () => {
    expect(classifier.classify(inputFor(failingWith('AssertionError: 3.0000001 != 3.0')))).toEqual({
      category: 'float_precision',
      evidence: 'near-equal floats 3.0000001 and 3.0 differ by 1.0e-7',
    });
  });

  it('should respect a tighter float epsilon', () => {
    const strict = new RootCauseClassifier({ floatEpsilon: 1e-9 });
    const result = strict.classify(inputFor(failingWith('AssertionError: 3.0000001 != 3.0')));

    expect(result.category).toBe('timing');
    expect(result.evidence).toBe('no other rule matched');
  });

  it('should classify exhaustion messages as resource_leak', () => {
    expect(classifier.classify(inputFor(failingWith('OSError: [Errno 24] Too many open files')))).toEqual({
      category: 'resource_leak',
      evidence: 'failure text references resource exhaustion: "Too many open files"',
    });
  });

  it('should classify steadily growing failure durations as resource_leak', () => {
    const results = sequence('suite.test_case', ['pass', 'fail', 'pass', 'fail', 'pass', 'fail'], index => ({
      durationSeconds: [1, 1, 1, 2, 1, 3][index] ?? 1,
    }));

    expect(classifier.classify(inputFor(results))).toEqual({
      category: 'resource_leak',
      evidence: 'failing durations grow monotonically across 3 failures (1.00s to 3.00s)',
    });
  });

  it('should classify concurrency messages as race_condition', () => {
    expect(classifier.classify(inputFor(failingWith('RuntimeError: deadlock detected')))).toEqual({
      category: 'race_condition',
      evidence: 'failure text references concurrency: "deadlock"',
    });
  });

  it('should read thread safety wording as concurrency', () => {
    expect(classifier.classify(inputFor(failingWith('RuntimeError: counter is not thread-safe')))).toEqual({
      category: 'race_condition',
      evidence: 'failure text references concurrency: "thread-safe"',
    });
  });

  it('should not read the JVM uncaught exception prefix as concurrency', () => {
    const message = 'Exception in thread "main" java.lang.AssertionError: expected 200 but was 500';

    expect(classifier.classify(inputFor(failingWith(message)))).toEqual({
      category: 'timing',
      evidence: 'no other rule matched',
    });
  });

  it('should classify silent failures with unchanged durations as race_condition', () => {
    const results = sequence('suite.test_case', ['pass', 'fail', 'pass', 'fail']);

    expect(classifier.classify(inputFor(results))).toEqual({
      category: 'race_condition',
      evidence: 'silent intermittent failures with pass/fail mean durations within 10% (1.00s vs 1.00s)',
    });
  });

  it('should classify leftover-state messages as shared_state', () => {
    const result = classifier.classify(
      inputFor(failingWith('IntegrityError: duplicate key value violates unique constraint'))
    );

    expect(result).toEqual({
      category: 'shared_state',
      evidence: 'failure text references leftover state: "duplicate key"',
    });
  });

  it('should classify failures that coincide with other failures as shared_state', () => {
    const others = [
      makeResult({ testId: 'suite.other', status: 'fail', runId: runIdAt(1) }),
      makeResult({ testId: 'suite.other', status: 'fail', runId: runIdAt(3) }),
    ];

    expect(classifier.classify(inputFor(silentSlowFailures(), others))).toEqual({
      category: 'shared_state',
      evidence: 'other tests failed in the same run for 2 of 2 failures',
    });
  });

  it('should classify setup messages as ordering', () => {
    expect(classifier.classify(inputFor(failingWith("Error: fixture 'db_session' not found")))).toEqual({
      category: 'ordering',
      evidence: 'failure text references setup or execution order: "fixture"',
    });
  });

  it('should classify position-separated failures as ordering', () => {
    const results = silentSlowFailures(index => ({ position: index % 2 === 1 ? 5 : 0 }));

    expect(classifier.classify(inputFor(results))).toEqual({
      category: 'ordering',
      evidence: 'fails only at run positions 5-5, passes at 0-0',
    });
  });

  it('should classify timeout messages as timing', () => {
    expect(classifier.classify(inputFor(failingWith('timeout waiting for response')))).toEqual({
      category: 'timing',
      evidence: 'failure text references timing: "timeout"',
    });
  });

  it('should classify slow outlier failures as timing', () => {
    const results = sequence('suite.test_case', ['pass', 'pass', 'pass', 'fail', 'pass'], index => ({
      durationSeconds: index === 3 ? 10 : 1,
    }));

    expect(classifier.classify(inputFor(results))).toEqual({
      category: 'timing',
      evidence: 'failing duration 10.00s exceeds 3x the median 1.00s',
    });
  });

  it('should fall back to timing when nothing else matches', () => {
    expect(classifier.classify(inputFor(silentSlowFailures()))).toEqual({
      category: 'timing',
      evidence: 'no other rule matched',
    });
  });

  it('should fall back to timing with an empty rule list', () => {
    const bare = new RootCauseClassifier({}, []);
    expect(bare.classify(inputFor(failingWith('Too many open files'))).category).toBe('timing');
  });
});

describe('buildRunFailureIndex', () => {
  it('should index failing and erroring tests by run', () => {
    const index = buildRunFailureIndex([
      makeResult({ testId: 'a', status: 'fail', runId: 'r1' }),
      makeResult({ testId: 'b', status: 'error', runId: 'r1' }),
      makeResult({ testId: 'c', status: 'pass', runId: 'r1' }),
      makeResult({ testId: 'a', status: 'skipped', runId: 'r2' }),
    ]);

    expect([...(index.get('r1') ?? [])]).toEqual(['a', 'b']);
    expect(index.has('r2')).toBe(false);
  });
});

describe('findNearEqualFloats', () => {
  it('should find two close decimals in a comparison', () => {
    expect(findNearEqualFloats('expected 0.1 to equal 0.1000001', 1e-6)).toMatchObject({
      left: '0.1',
      right: '0.1000001',
    });
  });

  it('should ignore integer-only comparisons', () => {
    expect(findNearEqualFloats('expected 3 == 4', 1e-6)).toBeNull();
  });

  it('should ignore messages without a comparison', () => {
    expect(findNearEqualFloats('value 0.1 drifted to 0.1000001', 1e-6)).toBeNull();
  });
});

describe('median', () => {
  it('should handle odd, even and empty inputs', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });
});
