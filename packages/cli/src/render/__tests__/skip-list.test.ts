import { describe, it, expect } from 'vitest';

import { isSkipListFormat, renderSkipList, type QuarantineEntry } from '../skip-list.js';

const entries: QuarantineEntry[] = [
  { testId: 'tests.test_math.test_divide', flipRate: 0.5, classification: 'float_precision', estimatedCostUsd: 0.4 },
  { testId: 'tests.test_"quoted"', flipRate: 1 / 3, classification: null, estimatedCostUsd: 0.08 },
];

describe('renderSkipList', () => {
  it('should render a pytest conftest with the quarantined set', () => {
    const conftest = renderSkipList('pytest', entries);

    expect(conftest.startsWith([
      '# Generated by flakelens quarantine. Do not edit by hand.',
      'import pytest',
      '',
      'QUARANTINED = {',
      '    "tests.test_math.test_divide",  # flip 50%, float_precision',
      '    "tests.test_\\"quoted\\"",  # flip 33%',
      '}',
      '',
    ].join('\n'))).toBe(true);
    expect(conftest).toContain('def pytest_collection_modifyitems(config, items):\n');
    expect(conftest).toContain('item.add_marker(pytest.mark.skip(reason="quarantined by flakelens"))\n');
  });

  it('should render an empty set literal when nothing is quarantined', () => {
    expect(renderSkipList('pytest', [])).toContain('\nQUARANTINED = set()\n');
  });

  it('should render one test id per line', () => {
    expect(renderSkipList('list', entries)).toBe('tests.test_math.test_divide\ntests.test_"quoted"\n');
    expect(renderSkipList('list', [])).toBe('');
  });

  it('should render JSON with a total', () => {
    const parsed: unknown = JSON.parse(renderSkipList('json', entries.slice(0, 1)));

    expect(parsed).toEqual({
      quarantined: [
        { testId: 'tests.test_math.test_divide', flipRate: 0.5, classification: 'float_precision', estimatedCostUsd: 0.4 },
      ],
      total: 1,
    });
  });

  it('should recognise supported formats', () => {
    expect(isSkipListFormat('pytest')).toBe(true);
    expect(isSkipListFormat('junit')).toBe(false);
  });
});
