/**
 * Skip-list outputs for the quarantine command
 */

import type { RootCause } from '@flakelens/shared';

export const SKIP_LIST_FORMATS = ['pytest', 'list', 'json'] as const;
export type SkipListFormat = (typeof SKIP_LIST_FORMATS)[number];

export interface QuarantineEntry {
  readonly testId: string;
  readonly flipRate: number;
  readonly classification: RootCause | null;
  readonly estimatedCostUsd: number;
}

export function isSkipListFormat(value: string): value is SkipListFormat {
  return SKIP_LIST_FORMATS.some(format => format === value);
}

const PYTEST_HOOK = `

def _dotted_name(item):
    module = getattr(item, "module", None)
    parts = [module.__name__] if module is not None else []
    cls = getattr(item, "cls", None)
    if cls is not None:
        parts.append(cls.__name__)
    parts.append(item.name)
    return ".".join(parts)


def pytest_collection_modifyitems(config, items):
    for item in items:
        if item.nodeid in QUARANTINED or _dotted_name(item) in QUARANTINED:
            item.add_marker(pytest.mark.skip(reason="quarantined by flakelens"))
`;

/**
 * A conftest.py that skips every quarantined test at collection time.
 * Test ids are emitted as JSON strings, which are valid Python literals.
 */
export function renderPytestConftest(entries: readonly QuarantineEntry[]): string {
  const header = [
    '# Generated by flakelens quarantine. Do not edit by hand.',
    'import pytest',
    '',
  ];

  const members = entries.map(entry => {
    const note = entry.classification
      ? `flip ${Math.round(entry.flipRate * 100)}%, ${entry.classification}`
      : `flip ${Math.round(entry.flipRate * 100)}%`;
    return `    ${JSON.stringify(entry.testId)},  # ${note}`;
  });

  const set = members.length === 0
    ? ['QUARANTINED = set()']
    : ['QUARANTINED = {', ...members, '}'];

  return [...header, ...set].join('\n') + '\n' + PYTEST_HOOK;
}

export function renderPlainList(entries: readonly QuarantineEntry[]): string {
  return entries.map(entry => entry.testId + '\n').join('');
}

export function renderJsonList(entries: readonly QuarantineEntry[]): string {
  return JSON.stringify({ quarantined: entries, total: entries.length }, null, 2) + '\n';
}

export function renderSkipList(format: SkipListFormat, entries: readonly QuarantineEntry[]): string {
  switch (format) {
    case 'pytest':
      return renderPytestConftest(entries);
    case 'list':
      return renderPlainList(entries);
    case 'json':
      return renderJsonList(entries);
  }
}
