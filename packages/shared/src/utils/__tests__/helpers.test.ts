import { describe, it, expect } from 'vitest';

import { toCompactTimestamp } from '../date.js';
import { truncateStart, truncateString } from '../validation.js';

describe('date helpers', () => {
  it('should build compact UTC timestamps', () => {
    expect(toCompactTimestamp(new Date('2024-03-01T09:30:00.123Z'))).toBe('20240301093000123');
  });
});

describe('string helpers', () => {
  it('should truncate from the end', () => {
    expect(truncateString('abcdefghij', 8)).toBe('abcde...');
    expect(truncateString('short', 8)).toBe('short');
  });

  it('should truncate from the start', () => {
    expect(truncateStart('abcdefghij', 8)).toBe('...fghij');
    expect(truncateStart('short', 8)).toBe('short');
  });
});
