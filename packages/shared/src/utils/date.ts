/**
 * Compact UTC stamp used in generated run ids, e.g. 20240301093000123
 */
export function toCompactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:TZ.]/g, '');
}
