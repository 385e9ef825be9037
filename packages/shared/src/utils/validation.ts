export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Keep the tail of a long identifier; test ids differ at the end, not the start
 */
export function truncateStart(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return '...' + str.slice(str.length - maxLength + 3);
}
