/**
 * Locale-independent string ordering (UTF-16 code units).
 * Keeps build output identical across hosts.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
