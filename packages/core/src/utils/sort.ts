/**
 * Order ISO-8601 timestamps by code unit, which is chronological for a
 * consistent format. Locale collation is avoided on purpose: it can skip
 * punctuation such as '-' and ':'.
 */
export function compareIsoTimestamps(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
