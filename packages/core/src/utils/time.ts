/**
 * Canonical UTC ISO-8601 form of any date string `Date` can parse
 * (ISO with offsets, RFC 2822 mail dates), or undefined when it cannot.
 */
export function toIsoTimestamp(value: string): string | undefined {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}
