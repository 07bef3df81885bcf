/**
 * UTC timestamp with second precision and an explicit offset, e.g.
 * `2026-01-01T09:30:00+00:00`.
 */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}+00:00`;
}

export function utcNow(): string {
  return formatUtcTimestamp(new Date());
}
