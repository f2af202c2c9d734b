const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC calendar day of `date` as YYYY-MM-DD. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** The UTC day `days` before `date`'s day. */
export function utcDayOffset(date: Date, days: number): string {
  return utcDay(new Date(date.getTime() - days * DAY_MS));
}

/**
 * Formats a Date the way the SQLite driver persists `datetime` columns
 * (UTC, `YYYY-MM-DD HH:mm:ss.SSS`) so range predicates compare as text.
 */
export function toSqliteDatetime(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

export function daysAgo(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}
