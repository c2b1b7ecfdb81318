export const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Today's calendar date (UTC) as YYYY-MM-DD. Dates in this service have
 * day granularity, so plain string comparison orders them correctly.
 */
export function today(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
