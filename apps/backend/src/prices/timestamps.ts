import { format, parse, subHours } from 'date-fns';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Formats a date on the local clock with second precision. */
export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/** Start of the `[since, now]` window covering the last `hours` hours. */
export function lookbackStart(hours: number, now: Date = new Date()): string {
  return formatTimestamp(subHours(now, hours));
}

/** Reads a stored timestamp back as a local date. */
export function parseTimestamp(timestamp: string): Date {
  return parse(timestamp, TIMESTAMP_FORMAT, new Date());
}
