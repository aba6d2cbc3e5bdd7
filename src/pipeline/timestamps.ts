import { isValid, parseISO } from "date-fns";

const HOUR_PATTERN = /^[^T\s]+[T\s](\d{2})/;
const LAST_HOUR = 23;

function writtenHour(value: string): number | null {
  const match = HOUR_PATTERN.exec(value);
  return match ? Number(match[1]) : null;
}

/**
 * Parses an ISO-8601 timestamp. The end-of-day form `T24:00` that `parseISO`
 * accepts is rejected: a post hour is always 0-23.
 */
export function parseTimestamp(value: string): Date | null {
  const hour = writtenHour(value);
  if (hour !== null && hour > LAST_HOUR) {
    return null;
  }
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

export function isIsoTimestamp(value: unknown): value is string {
  return typeof value === "string" && parseTimestamp(value) !== null;
}

/**
 * Hour of day as written in the timestamp, so a post keeps the local hour of
 * its author whatever offset it carries. Date-only timestamps map to 0.
 * Returns null when the value is not an ISO-8601 timestamp.
 */
export function extractHour(value: string): number | null {
  if (parseTimestamp(value) === null) {
    return null;
  }
  return writtenHour(value) ?? 0;
}
