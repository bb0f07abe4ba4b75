/**
 * Date helpers for the backend wire format.
 *
 * The backend speaks naive UTC dates: "2023-08-31" for days and
 * "2023-08-31T09:30:00" for intraday timestamps (no zone suffix).
 */

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

function buildUtc(parts: number[], input: string): Date {
  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = parts;
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Date.UTC rolls over out-of-range fields (2024-02-30 -> 2024-03-01)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new RangeError(`Invalid date ${input}`);
  }
  return date;
}

/**
 * Parse the leading "YYYY-MM-DD" of a string; any time part is ignored.
 */
export function parseDate(input: string): Date {
  const head = input.slice(0, 10);
  if (head.length < 10) {
    throw new RangeError(`Invalid date format (too short) - expected '2006-12-31', got '${input}'`);
  }
  const match = DATE_RE.exec(head);
  if (!match) {
    throw new RangeError(`Invalid date format ${head}`);
  }
  return buildUtc(match.slice(1).map(Number), input);
}

/**
 * Parse "YYYY-MM-DDTHH:MM:SS".
 */
export function parseDateTime(input: string): Date {
  const match = DATE_TIME_RE.exec(input);
  if (!match) {
    throw new RangeError(`Invalid date format ${input}`);
  }
  return buildUtc(match.slice(1).map(Number), input);
}

export function isDateOnly(input: string): boolean {
  return DATE_RE.test(input);
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)}T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Move a wire date back by `durationMs`.
 *
 * A day-only input stays day-only when the duration is a whole number of
 * days; otherwise the result carries a time part.
 */
export function subtractDuration(until: string, durationMs: number): string {
  if (isDateOnly(until)) {
    const start = new Date(parseDate(until).getTime() - durationMs);
    return durationMs % DAY_MS === 0 ? formatDate(start) : formatDateTime(start);
  }
  return formatDateTime(new Date(parseDateTime(until).getTime() - durationMs));
}
