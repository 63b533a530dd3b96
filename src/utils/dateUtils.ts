/**
 * Date utilities shared by logging, models and API serialization.
 */

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date for log lines: `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatDateForLogs(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parse a calendar date (`YYYY-MM-DD`). Returns null for malformed or impossible dates.
 */
export function parseCalendarDate(value: string): { year: number; month: number; day: number } | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

/**
 * Month and day of a calendar date as `MM/DD`; the year is never shown
 */
export function formatMonthDay(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const parsed = parseCalendarDate(value);
  return parsed ? `${pad(parsed.month)}/${pad(parsed.day)}` : null;
}

export function isMidnight(date: Date): boolean {
  return (
    date.getHours() === 0 &&
    date.getMinutes() === 0 &&
    date.getSeconds() === 0 &&
    date.getMilliseconds() === 0
  );
}

export function minutesBetween(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / 60000);
}
