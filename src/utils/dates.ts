/**
 * Calendar date helpers
 *
 * Article dates carry day precision only. They are represented as Date
 * values at UTC midnight so comparisons never depend on the local zone.
 */

/**
 * Build a calendar date, or null when the day does not exist
 * (e.g. 31 February). `month` is 1-based.
 */
export function calendarDate(year: number, month: number, day: number): Date | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Parse a strict YYYY-MM-DD string
 */
export function parseIsoDate(value: string): Date | null {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }

  const [, year = '', month = '', day = ''] = match;
  return calendarDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isBefore(date: Date, bound: Date): boolean {
  return date.getTime() < bound.getTime();
}

export function isAfter(date: Date, bound: Date): boolean {
  return date.getTime() > bound.getTime();
}
