/**
 * Article date parsing
 *
 * Indonesian news sites print dates such as "Senin, 14 Okt 2024 10:30 WIB".
 * Only the calendar day is kept.
 */

import { calendarDate } from '../utils/dates.js';
import { DateParseError } from '../utils/errors.js';

/**
 * Month names and abbreviations, Indonesian and English
 */
const MONTH_PATTERNS: ReadonlyArray<readonly [number, string]> = [
  [1, 'jan(?:uari|uary)?'],
  [2, 'feb(?:ruari|ruary)?'],
  [3, 'mar(?:et|ch)?'],
  [4, 'apr(?:il)?'],
  [5, 'mei|may'],
  [6, 'jun(?:i|e)?'],
  [7, 'jul(?:i|y)?'],
  [8, 'agu(?:stus)?|agt|aug(?:ust)?'],
  [9, 'sep(?:t|tember)?'],
  [10, 'okt(?:ober)?|oct(?:ober)?'],
  [11, 'nov(?:ember)?'],
  [12, 'des(?:ember)?|dec(?:ember)?'],
];

const MONTH_NAME = MONTH_PATTERNS.map(([, pattern]) => pattern).join('|');

const NAMED_DATE = new RegExp(`\\b(\\d{1,2})\\s+(${MONTH_NAME})\\b\\.?\\s+(\\d{4})\\b`, 'gi');

function lookupMonth(name: string): number | null {
  const match = MONTH_PATTERNS.find(([, pattern]) => new RegExp(`^(?:${pattern})$`, 'i').test(name));
  return match ? match[0] : null;
}

/**
 * Parse site date text into a calendar date.
 *
 * Accepted forms, anywhere in the text:
 * - `14 Okt 2024`, `3 Oktober 2024`, `14 Oct. 2024`
 * - `14/10/2024` (day first)
 * - `2024-10-14`
 *
 * @throws DateParseError when no form matches or the day does not exist
 */
export function parseIndonesianDate(text: string): Date {
  const value = text.trim();

  for (const [, day = '', monthName = '', year = ''] of value.matchAll(NAMED_DATE)) {
    const month = lookupMonth(monthName);
    if (month !== null) {
      const date = calendarDate(parseInt(year, 10), month, parseInt(day, 10));
      if (date) {
        return date;
      }
    }
  }

  const numeric = value.match(/(\d{1,2})\/(\d{1,2})\/(\d{4})/);
  if (numeric) {
    const [, day = '', month = '', year = ''] = numeric;
    const date = calendarDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
    if (date) {
      return date;
    }
  }

  const iso = value.match(/(\d{4})-(\d{2})-(\d{2})/);
  if (iso) {
    const [, year = '', month = '', day = ''] = iso;
    const date = calendarDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
    if (date) {
      return date;
    }
  }

  throw new DateParseError(text);
}
