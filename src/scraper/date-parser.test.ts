import { describe, expect, it } from 'vitest';
import { parseIndonesianDate } from './date-parser.js';
import { DateParseError } from '../utils/errors.js';
import { formatIsoDate } from '../utils/dates.js';

function parsed(text: string): string {
  return formatIsoDate(parseIndonesianDate(text));
}

describe('parseIndonesianDate', () => {
  it('parses the detik detail date format', () => {
    expect(parsed('Senin, 14 Okt 2024 10:30 WIB')).toBe('2024-10-14');
    expect(parsed('Jumat, 03 Mei 2024 08:05 WIB')).toBe('2024-05-03');
  });

  it('accepts full Indonesian month names', () => {
    expect(parsed('Minggu, 17 Agustus 2025')).toBe('2025-08-17');
    expect(parsed('1 Desember 2023')).toBe('2023-12-01');
  });

  it('accepts English month names and abbreviations with a dot', () => {
    expect(parsed('14 Oct. 2024')).toBe('2024-10-14');
    expect(parsed('5 May 2024')).toBe('2024-05-05');
  });

  it('accepts day-first numeric dates', () => {
    expect(parsed('14/10/2024 10:30')).toBe('2024-10-14');
  });

  it('accepts ISO dates', () => {
    expect(parsed('2024-10-14T10:30:00+07:00')).toBe('2024-10-14');
  });

  it('ignores the time of day', () => {
    expect(parseIndonesianDate('Selasa, 15 Okt 2024 23:59 WIB').toISOString()).toBe(
      '2024-10-15T00:00:00.000Z'
    );
  });

  it('throws DateParseError for unrecognized text', () => {
    expect(() => parseIndonesianDate('2 jam yang lalu')).toThrow(DateParseError);
    expect(() => parseIndonesianDate('')).toThrow(DateParseError);
  });

  it('throws for unknown month names', () => {
    expect(() => parseIndonesianDate('14 Foo 2024')).toThrow('Unrecognized date format: "14 Foo 2024"');
  });

  it('throws for words that only start like a month', () => {
    expect(() => parseIndonesianDate('10 Desa 2024')).toThrow(DateParseError);
    expect(() => parseIndonesianDate('3 Marketing 2024')).toThrow(DateParseError);
  });

  it('uses a later date when an earlier day-word-year run is not a date', () => {
    expect(parsed('Foto 5 Hari 2024, 14 Okt 2024')).toBe('2024-10-14');
  });

  it('throws for days that do not exist', () => {
    expect(() => parseIndonesianDate('31 Feb 2024')).toThrow(DateParseError);
  });

  it('keeps the rejected text on the error', () => {
    try {
      parseIndonesianDate('kemarin');
      expect.fail('expected a DateParseError');
    } catch (error) {
      expect(error).toBeInstanceOf(DateParseError);
      expect(error instanceof DateParseError ? error.text : null).toBe('kemarin');
    }
  });
});
