import { describe, expect, it } from 'vitest';
import { parseEnv } from './env.js';
import { parseKeywords, parseList } from './keywords.js';

describe('parseKeywords', () => {
  it('splits, trims and drops blanks', () => {
    expect(parseKeywords(' ekonomi , pemilu,, harga  beras ')).toEqual([
      'ekonomi',
      'pemilu',
      'harga beras',
    ]);
  });

  it('drops case-insensitive duplicates keeping the first spelling', () => {
    expect(parseKeywords('Banjir,banjir,BANJIR,gempa')).toEqual(['Banjir', 'gempa']);
  });

  it('returns an empty list for an empty string', () => {
    expect(parseList('')).toEqual([]);
  });
});

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});
    expect(env.CONCURRENCY).toBe(12);
    expect(env.SOURCES).toBe('detik');
    expect(env.START_DATE).toBeUndefined();
    expect(env.MAX_PAGES).toBe(0);
    expect(env.RESULT_BUFFER_SIZE).toBe(100);
    expect(env.DETIK_BASE_URL).toBe('https://www.detik.com');
  });

  it('coerces numbers and keeps dates', () => {
    const env = parseEnv({ CONCURRENCY: '4', START_DATE: '2024-10-01', END_DATE: '2024-10-31' });
    expect(env.CONCURRENCY).toBe(4);
    expect(env.START_DATE).toBe('2024-10-01');
    expect(env.END_DATE).toBe('2024-10-31');
  });

  it('treats empty date values as unset', () => {
    expect(parseEnv({ START_DATE: '' }).START_DATE).toBeUndefined();
  });

  it('rejects malformed or impossible dates', () => {
    expect(() => parseEnv({ START_DATE: '01-10-2024' })).toThrow('Environment validation failed');
    expect(() => parseEnv({ START_DATE: '2024-02-30' })).toThrow('Environment validation failed');
  });

  it('rejects a start date after the end date', () => {
    expect(() => parseEnv({ START_DATE: '2024-11-01', END_DATE: '2024-10-01' })).toThrow(
      'START_DATE must not be after END_DATE'
    );
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => parseEnv({ CONCURRENCY: '0' })).toThrow('Environment validation failed');
  });
});
