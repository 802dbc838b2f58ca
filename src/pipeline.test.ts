import { describe, expect, it, vi } from 'vitest';
import { runCrawl } from './pipeline.js';
import { createDetikSource } from './scraper/sources/detik.js';
import { articlePage, emptySearchPage, searchResultsPage } from './scraper/__fixtures__/pages.js';
import { FakeFetcher } from './scraper/__fixtures__/fakes.js';
import { toJsonRecord } from './scraper/record.js';
import { parseIsoDate } from './utils/dates.js';
import type { ArticleRecord } from './types/index.js';

const detik = createDetikSource('https://www.detik.com');

function articleLink(id: number): string {
  return `https://news.detik.com/berita/d-${7000000 + id}/artikel-${id}`;
}

function day(value: string): Date {
  const date = parseIsoDate(value);
  if (!date) {
    throw new Error(`bad test date ${value}`);
  }
  return date;
}

function siteFixture(): FakeFetcher {
  return new FakeFetcher({
    [detik.buildSearchUrl('ekonomi', 1)]: searchResultsPage([articleLink(1), articleLink(2)]),
    [detik.buildSearchUrl('ekonomi', 2)]: emptySearchPage(),
    [detik.articleUrl(articleLink(1))]: articlePage({
      title: 'Inflasi Oktober Terkendali',
      date: 'Senin, 14 Okt 2024 10:30 WIB',
    }),
    [detik.articleUrl(articleLink(2))]: articlePage({
      title: 'Rupiah Menguat',
      date: 'Minggu, 20 Okt 2024 08:00 WIB',
    }),
    [detik.buildSearchUrl('pajak', 1)]: searchResultsPage([articleLink(3)]),
    [detik.buildSearchUrl('pajak', 2)]: emptySearchPage(),
    [detik.articleUrl(articleLink(3))]: articlePage({
      title: 'Tarif Pajak Baru',
      date: 'Selasa, 15 Okt 2024 13:00 WIB',
    }),
  });
}

describe('runCrawl', () => {
  it('fans records from every keyword into one consumer', async () => {
    const fetcher = siteFixture();
    const received: ArticleRecord[] = [];

    const summary = await runCrawl(
      { keywords: ['ekonomi', 'pajak'], sources: [detik], createFetcher: () => fetcher },
      (record) => {
        received.push(record);
      }
    );

    expect(received.map((record) => `${record.keyword}:${record.title}`).sort()).toEqual([
      'ekonomi:Inflasi Oktober Terkendali',
      'ekonomi:Rupiah Menguat',
      'pajak:Tarif Pajak Baru',
    ]);
    expect(summary.delivered).toBe(3);
    expect(summary.failedCrawls).toBe(0);
    expect(summary.outcomes.map((outcome) => `${outcome.keyword}:${outcome.stopReason}`)).toEqual([
      'ekonomi:no-results',
      'pajak:no-results',
    ]);
  });

  it('creates one fetcher per source, shared by its keywords', async () => {
    const fetcher = siteFixture();
    const createFetcher = vi.fn(() => fetcher);

    await runCrawl(
      { keywords: ['ekonomi', 'pajak'], sources: [detik], concurrency: 3, createFetcher },
      () => undefined
    );

    expect(createFetcher).toHaveBeenCalledTimes(1);
    expect(createFetcher).toHaveBeenCalledWith(detik, 3);
  });

  it('keeps a failed results page local to its own crawl', async () => {
    const fetcher = siteFixture();
    const received: string[] = [];

    const summary = await runCrawl(
      { keywords: ['ekonomi', 'cuaca'], sources: [detik], createFetcher: () => fetcher },
      (record) => {
        received.push(record.title);
      }
    );

    expect(received.sort()).toEqual(['Inflasi Oktober Terkendali', 'Rupiah Menguat']);
    expect(summary.outcomes.find((outcome) => outcome.keyword === 'cuaca')?.stopReason).toBe(
      'page-fetch-failed'
    );
  });

  it('drops records published after the end date', async () => {
    const received: string[] = [];

    const summary = await runCrawl(
      {
        keywords: ['ekonomi'],
        sources: [detik],
        endDate: day('2024-10-15'),
        createFetcher: () => siteFixture(),
      },
      (record) => {
        received.push(record.title);
      }
    );

    expect(received).toEqual(['Inflasi Oktober Terkendali']);
    expect(summary.outOfRange).toBe(1);
    expect(summary.delivered).toBe(1);
  });

  it('keeps draining when the record handler throws', async () => {
    const received: string[] = [];

    const summary = await runCrawl(
      { keywords: ['ekonomi', 'pajak'], sources: [detik], createFetcher: () => siteFixture() },
      (record) => {
        if (record.title === 'Rupiah Menguat') {
          throw new Error('disk full');
        }
        received.push(record.title);
      }
    );

    expect(received.sort()).toEqual(['Inflasi Oktober Terkendali', 'Tarif Pajak Baru']);
    expect(summary.consumerErrors).toBe(1);
    expect(summary.delivered).toBe(2);
  });

  it('delivers everything through a single-slot buffer with a slow consumer', async () => {
    const received: string[] = [];

    const summary = await runCrawl(
      {
        keywords: ['ekonomi', 'pajak'],
        sources: [detik],
        resultBufferSize: 1,
        createFetcher: () => siteFixture(),
      },
      async (record) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        received.push(record.title);
      }
    );

    expect(received).toHaveLength(3);
    expect(summary.delivered).toBe(3);
  });

  it('produces the serialized record shape', async () => {
    const lines: string[] = [];

    await runCrawl(
      { keywords: ['pajak'], sources: [detik], createFetcher: () => siteFixture() },
      (record) => {
        lines.push(JSON.stringify(toJsonRecord(record)));
      }
    );

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toEqual({
      title: 'Tarif Pajak Baru',
      publish_date: '2024-10-15',
      author: 'Andi Saputra - detikFinance',
      content:
        'Jakarta - Harga beras medium naik di Pasar Induk Cipinang.\n\n' +
        'Pedagang menyebut pasokan dari daerah berkurang.',
      keyword: 'pajak',
      category: 'detikFinance',
      source: 'detik.com',
      link: articleLink(3),
    });
  });
});
