/**
 * Crawl Pipeline
 *
 * Fans out one crawl controller per keyword x source, fans their records
 * into a single bounded result sink, and drains it with one consumer.
 */

import { config } from './config/index.js';
import { CrawlController } from './scraper/crawl-controller.js';
import { Fetcher } from './scraper/fetcher.js';
import { ResultSink } from './scraper/result-sink.js';
import type { NewsSource, PageFetcher } from './scraper/types.js';
import { formatIsoDate, isAfter } from './utils/dates.js';
import { logger } from './utils/logger.js';
import type { ArticleRecord, CrawlOutcome, CrawlSummary } from './types/index.js';

export interface CrawlOptions {
  keywords: readonly string[];
  sources: readonly NewsSource[];
  /** Per-source request limit */
  concurrency?: number;
  startDate?: Date;
  /** Records published after this day are dropped by the consumer */
  endDate?: Date;
  maxPages?: number;
  resultBufferSize?: number;
  /** One fetcher per source; all controllers of that source share it */
  createFetcher?: (source: NewsSource, concurrency: number) => PageFetcher;
}

export type RecordHandler = (record: ArticleRecord) => void | Promise<void>;

interface ConsumerStats {
  delivered: number;
  outOfRange: number;
  consumerErrors: number;
}

async function consume(
  sink: ResultSink<ArticleRecord>,
  onRecord: RecordHandler,
  endDate: Date | undefined
): Promise<ConsumerStats> {
  const stats: ConsumerStats = { delivered: 0, outOfRange: 0, consumerErrors: 0 };

  for await (const record of sink) {
    if (endDate && isAfter(record.publishDate, endDate)) {
      stats.outOfRange++;
      continue;
    }

    try {
      await onRecord(record);
      stats.delivered++;
    } catch (error) {
      stats.consumerErrors++;
      logger.error({ link: record.link, error }, 'Record handler failed');
    }
  }

  return stats;
}

/**
 * Crawl every keyword on every source and hand each record to `onRecord`
 */
export async function runCrawl(options: CrawlOptions, onRecord: RecordHandler): Promise<CrawlSummary> {
  const {
    keywords,
    sources,
    concurrency = config.crawler.concurrency,
    startDate,
    endDate,
    maxPages = 0,
    resultBufferSize = config.crawler.resultBufferSize,
    createFetcher = (_source: NewsSource, limit: number): PageFetcher =>
      new Fetcher({ concurrency: limit }),
  } = options;

  const startTime = Date.now();

  logger.info(
    {
      keywords,
      sources: sources.map((source) => source.id),
      concurrency,
      startDate: startDate ? formatIsoDate(startDate) : undefined,
      endDate: endDate ? formatIsoDate(endDate) : undefined,
      maxPages,
    },
    'Starting crawl'
  );

  const sink = new ResultSink<ArticleRecord>(resultBufferSize);
  const consumer = consume(sink, onRecord, endDate);

  const fetchers = new Map<string, PageFetcher>(
    sources.map((source) => [source.id, createFetcher(source, concurrency)])
  );

  const crawls: Array<{ keyword: string; source: string; run: Promise<CrawlOutcome> }> = [];
  for (const keyword of keywords) {
    for (const source of sources) {
      const fetcher = fetchers.get(source.id);
      if (!fetcher) {
        continue;
      }
      const controller = new CrawlController({ keyword, source, fetcher, sink, startDate, maxPages });
      crawls.push({ keyword, source: source.id, run: controller.run() });
    }
  }

  const settled = await Promise.allSettled(crawls.map((crawl) => crawl.run));
  sink.close();
  const consumed = await consumer;

  const outcomes: CrawlOutcome[] = [];
  let failedCrawls = 0;

  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      outcomes.push(result.value);
      return;
    }
    failedCrawls++;
    const crawl = crawls[index];
    logger.error(
      { keyword: crawl?.keyword, source: crawl?.source, error: result.reason },
      'Crawl failed'
    );
  });

  const summary: CrawlSummary = {
    outcomes,
    delivered: consumed.delivered,
    outOfRange: consumed.outOfRange,
    consumerErrors: consumed.consumerErrors,
    failedCrawls,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    {
      crawls: crawls.length,
      delivered: summary.delivered,
      outOfRange: summary.outOfRange,
      consumerErrors: summary.consumerErrors,
      failedCrawls,
      durationMs: summary.durationMs,
    },
    'Crawl complete'
  );

  return summary;
}
