/**
 * Live Scraper Check
 *
 * Crawls one keyword on detik for a single results page and logs a
 * sample of the records.
 *
 * Run with: npx tsx src/scraper/test-scraper.ts [keyword]
 */

import { CrawlController, Fetcher, ResultSink, createDetikSource, toJsonRecord } from './index.js';
import { logger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';

async function testScraper(): Promise<void> {
  const keyword = process.argv[2] ?? 'ekonomi';
  logger.info({ keyword }, 'Starting scraper test');

  const source = createDetikSource();
  const fetcher = new Fetcher({ concurrency: 4 });
  const sink = new ResultSink<ArticleRecord>(50);
  const records: ArticleRecord[] = [];

  const draining = (async () => {
    for await (const record of sink) {
      records.push(record);
    }
  })();

  const controller = new CrawlController({ keyword, source, fetcher, sink, maxPages: 1 });
  const outcome = await controller.run();
  sink.close();
  await draining;

  logger.info(
    {
      stopReason: outcome.stopReason,
      pagesFetched: outcome.pagesFetched,
      linksFound: outcome.linksFound,
      emitted: outcome.articlesEmitted,
      failed: outcome.articlesFailed,
    },
    'Scrape result'
  );

  logger.info('Sample articles found:');
  for (const record of records.slice(0, 5)) {
    const json = toJsonRecord(record);
    logger.info({
      title: json.title.slice(0, 60),
      date: json.publish_date,
      author: json.author,
      category: json.category,
      link: json.link,
      contentLength: json.content.length,
    });
  }

  logger.info('=== Scraper Test Complete ===');
}

testScraper().catch((error: unknown) => {
  logger.fatal({ error }, 'Test failed');
  process.exit(1);
});
