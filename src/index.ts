#!/usr/bin/env node
/**
 * Keyword News Crawler
 *
 * Searches each configured news source for each keyword and writes the
 * extracted articles to stdout, one JSON object per line. Logs go to
 * stderr and the log file.
 *
 * Configuration comes from the environment (see .env.example):
 *   KEYWORDS=ekonomi,pemilu START_DATE=2024-10-01 node dist/index.js
 */

import { config } from './config/index.js';
import { runCrawl } from './pipeline.js';
import { toJsonRecord } from './scraper/record.js';
import { AVAILABLE_SOURCES, resolveSources } from './scraper/sources/index.js';
import type { NewsSource } from './scraper/types.js';
import { getErrorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info(
    { env: config.app.env, version: config.app.version },
    'Starting keyword news crawler'
  );

  const { keywords } = config.crawler;
  if (keywords.length === 0) {
    logger.fatal('No keywords configured, set KEYWORDS to a comma-separated list');
    process.exit(1);
  }

  let sources: NewsSource[];
  try {
    sources = resolveSources(config.crawler.sources);
  } catch (error) {
    logger.fatal({ error: getErrorMessage(error), available: AVAILABLE_SOURCES }, 'Invalid sources');
    process.exit(1);
  }

  process.on('SIGINT', () => {
    logger.info('Interrupted, shutting down');
    process.exit(130);
  });

  const summary = await runCrawl(
    {
      keywords,
      sources,
      concurrency: config.crawler.concurrency,
      startDate: config.crawler.startDate,
      endDate: config.crawler.endDate,
      maxPages: config.crawler.maxPages,
      resultBufferSize: config.crawler.resultBufferSize,
    },
    (record) => {
      process.stdout.write(`${JSON.stringify(toJsonRecord(record))}\n`);
    }
  );

  for (const outcome of summary.outcomes) {
    logger.info(
      {
        keyword: outcome.keyword,
        source: outcome.source,
        stopReason: outcome.stopReason,
        pages: outcome.pagesFetched,
        articles: outcome.articlesEmitted,
        failed: outcome.articlesFailed,
      },
      'Crawl result'
    );
  }

  logger.info(
    {
      delivered: summary.delivered,
      outOfRange: summary.outOfRange,
      failedCrawls: summary.failedCrawls,
      duration: `${(summary.durationMs / 1000).toFixed(1)}s`,
    },
    'Done'
  );

  if (summary.failedCrawls > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
