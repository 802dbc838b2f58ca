/**
 * Scraper Module
 *
 * Generic crawl pipeline plus the per-site capability sets it is driven by
 */

export { CrawlController, type CrawlControllerOptions } from './crawl-controller.js';
export { Fetcher, createHttpClient, type FetcherOptions } from './fetcher.js';
export { ResultSink } from './result-sink.js';

// Extraction
export { extractLinks, isExcluded } from './link-extractor.js';
export { extractArticle } from './article-extractor.js';
export { extractContent, isNoiseClass } from './content-extractor.js';
export { parseIndonesianDate } from './date-parser.js';
export { firstMatch, selectText, normalizeText } from './selectors.js';

// Records
export { createArticleRecord, toJsonRecord, sourceIdFromUrl } from './record.js';

// Sources
export { AVAILABLE_SOURCES, resolveSources, createDetikSource } from './sources/index.js';

export type {
  ContentRules,
  FetchOptions,
  FieldRules,
  LinkRules,
  NewsSource,
  PageFetcher,
  RecordSink,
  TextRule,
} from './types.js';
