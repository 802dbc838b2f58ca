/**
 * Core types for the keyword news crawler
 */

export const UNKNOWN = 'Unknown';

/**
 * Fields extracted from a single article page
 */
export interface ExtractedArticle {
  title: string;
  author: string;
  category: string;
  publishDate: Date;
  content: string;
}

/**
 * Unit produced by the crawl pipeline. `publishDate` is a calendar day
 * at UTC midnight; `link` is the bare article URL used as identity.
 */
export interface ArticleRecord extends Readonly<ExtractedArticle> {
  readonly keyword: string;
  readonly source: string;
  readonly link: string;
}

/**
 * Serialized record shape (one JSON line per record)
 */
export interface ArticleRecordJson {
  title: string;
  publish_date: string;
  author: string;
  content: string;
  keyword: string;
  category: string;
  source: string;
  link: string;
}

export type StopReason =
  | 'no-results'
  | 'all-links-filtered'
  | 'date-bound'
  | 'page-fetch-failed'
  | 'max-pages';

/**
 * Result of one keyword x source crawl
 */
export interface CrawlOutcome {
  keyword: string;
  source: string;
  stopReason: StopReason;
  pagesFetched: number;
  linksFound: number;
  articlesEmitted: number;
  articlesFailed: number;
  dispatchesSkipped: number;
  durationMs: number;
}

export interface CrawlSummary {
  outcomes: CrawlOutcome[];
  delivered: number;
  outOfRange: number;
  consumerErrors: number;
  failedCrawls: number;
  durationMs: number;
}
