/**
 * Scraper Types
 */

import type { CheerioAPI } from 'cheerio';
import type { ArticleRecord } from '../types/index.js';

/**
 * One step of a fallback chain: pure page -> optional text
 */
export type TextRule = ($: CheerioAPI) => string | null;

export interface FetchOptions {
  /**
   * Checked when the request is admitted through the concurrency gate.
   * Returning false skips the request and resolves with null.
   */
  shouldProceed?: () => boolean;
}

/**
 * Raw page access. Resolves with the response body, or null when there
 * was no usable response.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<string | null>;
}

/**
 * Destination for extracted records
 */
export interface RecordSink {
  put(record: ArticleRecord): Promise<void>;
}

/**
 * Search results page rules
 */
export interface LinkRules {
  /** Selector for one article card on the results page */
  cardSelector: string;
  /** Canonical title anchor inside a card */
  titleLinkSelector: string;
  /** Substrings that mark non-article URLs */
  excludePatterns: readonly string[];
}

/**
 * Ordered fallback chains per article field
 */
export interface FieldRules {
  title: readonly TextRule[];
  author: readonly TextRule[];
  category: readonly TextRule[];
  date: readonly TextRule[];
}

/**
 * Body container lookup and sanitization
 */
export interface ContentRules {
  containerSelectors: readonly string[];
  /** Non-content subtrees removed before collecting text */
  removeSelectors: readonly string[];
  /**
   * Class tokens marking noise. A marker ending in `-` or `_` matches
   * any token starting with it.
   */
  noiseClassMarkers: readonly string[];
  /** Paragraph-like elements collected in document order */
  paragraphSelector: string;
  /** Exact paragraph texts to drop */
  boilerplate: readonly string[];
}

/**
 * Capability set of one news site
 */
export interface NewsSource {
  /** Registry name, e.g. `detik` */
  name: string;
  /** Stable identifier derived from the domain, e.g. `detik.com` */
  id: string;
  baseUrl: string;
  buildSearchUrl(keyword: string, page: number): string;
  /** URL requested for an article (may add a rendering hint) */
  articleUrl(link: string): string;
  links: LinkRules;
  fields: FieldRules;
  content: ContentRules;
  /** Throws DateParseError on unrecognized text */
  parseDate(text: string): Date;
}
