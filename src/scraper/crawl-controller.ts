/**
 * Crawl Controller
 *
 * Drives pagination for one keyword on one source:
 * fetch results page -> extract links -> dispatch article fetches -> next page.
 *
 * The crawl stops when a page yields no links, a results page cannot be
 * fetched, or an article older than the start date is seen. The stop
 * flag belongs to this instance only.
 */

import { logger, type Logger } from '../utils/logger.js';
import { formatIsoDate, isBefore } from '../utils/dates.js';
import type { CrawlOutcome, StopReason } from '../types/index.js';
import { extractArticle } from './article-extractor.js';
import { extractLinks } from './link-extractor.js';
import { createArticleRecord } from './record.js';
import type { NewsSource, PageFetcher, RecordSink } from './types.js';

export interface CrawlControllerOptions {
  keyword: string;
  source: NewsSource;
  fetcher: PageFetcher;
  sink: RecordSink;
  /** Articles published before this day end the crawl after the current page */
  startDate?: Date;
  /** Page cap, 0 or undefined for none */
  maxPages?: number;
}

export class CrawlController {
  private readonly keyword: string;
  private readonly source: NewsSource;
  private readonly fetcher: PageFetcher;
  private readonly sink: RecordSink;
  private readonly startDate: Date | undefined;
  private readonly maxPages: number;
  private readonly log: Logger;

  private pageNumber = 1;
  private continueScraping = true;

  private pagesFetched = 0;
  private linksFound = 0;
  private articlesEmitted = 0;
  private articlesFailed = 0;
  private dispatchesSkipped = 0;

  constructor(options: CrawlControllerOptions) {
    this.keyword = options.keyword;
    this.source = options.source;
    this.fetcher = options.fetcher;
    this.sink = options.sink;
    this.startDate = options.startDate;
    this.maxPages = options.maxPages ?? 0;
    this.log = logger.child({ keyword: this.keyword, source: this.source.id });
  }

  get currentPage(): number {
    return this.pageNumber;
  }

  get isScraping(): boolean {
    return this.continueScraping;
  }

  async run(): Promise<CrawlOutcome> {
    const startTime = Date.now();
    const stopReason = await this.paginate();

    const outcome: CrawlOutcome = {
      keyword: this.keyword,
      source: this.source.id,
      stopReason,
      pagesFetched: this.pagesFetched,
      linksFound: this.linksFound,
      articlesEmitted: this.articlesEmitted,
      articlesFailed: this.articlesFailed,
      dispatchesSkipped: this.dispatchesSkipped,
      durationMs: Date.now() - startTime,
    };

    this.log.info(
      {
        stopReason,
        pages: outcome.pagesFetched,
        emitted: outcome.articlesEmitted,
        failed: outcome.articlesFailed,
        skipped: outcome.dispatchesSkipped,
        durationMs: outcome.durationMs,
      },
      'Crawl finished'
    );

    return outcome;
  }

  private async paginate(): Promise<StopReason> {
    for (;;) {
      if (this.maxPages > 0 && this.pageNumber > this.maxPages) {
        this.log.info({ maxPages: this.maxPages }, 'Page limit reached');
        return 'max-pages';
      }

      const url = this.source.buildSearchUrl(this.keyword, this.pageNumber);
      this.log.info({ url, page: this.pageNumber }, 'Scraping page');

      const html = await this.fetcher.fetch(url);
      if (html === null) {
        this.log.warn({ url, page: this.pageNumber }, 'Results page unavailable, stopping');
        return 'page-fetch-failed';
      }
      this.pagesFetched++;

      const links = extractLinks(html, this.source.links, this.source.baseUrl);
      if (links === null) {
        this.log.info({ page: this.pageNumber }, 'No more results');
        return 'no-results';
      }
      if (links.size === 0) {
        this.log.info({ page: this.pageNumber }, 'No article links left after filtering');
        return 'all-links-filtered';
      }
      this.linksFound += links.size;

      await Promise.all([...links].map((link) => this.dispatch(link)));

      if (!this.continueScraping) {
        return 'date-bound';
      }

      this.pageNumber++;
    }
  }

  private async dispatch(link: string): Promise<void> {
    if (!this.continueScraping) {
      this.dispatchesSkipped++;
      return;
    }

    let refused = false;
    try {
      const html = await this.fetcher.fetch(this.source.articleUrl(link), {
        shouldProceed: () => {
          refused = !this.continueScraping;
          return !refused;
        },
      });

      if (html === null) {
        if (refused) {
          this.dispatchesSkipped++;
          return;
        }
        this.log.warn({ link }, 'No response for article');
        this.articlesFailed++;
        return;
      }

      const article = extractArticle(html, this.source, link);
      if (!article) {
        this.articlesFailed++;
        return;
      }

      if (this.startDate && isBefore(article.publishDate, this.startDate)) {
        if (this.continueScraping) {
          this.log.info(
            {
              link,
              publishDate: formatIsoDate(article.publishDate),
              startDate: formatIsoDate(this.startDate),
            },
            'Article predates start date, stopping after this page'
          );
        }
        this.continueScraping = false;
      }

      await this.sink.put(
        createArticleRecord(article, { keyword: this.keyword, source: this.source.id, link })
      );
      this.articlesEmitted++;
      this.log.debug({ link, title: article.title.slice(0, 80) }, 'Article scraped');
    } catch (error) {
      this.articlesFailed++;
      this.log.error({ link, error }, 'Error processing article');
    }
  }
}
