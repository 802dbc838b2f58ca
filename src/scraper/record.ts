/**
 * Article record construction and serialization
 */

import type { ArticleRecord, ArticleRecordJson, ExtractedArticle } from '../types/index.js';
import { formatIsoDate } from '../utils/dates.js';

export function createArticleRecord(
  article: ExtractedArticle,
  origin: { keyword: string; source: string; link: string }
): ArticleRecord {
  return Object.freeze({
    title: article.title,
    publishDate: new Date(article.publishDate.getTime()),
    author: article.author,
    content: article.content,
    keyword: origin.keyword,
    category: article.category,
    source: origin.source,
    link: origin.link,
  });
}

export function toJsonRecord(record: ArticleRecord): ArticleRecordJson {
  return {
    title: record.title,
    publish_date: formatIsoDate(record.publishDate),
    author: record.author,
    content: record.content,
    keyword: record.keyword,
    category: record.category,
    source: record.source,
    link: record.link,
  };
}

/**
 * Stable source identifier from a base URL: `https://www.detik.com` -> `detik.com`
 */
export function sourceIdFromUrl(baseUrl: string): string {
  return new URL(baseUrl).hostname.replace(/^www\./, '');
}
