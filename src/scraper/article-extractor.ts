/**
 * Article page extraction
 *
 * Every field is resolved through the source's ordered fallback chain.
 * Title, date and body are required; author and category fall back to
 * "Unknown".
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { UNKNOWN, type ExtractedArticle } from '../types/index.js';
import { extractContent } from './content-extractor.js';
import { firstMatch } from './selectors.js';
import type { NewsSource } from './types.js';

/**
 * Extract article fields from raw page HTML. Pure apart from logging:
 * the same input always yields an equal result.
 *
 * @param link - used for log context only
 */
export function extractArticle(
  html: string,
  source: NewsSource,
  link: string
): ExtractedArticle | null {
  const $ = cheerio.load(html);

  const title = firstMatch($, source.fields.title);
  if (!title) {
    logger.error({ link, source: source.id }, 'No title found');
    return null;
  }

  const author = firstMatch($, source.fields.author) ?? UNKNOWN;
  const category = firstMatch($, source.fields.category) ?? UNKNOWN;

  const dateText = firstMatch($, source.fields.date);
  if (!dateText) {
    logger.warn({ link, source: source.id }, 'No date found');
    return null;
  }

  // Runs last among the lookups: sanitization mutates the loaded document
  const content = extractContent($, source.content);
  if (!content) {
    logger.warn({ link, source: source.id }, 'No content found');
    return null;
  }

  let publishDate: Date;
  try {
    publishDate = source.parseDate(dateText);
  } catch (error) {
    logger.error(
      { link, source: source.id, dateText, error: getErrorMessage(error) },
      'Error parsing article date'
    );
    return null;
  }

  return { title, author, category, publishDate, content };
}
