/**
 * Search results link extraction
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import type { LinkRules } from './types.js';

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

export function isExcluded(url: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => url.includes(pattern));
}

/**
 * Collect article URLs from a search results page.
 *
 * Returns null when the page has no article cards at all (end of
 * results). Returns an empty set when cards exist but every link was
 * filtered out.
 */
export function extractLinks(
  html: string,
  rules: LinkRules,
  baseUrl: string
): Set<string> | null {
  const $ = cheerio.load(html);
  const cards = $(rules.cardSelector);

  if (cards.length === 0) {
    logger.warn({ selector: rules.cardSelector }, 'No article cards found');
    return null;
  }

  const links = new Set<string>();

  cards.each((_, card) => {
    // Title anchor only; thumbnails and author links are ignored
    const href = $(card).find(rules.titleLinkSelector).first().attr('href')?.trim();
    if (!href) {
      return;
    }

    const url = resolveUrl(href, baseUrl);
    if (!url) {
      logger.debug({ href }, 'Skipping unparseable link');
      return;
    }

    if (isExcluded(url, rules.excludePatterns)) {
      logger.debug({ url }, 'Skipping non-article link');
      return;
    }

    links.add(url);
  });

  if (links.size === 0) {
    logger.warn({ cards: cards.length }, 'All article links were filtered out');
  } else {
    logger.info({ count: links.size, cards: cards.length }, 'Found valid article links');
  }

  return links;
}
