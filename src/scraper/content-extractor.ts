/**
 * Article Content Extractor
 *
 * Locates the article body container and reduces it to clean paragraphs:
 * non-content subtrees and noise classes are stripped, paragraph-like
 * elements are collected, and a plain-text fallback covers pages that
 * use no paragraph markup at all.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isComment, isText, type AnyNode, type Element } from 'domhandler';
import { normalizeText } from './selectors.js';
import type { ContentRules } from './types.js';

/**
 * Depth-first visit in document order
 */
function walk(node: AnyNode, visit: (node: AnyNode) => void): void {
  visit(node);
  if (hasChildren(node)) {
    for (const child of node.children) {
      walk(child, visit);
    }
  }
}

function findContainer($: CheerioAPI, selectors: readonly string[]): Cheerio<Element> | null {
  for (const selector of selectors) {
    const element = $.root().find(selector).first();
    if (element.length > 0) {
      return element;
    }
  }
  return null;
}

export function isNoiseClass(className: string, markers: readonly string[]): boolean {
  return markers.some((marker) =>
    marker.endsWith('-') || marker.endsWith('_')
      ? className.startsWith(marker)
      : className === marker
  );
}

/**
 * Strip everything that is not article text. Mutates the document.
 */
function sanitize($: CheerioAPI, container: Cheerio<Element>, rules: ContentRules): void {
  for (const selector of rules.removeSelectors) {
    container.find(selector).remove();
  }

  const root = container.get(0);
  if (root) {
    const comments: AnyNode[] = [];
    walk(root, (node) => {
      if (isComment(node)) {
        comments.push(node);
      }
    });
    $(comments).remove();
  }

  container.find('[class]').each((_, element) => {
    const classes = ($(element).attr('class') ?? '').split(/\s+/).filter(Boolean);
    if (classes.some((className) => isNoiseClass(className, rules.noiseClassMarkers))) {
      $(element).remove();
    }
  });
}

function collectParagraphs(
  $: CheerioAPI,
  container: Cheerio<Element>,
  rules: ContentRules
): string[] {
  const boilerplate = new Set(rules.boilerplate);
  const paragraphs: string[] = [];

  container.find(rules.paragraphSelector).each((_, element) => {
    const $element = $(element);

    // Text of nested matches is already part of the enclosing one
    if ($element.parentsUntil(container, rules.paragraphSelector).length > 0) {
      return;
    }

    const text = normalizeText($element.text());
    if (text && !boilerplate.has(text)) {
      paragraphs.push(text);
    }
  });

  return paragraphs;
}

function collectLines(container: Cheerio<Element>): string[] {
  const lines: string[] = [];
  const root = container.get(0);
  if (!root) {
    return lines;
  }

  walk(root, (node) => {
    if (!isText(node)) {
      return;
    }
    for (const line of node.data.split('\n')) {
      const trimmed = line.trim();
      if (trimmed) {
        lines.push(trimmed);
      }
    }
  });

  return lines;
}

/**
 * Extract the cleaned article body. Returns null when no container
 * matches or nothing is left after sanitization.
 */
export function extractContent($: CheerioAPI, rules: ContentRules): string | null {
  const container = findContainer($, rules.containerSelectors);
  if (!container) {
    return null;
  }

  sanitize($, container, rules);

  const paragraphs = collectParagraphs($, container, rules);
  const pieces = paragraphs.length > 0 ? paragraphs : collectLines(container);

  return pieces.length > 0 ? pieces.join('\n\n') : null;
}
