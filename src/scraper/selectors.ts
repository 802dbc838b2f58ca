/**
 * Fallback selector chains
 */

import type { CheerioAPI } from 'cheerio';
import type { TextRule } from './types.js';

/**
 * Collapse whitespace runs and trim
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of the first element matching `selector`
 */
export function selectText(selector: string): TextRule {
  return ($) => {
    const element = $(selector).first();
    if (element.length === 0) {
      return null;
    }
    const text = normalizeText(element.text());
    return text || null;
  };
}

/**
 * Try each rule in order; first non-empty text wins
 */
export function firstMatch($: CheerioAPI, rules: readonly TextRule[]): string | null {
  for (const rule of rules) {
    const text = rule($);
    if (text) {
      return text;
    }
  }
  return null;
}
