/**
 * Keyword and source list handling
 */

/**
 * Split a comma-separated list, dropping blanks and case-insensitive
 * repeats while keeping the first-seen spelling and order.
 */
export function parseList(raw: string): string[] {
  const items = new Map<string, string>();

  for (const part of raw.split(',')) {
    const item = part.trim().replace(/\s+/g, ' ');
    const key = item.toLowerCase();
    if (item && !items.has(key)) {
      items.set(key, item);
    }
  }

  return [...items.values()];
}

export function parseKeywords(raw: string): string[] {
  return parseList(raw);
}
