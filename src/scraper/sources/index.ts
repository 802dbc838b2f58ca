/**
 * Source registry
 */

import { createDetikSource } from './detik.js';
import type { NewsSource } from '../types.js';

const SOURCE_FACTORIES: Readonly<Record<string, () => NewsSource>> = {
  detik: () => createDetikSource(),
};

export const AVAILABLE_SOURCES: readonly string[] = Object.keys(SOURCE_FACTORIES);

/**
 * Map configured source names to their capability sets
 *
 * @throws Error naming the first unknown source
 */
export function resolveSources(names: readonly string[]): NewsSource[] {
  return names.map((name) => {
    const factory = SOURCE_FACTORIES[name.toLowerCase()];
    if (!factory) {
      throw new Error(
        `Unknown source "${name}". Available sources: ${AVAILABLE_SOURCES.join(', ')}`
      );
    }
    return factory();
  });
}

export { createDetikSource } from './detik.js';
