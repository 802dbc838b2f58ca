/**
 * Application configuration
 */

import { env } from './env.js';
import { parseKeywords, parseList } from './keywords.js';
import { parseIsoDate } from '../utils/dates.js';

export const config = {
  app: {
    name: 'keyword-news-crawler',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  crawler: {
    keywords: parseKeywords(env.KEYWORDS),
    sources: parseList(env.SOURCES).map((name) => name.toLowerCase()),
    concurrency: env.CONCURRENCY,
    startDate: env.START_DATE ? parseIsoDate(env.START_DATE) ?? undefined : undefined,
    endDate: env.END_DATE ? parseIsoDate(env.END_DATE) ?? undefined : undefined,
    maxPages: env.MAX_PAGES,
    resultBufferSize: env.RESULT_BUFFER_SIZE,
  },

  http: {
    userAgent: env.USER_AGENT,
    timeout: env.REQUEST_TIMEOUT_MS,
  },

  sources: {
    detik: {
      baseUrl: env.DETIK_BASE_URL,
    },
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;
export { env, parseEnv } from './env.js';
export { parseKeywords, parseList } from './keywords.js';
