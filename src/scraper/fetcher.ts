/**
 * HTTP Fetcher
 *
 * GET requests behind a per-source admission gate. Failures never throw:
 * callers receive null and decide how to continue.
 */

import axios, { type AxiosInstance } from 'axios';
import pLimit, { type LimitFunction } from 'p-limit';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { FetchOptions, PageFetcher } from './types.js';

export interface FetcherOptions {
  /** Maximum simultaneous requests */
  concurrency?: number;
  timeoutMs?: number;
  userAgent?: string;
  /** Pre-configured client; timeout and user agent are then ignored */
  http?: AxiosInstance;
}

export function createHttpClient(options: { timeoutMs: number; userAgent: string }): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'id-ID,id;q=0.9,en;q=0.8',
    },
  });
}

export class Fetcher implements PageFetcher {
  private readonly limit: LimitFunction;
  private readonly http: AxiosInstance;

  constructor(options: FetcherOptions = {}) {
    const {
      concurrency = config.crawler.concurrency,
      timeoutMs = config.http.timeout,
      userAgent = config.http.userAgent,
    } = options;

    this.limit = pLimit(concurrency);
    this.http = options.http ?? createHttpClient({ timeoutMs, userAgent });
  }

  /** Requests waiting for a slot */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    return this.limit(async () => {
      if (options.shouldProceed && !options.shouldProceed()) {
        logger.debug({ url }, 'Request cancelled before sending');
        return null;
      }
      return this.request(url);
    });
  }

  private async request(url: string): Promise<string | null> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        logger.warn({ url, status: response.status }, 'Non-success response');
        return null;
      }

      return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      logger.warn({ url, error }, 'Request failed');
      return null;
    }
  }
}
