/**
 * In-process stand-ins for the network and the result sink
 */

import type { ArticleRecord } from '../../types/index.js';
import type { FetchOptions, PageFetcher, RecordSink } from '../types.js';

/**
 * Wait until every pending promise continuation has run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Serves pages from a map; unknown URLs behave like failed requests
 */
export class FakeFetcher implements PageFetcher {
  /** Every URL passed to fetch() */
  readonly requested: string[] = [];
  /** URLs admitted and answered */
  readonly sent: string[] = [];
  private readonly pages = new Map<string, string>();

  constructor(pages: Record<string, string> = {}) {
    for (const [url, html] of Object.entries(pages)) {
      this.pages.set(url, html);
    }
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    this.requested.push(url);
    await Promise.resolve();
    if (options.shouldProceed && !options.shouldProceed()) {
      return null;
    }
    this.sent.push(url);
    return this.pages.get(url) ?? null;
  }
}

interface HeldRequest {
  url: string;
  options: FetchOptions;
  resolve: (html: string | null) => void;
}

/**
 * Holds matching requests until the test admits them one at a time,
 * mimicking a gate with a single slot.
 */
export class GatedFetcher implements PageFetcher {
  readonly sent: string[] = [];
  private readonly held: HeldRequest[] = [];

  constructor(
    private readonly pages: ReadonlyMap<string, string>,
    private readonly isGated: (url: string) => boolean
  ) {}

  get waiting(): number {
    return this.held.length;
  }

  fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    if (!this.isGated(url)) {
      this.sent.push(url);
      return Promise.resolve(this.pages.get(url) ?? null);
    }
    return new Promise((resolve) => {
      this.held.push({ url, options, resolve });
    });
  }

  admitNext(): void {
    this.sendNext()();
  }

  /**
   * Admit the next request now and return a callback that delivers its
   * response later
   */
  sendNext(): () => void {
    const next = this.held.shift();
    if (!next) {
      throw new Error('No request is waiting');
    }
    if (next.options.shouldProceed && !next.options.shouldProceed()) {
      next.resolve(null);
      return () => undefined;
    }
    this.sent.push(next.url);
    return () => next.resolve(this.pages.get(next.url) ?? null);
  }
}

export class CollectingSink implements RecordSink {
  readonly records: ArticleRecord[] = [];

  async put(record: ArticleRecord): Promise<void> {
    this.records.push(record);
  }
}
