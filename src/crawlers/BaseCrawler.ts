// src/crawlers/BaseCrawler.ts

import type { CrawlerAgent, CrawlerDeps } from './types';
import type { RawResult } from '../core/normalizer/types';

export abstract class BaseCrawler implements CrawlerAgent {
  abstract readonly platform: string;

  /** Upper bound on results returned by one crawl */
  protected maxResults = 100;

  constructor(protected deps: CrawlerDeps) {}

  /**
   * Default crawl: one search for all keywords joined by a space.
   * Errors propagate to the caller.
   */
  async crawl(keywords: string[], detail: string): Promise<RawResult[]> {
    const query = this.buildQuery(keywords);
    if (!query) {
      return [];
    }

    this.deps.logger.info('Crawl started', { platform: this.platform, query });

    const results = (await this.search(query, detail)).slice(0, this.maxResults);

    this.deps.logger.info('Crawl completed', {
      platform: this.platform,
      query,
      itemCount: results.length,
    });

    return results;
  }

  protected buildQuery(keywords: string[]): string {
    return keywords
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
      .join(' ');
  }

  protected abstract search(query: string, detail: string): Promise<RawResult[]>;
}
