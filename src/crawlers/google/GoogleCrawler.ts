// src/crawlers/google/GoogleCrawler.ts

import { BaseCrawler } from '../BaseCrawler';
import type { CrawlerDeps } from '../types';
import type { RawResult } from '../../core/normalizer/types';
import { ConfigError } from '../../utils/errors';

export interface GoogleCrawlerConfig {
  apiKey: string;
  searchEngineId: string;
  maxPages?: number;
}

interface CustomSearchResponse {
  items?: unknown[];
  queries?: { nextPage?: unknown[] };
}

const PAGE_SIZE = 10; // Custom Search maximum per request

/**
 * Web search through the Google Custom Search JSON API.
 *
 * Pages through up to `maxPages` result pages (default 3) and stops early
 * when the API reports no next page.
 */
export class GoogleCrawler extends BaseCrawler {
  readonly platform = 'google';

  constructor(
    deps: CrawlerDeps,
    private config: GoogleCrawlerConfig
  ) {
    super(deps);
    if (!config.apiKey || !config.searchEngineId) {
      throw new ConfigError('Google crawler requires apiKey and searchEngineId');
    }
  }

  protected async search(query: string): Promise<RawResult[]> {
    const maxPages = this.config.maxPages ?? 3;
    const rawItems: unknown[] = [];

    for (let page = 0; page < maxPages; page++) {
      const response = await this.deps.http.get<CustomSearchResponse>(
        'https://www.googleapis.com/customsearch/v1',
        {
          target: this.platform,
          query: {
            key: this.config.apiKey,
            cx: this.config.searchEngineId,
            q: query,
            num: PAGE_SIZE,
            start: page * PAGE_SIZE + 1,
          },
        }
      );

      const items = response.data.items ?? [];
      rawItems.push(...items);

      if (items.length < PAGE_SIZE || !response.data.queries?.nextPage) {
        break;
      }
    }

    return this.deps.normalizer.normalize('google', { platform: this.platform, query }, rawItems);
  }
}
