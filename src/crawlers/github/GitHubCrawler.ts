// src/crawlers/github/GitHubCrawler.ts

import { BaseCrawler } from '../BaseCrawler';
import type { CrawlerDeps } from '../types';
import type { RawResult } from '../../core/normalizer/types';

export interface GitHubCrawlerConfig {
  token?: string; // Raises the search rate limit from 10 to 30 requests/minute
  sort?: 'stars' | 'forks' | 'updated' | 'best-match';
  limit?: number;
}

interface RepositorySearchResponse {
  total_count?: number;
  items?: unknown[];
}

export class GitHubCrawler extends BaseCrawler {
  readonly platform = 'github';

  constructor(
    deps: CrawlerDeps,
    private config: GitHubCrawlerConfig = {}
  ) {
    super(deps);
  }

  protected async search(query: string): Promise<RawResult[]> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    const sort = this.config.sort ?? 'best-match';
    const response = await this.deps.http.get<RepositorySearchResponse>(
      'https://api.github.com/search/repositories',
      {
        target: this.platform,
        headers,
        query: {
          q: query,
          per_page: Math.min(this.config.limit ?? 50, 100),
          // best-match is the API default and is selected by omitting sort
          ...(sort === 'best-match' ? {} : { sort, order: 'desc' }),
        },
      }
    );

    return this.deps.normalizer.normalize(
      'github',
      { platform: this.platform, query },
      response.data.items ?? []
    );
  }
}
