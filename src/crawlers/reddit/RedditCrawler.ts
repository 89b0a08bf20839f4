import { BaseCrawler } from '../BaseCrawler';
import type { CrawlerDeps } from '../types';
import type { RawResult } from '../../core/normalizer/types';
import type { RedditCrawlerConfig, RedditListingResponse } from './types';

const DEFAULT_USER_AGENT = 'web:issue-radar:v0.1.0 (by /u/issue-radar)';

/**
 * Reddit site-wide search over the public JSON listing endpoint.
 *
 * @example
 * ```typescript
 * const reddit = new RedditCrawler(deps, { sort: 'new', time: 'week' });
 * const posts = await reddit.crawl(['typescript', 'monorepo'], '');
 * ```
 */
export class RedditCrawler extends BaseCrawler {
  readonly platform = 'reddit';

  constructor(
    deps: CrawlerDeps,
    private config: RedditCrawlerConfig = {}
  ) {
    super(deps);
  }

  protected async search(query: string): Promise<RawResult[]> {
    const limit = Math.min(this.config.limit ?? 50, 100); // Reddit max is 100

    const response = await this.deps.http.get<RedditListingResponse>(
      'https://www.reddit.com/search.json',
      {
        target: this.platform,
        headers: {
          'User-Agent': this.config.userAgent ?? DEFAULT_USER_AGENT,
        },
        query: {
          q: query,
          sort: this.config.sort ?? 'relevance',
          t: this.config.time ?? 'month',
          limit,
          raw_json: 1, // Avoid HTML entity encoding
        },
      }
    );

    const children = response.data?.data?.children;
    if (!children) {
      return [];
    }

    const rawPosts = children.map((child) => child.data);
    const normalized = this.deps.normalizer.normalize(
      'reddit',
      { platform: this.platform, query },
      rawPosts
    );

    this.deps.logger.debug('Reddit listing received', {
      query,
      itemCount: normalized.length,
      hasMore: !!response.data.data?.after,
    });

    return normalized;
  }
}
