import Parser from 'rss-parser';
import { BaseCrawler } from '../BaseCrawler';
import type { CrawlerDeps } from '../types';
import type { RawResult } from '../../core/normalizer/types';
import { QUERY_PLACEHOLDER, type FeedCrawlerConfig } from './types';
import { ConfigError, CrawlError } from '../../utils/errors';

/**
 * Crawler over any search endpoint that answers with an RSS/Atom feed.
 *
 * @example
 * ```typescript
 * const hn = new FeedCrawler(deps, {
 *   platform: 'hackernews',
 *   urlTemplate: 'https://hnrss.org/newest?q={query}',
 * });
 * const items = await hn.crawl(['vitest'], '');
 * ```
 */
export class FeedCrawler extends BaseCrawler {
  readonly platform: string;
  private parser: Parser;

  constructor(
    deps: CrawlerDeps,
    private config: FeedCrawlerConfig
  ) {
    super(deps);
    if (!config.urlTemplate.includes(QUERY_PLACEHOLDER)) {
      throw new ConfigError(`Feed template for ${config.platform} lacks ${QUERY_PLACEHOLDER}`, {
        platform: config.platform,
      });
    }
    this.platform = config.platform.toLowerCase();
    this.parser = new Parser();
  }

  protected async search(query: string): Promise<RawResult[]> {
    const feedUrl = this.config.urlTemplate.replace(QUERY_PLACEHOLDER, encodeURIComponent(query));

    const response = await this.deps.http.get<unknown>(feedUrl, {
      target: this.platform,
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
      },
    });

    if (typeof response.data !== 'string') {
      throw new CrawlError(`Feed for ${this.platform} did not return XML`, { feedUrl });
    }

    const feed = await this.parser.parseString(response.data).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.deps.logger.error('Feed parse error', { platform: this.platform, feedUrl, error: message });
      throw new CrawlError(`Failed to parse feed: ${message}`, { platform: this.platform, feedUrl });
    });

    const rawItems = (feed.items ?? []).slice(0, this.config.limit ?? 50);

    return this.deps.normalizer.normalize('rss', { platform: this.platform, query }, rawItems);
  }
}
