// src/crawlers/rss/types.ts

export interface FeedCrawlerConfig {
  /** Platform name the results are attributed to */
  platform: string;
  /** Search feed URL with a `{query}` placeholder */
  urlTemplate: string;
  limit?: number;
}

export const QUERY_PLACEHOLDER = '{query}';
