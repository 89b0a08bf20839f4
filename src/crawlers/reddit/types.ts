// src/crawlers/reddit/types.ts

export interface RedditCrawlerConfig {
  /** Reddit asks for `platform:app_id:version (by /u/username)` */
  userAgent?: string;
  sort?: 'relevance' | 'hot' | 'top' | 'new' | 'comments';
  time?: 'hour' | 'day' | 'week' | 'month' | 'year' | 'all';
  limit?: number;
}

export interface RedditListingResponse {
  kind?: string;
  data?: {
    after?: string | null;
    children?: Array<{ kind?: string; data?: unknown }>;
  };
}
