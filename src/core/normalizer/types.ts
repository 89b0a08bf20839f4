// src/core/normalizer/types.ts

/**
 * One crawled search-result item, before relevance scoring.
 * `title` and `url` are always non-empty once an item leaves the normalizer.
 */
export interface RawResult {
  title: string;
  url: string;
  content: string;
  platform: string; // 'google', 'reddit', 'github', ...
  query: string; // Search string that produced the item
  date: string; // ISO 8601 timestamp, crawl time when the source has none
  metadata?: Record<string, unknown>;
}

export type BuiltInPlatform = 'google' | 'reddit' | 'github';
