// src/core/normalizer/PlatformMappers.ts

import { z } from 'zod';
import type { RawResult } from './types';

export interface MapperContext {
  platform: string;
  query: string;
  now: Date;
}

export type PlatformMapper = (raw: unknown, ctx: MapperContext) => RawResult | null;

export type MapperKind = 'google' | 'reddit' | 'github' | 'rss';

// Raw record shapes, only the fields we read
const GoogleItemSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  snippet: z.string().optional(),
  displayLink: z.string().optional(),
  pagemap: z
    .object({
      metatags: z.array(z.record(z.unknown())).optional(),
    })
    .passthrough()
    .optional(),
});

const RedditPostSchema = z.object({
  title: z.string().optional(),
  permalink: z.string().optional(),
  url: z.string().optional(),
  selftext: z.string().optional(),
  subreddit: z.string().optional(),
  author: z.string().optional(),
  score: z.number().optional(),
  num_comments: z.number().optional(),
  created_utc: z.number().optional(),
});

const GitHubRepoSchema = z.object({
  full_name: z.string().optional(),
  name: z.string().optional(),
  html_url: z.string().optional(),
  description: z.string().nullable().optional(),
  stargazers_count: z.number().optional(),
  language: z.string().nullable().optional(),
  topics: z.array(z.string()).optional(),
  updated_at: z.string().optional(),
  owner: z.object({ login: z.string() }).partial().optional(),
});

const FeedItemSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  guid: z.string().optional(),
  contentSnippet: z.string().optional(),
  content: z.string().optional(),
  isoDate: z.string().optional(),
  pubDate: z.string().optional(),
  creator: z.string().optional(),
  categories: z.array(z.unknown()).optional(),
});

function toIsoDate(value: string | number | undefined, fallback: Date): string {
  if (value === undefined) return fallback.toISOString();
  const date = new Date(value);
  return isNaN(date.getTime()) ? fallback.toISOString() : date.toISOString();
}

function publishedTime(metatags: Array<Record<string, unknown>> | undefined): string | undefined {
  for (const tags of metatags ?? []) {
    const value = tags['article:published_time'] ?? tags['og:updated_time'];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Maps raw search-API records of each platform kind onto RawResult.
 * A mapper returns null when the record is not shaped like its platform's
 * records at all; the Normalizer validates what comes back.
 */
export class PlatformMappers {
  private mappers: Map<string, PlatformMapper>;

  constructor() {
    this.mappers = new Map<string, PlatformMapper>([
      ['google', this.mapGoogle],
      ['reddit', this.mapReddit],
      ['github', this.mapGitHub],
      ['rss', this.mapFeedItem],
    ]);
  }

  get(kind: MapperKind | string): PlatformMapper | undefined {
    return this.mappers.get(kind);
  }

  // Google Custom Search item
  private mapGoogle(raw: unknown, ctx: MapperContext): RawResult | null {
    const parsed = GoogleItemSchema.safeParse(raw);
    if (!parsed.success) return null;
    const item = parsed.data;

    return {
      title: item.title ?? '',
      url: item.link ?? '',
      content: item.snippet ?? '',
      platform: ctx.platform,
      query: ctx.query,
      date: toIsoDate(publishedTime(item.pagemap?.metatags), ctx.now),
      metadata: { displayLink: item.displayLink },
    };
  }

  // Reddit search listing child (`children[].data`)
  private mapReddit(raw: unknown, ctx: MapperContext): RawResult | null {
    const parsed = RedditPostSchema.safeParse(raw);
    if (!parsed.success) return null;
    const post = parsed.data;

    return {
      title: post.title ?? '',
      url: post.permalink ? `https://www.reddit.com${post.permalink}` : (post.url ?? ''),
      content: post.selftext ?? '',
      platform: ctx.platform,
      query: ctx.query,
      date: toIsoDate(post.created_utc !== undefined ? post.created_utc * 1000 : undefined, ctx.now),
      metadata: {
        subreddit: post.subreddit,
        author: post.author,
        score: post.score,
        numComments: post.num_comments,
      },
    };
  }

  // GitHub repository search item
  private mapGitHub(raw: unknown, ctx: MapperContext): RawResult | null {
    const parsed = GitHubRepoSchema.safeParse(raw);
    if (!parsed.success) return null;
    const repo = parsed.data;

    return {
      title: repo.full_name ?? repo.name ?? '',
      url: repo.html_url ?? '',
      content: repo.description ?? '',
      platform: ctx.platform,
      query: ctx.query,
      date: toIsoDate(repo.updated_at, ctx.now),
      metadata: {
        stars: repo.stargazers_count,
        language: repo.language ?? undefined,
        topics: repo.topics,
        owner: repo.owner?.login,
      },
    };
  }

  // rss-parser item
  private mapFeedItem(raw: unknown, ctx: MapperContext): RawResult | null {
    const parsed = FeedItemSchema.safeParse(raw);
    if (!parsed.success) return null;
    const item = parsed.data;

    return {
      title: item.title ?? '',
      url: item.link ?? item.guid ?? '',
      content: item.contentSnippet ?? item.content ?? '',
      platform: ctx.platform,
      query: ctx.query,
      date: toIsoDate(item.isoDate ?? item.pubDate, ctx.now),
      metadata: {
        author: item.creator,
        categories: item.categories,
      },
    };
  }
}
