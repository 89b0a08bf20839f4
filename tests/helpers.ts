// tests/helpers.ts

import { vi, type Mock } from 'vitest';
import { Logger } from '../src/observability/Logger';
import { MetricsCollector } from '../src/observability/MetricsCollector';
import { HttpCore } from '../src/core/http/HttpCore';
import { Normalizer } from '../src/core/normalizer/Normalizer';
import type { RawResult } from '../src/core/normalizer/types';
import type { JudgeCallOptions, JudgeOracle } from '../src/core/judge/types';
import type { CrawlerAgent, CrawlerDeps } from '../src/crawlers/types';

export function silentLogger(): Logger {
  return new Logger({ silent: true });
}

export function disabledMetrics(): MetricsCollector {
  return new MetricsCollector({ enabled: false });
}

/** Real crawler dependencies with retries off, for nock-backed tests */
export function testCrawlerDeps(now = new Date('2024-06-01T12:00:00.000Z')): CrawlerDeps {
  const logger = silentLogger();
  const metrics = disabledMetrics();
  const http = new HttpCore(
    {},
    { maxRetries: 0, baseDelay: 1, maxDelay: 1, retryableStatusCodes: [] },
    metrics,
    logger
  );
  return { http, normalizer: new Normalizer(logger, () => now), logger, metrics };
}

export function makeResult(overrides: Partial<RawResult> = {}): RawResult {
  return {
    title: 'Result',
    url: 'https://example.com/result',
    content: 'Body',
    platform: 'google',
    query: 'test',
    date: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeResults(count: number, platform = 'google'): RawResult[] {
  return Array.from({ length: count }, (_, i) =>
    makeResult({
      title: `${platform} result ${i}`,
      url: `https://example.com/${platform}/${i}`,
      content: `${platform} content ${i}`,
      platform,
    })
  );
}

export type FakeJudge = JudgeOracle & {
  invoke: Mock<(prompt: string, options?: JudgeCallOptions) => Promise<string>>;
};

/**
 * Judge answering with the given responses in order; an Error is thrown
 * instead of returned. Answers '' once the queue is empty.
 */
export function fakeJudge(...responses: Array<string | Error>): FakeJudge {
  const queue = [...responses];
  const invoke = vi.fn(async (_prompt: string, _options?: JudgeCallOptions): Promise<string> => {
    const next = queue.shift();
    if (next instanceof Error) throw next;
    return next ?? '';
  });
  return { name: 'fake', invoke };
}

export type FakeAgent = CrawlerAgent & {
  crawl: Mock<(keywords: string[], detail: string) => Promise<RawResult[]>>;
};

export function fakeAgent(platform: string, results: RawResult[] | Error): FakeAgent {
  const crawl = vi.fn(async (_keywords: string[], _detail: string): Promise<RawResult[]> => {
    if (results instanceof Error) throw results;
    return results;
  });
  return { platform, crawl };
}

/** Promise with its resolve handle exposed */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
