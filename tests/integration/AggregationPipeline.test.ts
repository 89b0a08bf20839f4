// tests/integration/AggregationPipeline.test.ts

import { describe, it, expect } from 'vitest';
import { AggregationPipeline, uniquePlatforms } from '../../src/core/pipeline/AggregationPipeline';
import { AgentRegistry } from '../../src/core/registry/AgentRegistry';
import { Dispatcher } from '../../src/core/registry/Dispatcher';
import { RelevanceFilter } from '../../src/core/processing/RelevanceFilter';
import { Summarizer } from '../../src/core/processing/Summarizer';
import type { CrawlerAgent } from '../../src/crawlers/types';
import {
  disabledMetrics,
  fakeAgent,
  fakeJudge,
  makeResults,
  silentLogger,
  type FakeJudge,
} from '../helpers';

function createPipeline(agents: CrawlerAgent[], judge?: FakeJudge) {
  const logger = silentLogger();
  const metrics = disabledMetrics();
  const registry = new AgentRegistry(logger, metrics);
  for (const agent of agents) {
    registry.register(agent.platform, agent);
  }

  return new AggregationPipeline(
    new Dispatcher(registry, logger, metrics),
    new RelevanceFilter(judge, logger, metrics),
    new Summarizer(judge, logger, metrics),
    logger
  );
}

describe('AggregationPipeline', () => {
  it('should crawl, filter and summarize across platforms', async () => {
    const google = makeResults(3, 'google');
    const reddit = makeResults(2, 'reddit');
    const judge = fakeJudge(
      '[{"index": 0, "score": 8, "reason": "g0"}, {"index": 1, "score": 3, "reason": "g1"}, {"index": 2, "score": 6, "reason": "g2"}]',
      '```json\n[{"index": 0, "score": 2, "reason": "r0"}, {"index": 1, "score": 9, "reason": "r1"}]\n```',
      'Google and Reddit both had useful threads.'
    );

    const report = await createPipeline(
      [fakeAgent('google', google), fakeAgent('reddit', reddit)],
      judge
    ).run({ keywords: ['vitest'], platforms: ['google', 'reddit'], detail: '' });

    expect(report).toEqual({
      summary: 'Google and Reddit both had useful threads.',
      totalResults: 3,
      resultsByPlatform: {
        google: [
          { ...google[0], relevanceScore: 8, relevanceReason: 'g0' },
          { ...google[2], relevanceScore: 6, relevanceReason: 'g2' },
        ],
        reddit: [{ ...reddit[1], relevanceScore: 9, relevanceReason: 'r1' }],
      },
      topResults: {
        google: [
          { title: 'google result 0', score: 8, reason: 'g0' },
          { title: 'google result 2', score: 6, reason: 'g2' },
        ],
        reddit: [{ title: 'reddit result 1', score: 9, reason: 'r1' }],
      },
    });
    expect(judge.invoke).toHaveBeenCalledTimes(3);
  });

  it('should leave out platforms that return nothing or keep nothing', async () => {
    const judge = fakeJudge('[{"index": 0, "score": 1, "reason": "no"}]', 'unused');
    const failing = fakeAgent('github', new Error('rate limited'));
    const empty = fakeAgent('rss', []);

    const report = await createPipeline(
      [fakeAgent('google', makeResults(1)), failing, empty],
      judge
    ).run({ keywords: ['x'], platforms: ['google', 'github', 'rss', 'unknown'], detail: '' });

    expect(report).toEqual({
      summary: 'No relevant results found matching your criteria.',
      totalResults: 0,
      resultsByPlatform: {},
    });
    // Only the google filter call; nothing was left to summarize
    expect(judge.invoke).toHaveBeenCalledTimes(1);
  });

  it('should report no results when every platform fails', async () => {
    const report = await createPipeline([fakeAgent('google', new Error('down'))]).run({
      keywords: ['x'],
      platforms: ['google', 'reddit'],
      detail: '',
    });

    expect(report).toEqual({
      summary: 'No relevant results found matching your criteria.',
      totalResults: 0,
      resultsByPlatform: {},
    });
  });

  it('should dispatch a platform named twice only once', async () => {
    const agent = fakeAgent('github', makeResults(1, 'github'));

    const report = await createPipeline([agent]).run({
      keywords: ['x'],
      platforms: ['GitHub', 'github', ' GITHUB '],
      detail: '',
    });

    expect(agent.crawl).toHaveBeenCalledTimes(1);
    expect(Object.keys(report.resultsByPlatform)).toEqual(['github']);
  });

  it('should pass everything through without a judge', async () => {
    const results = makeResults(4, 'reddit');

    const report = await createPipeline([fakeAgent('reddit', results)]).run({
      keywords: ['x'],
      platforms: ['reddit'],
      detail: 'anything',
    });

    expect(report).toEqual({
      summary:
        'No summary generated (relevance judge not configured). Found 4 results across 1 platforms.',
      totalResults: 4,
      resultsByPlatform: { reddit: results },
    });
  });
});

describe('uniquePlatforms', () => {
  it('should normalize, drop blanks and keep first occurrence order', () => {
    expect(uniquePlatforms(['Reddit', ' google', '', 'REDDIT', 'github', '  '])).toEqual([
      'reddit',
      'google',
      'github',
    ]);
  });
});
