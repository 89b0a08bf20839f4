// src/core/registry/Dispatcher.ts

import type { CrawlerAgent } from '../../crawlers/types';
import type { RawResult } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { AgentRegistry } from './AgentRegistry';
import { withCrawlSpan } from '../../observability/tracing';
import { errorMessage } from '../../utils/errors';

/**
 * Routes a platform name to its crawler agent.
 *
 * `dispatch` never rejects: a crawl that throws, or a platform that cannot
 * be synthesized, yields an empty list for that platform only.
 */
export class Dispatcher {
  constructor(
    private registry: AgentRegistry,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async dispatch(platform: string, keywords: string[], detail: string): Promise<RawResult[]> {
    const key = AgentRegistry.key(platform);
    let agent = this.registry.get(key);

    if (!agent) {
      this.logger.info('No agent for platform, attempting synthesis', { platform: key });
      agent = await this.registry.synthesize(key);

      if (!agent) {
        this.logger.warn('Platform skipped, no agent available', {
          platform: key,
          available: this.registry.platforms(),
        });
        return [];
      }
    }

    return this.crawl(key, agent, keywords, detail);
  }

  private async crawl(
    platform: string,
    agent: CrawlerAgent,
    keywords: string[],
    detail: string
  ): Promise<RawResult[]> {
    const startTime = Date.now();

    try {
      const results = await withCrawlSpan(platform, () => agent.crawl(keywords, detail));
      const usable = results.filter((r) => r.title.trim().length > 0 && r.url.trim().length > 0);

      if (usable.length < results.length) {
        this.logger.debug('Dropped results without title or url', {
          platform,
          dropped: results.length - usable.length,
        });
      }

      this.metrics.recordLatency('crawl_duration', Date.now() - startTime, { platform });
      this.metrics.recordGauge('results_raw', usable.length, { platform });
      this.logger.info('Dispatch completed', { platform, resultCount: usable.length });

      return usable;
    } catch (error: unknown) {
      this.metrics.incrementCounter('crawl_failures', { platform });
      this.logger.error('Crawl failed', { platform, error: errorMessage(error) });
      return [];
    }
  }
}
