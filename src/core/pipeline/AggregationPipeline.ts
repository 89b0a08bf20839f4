// src/core/pipeline/AggregationPipeline.ts

import type { Dispatcher } from '../registry/Dispatcher';
import type { RelevanceFilter } from '../processing/RelevanceFilter';
import type { Summarizer } from '../processing/Summarizer';
import type { FilteredByPlatform, Report } from '../processing/types';
import type { Logger } from '../../observability/Logger';
import { AgentRegistry } from '../registry/AgentRegistry';
import { generateCorrelationId, withSpan } from '../../observability/tracing';

export interface AggregationRequest {
  keywords: string[];
  platforms: string[];
  detail: string;
}

/**
 * Crawl → filter → summarize.
 *
 * Platforms are dispatched one after another. A platform that yields
 * nothing (unknown, failed, or empty) is left out of the report; a filter
 * pass that keeps nothing is left out too. The summarizer runs exactly
 * once, so `run` always resolves to a Report.
 */
export class AggregationPipeline {
  constructor(
    private dispatcher: Dispatcher,
    private filter: RelevanceFilter,
    private summarizer: Summarizer,
    private logger: Logger
  ) {}

  async run(request: AggregationRequest): Promise<Report> {
    const correlationId = generateCorrelationId();
    const platforms = uniquePlatforms(request.platforms);
    const { keywords, detail } = request;

    return withSpan(
      'Aggregate',
      async () => {
        this.logger.info('Aggregation started', { correlationId, keywords, platforms });

        const filteredByPlatform: FilteredByPlatform = {};

        for (const platform of platforms) {
          const raw = await this.dispatcher.dispatch(platform, keywords, detail);
          if (raw.length === 0) {
            this.logger.info('No results from platform', { correlationId, platform });
            continue;
          }

          const filtered = await this.filter.filter({ results: raw, keywords, detail, platform });
          if (filtered.length > 0) {
            filteredByPlatform[platform] = filtered;
          }
        }

        const report = await this.summarizer.summarize({ filteredByPlatform, keywords, detail });

        this.logger.info('Aggregation completed', {
          correlationId,
          totalResults: report.totalResults,
          platforms: Object.keys(report.resultsByPlatform),
        });

        return report;
      },
      { 'aggregation.correlation_id': correlationId, 'aggregation.platforms': platforms.join(',') }
    );
  }
}

/** Case-insensitive de-duplication, first spelling wins, normalized to the registry key */
export function uniquePlatforms(platforms: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const platform of platforms) {
    const key = AgentRegistry.key(platform);
    if (key && !seen.has(key)) {
      seen.add(key);
      unique.push(key);
    }
  }

  return unique;
}
