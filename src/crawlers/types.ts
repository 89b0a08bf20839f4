// src/crawlers/types.ts

import type { RawResult } from '../core/normalizer/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

/**
 * A platform capability that turns keywords into raw search results.
 * Implementations may throw; the dispatcher contains the failure.
 */
export interface CrawlerAgent {
  readonly platform: string;

  crawl(keywords: string[], detail: string): Promise<RawResult[]>;
}

/**
 * On-demand construction of a crawler for a platform nobody registered.
 * Resolves to undefined when the platform cannot be supported.
 */
export interface AgentSynthesizer {
  synthesize(platform: string): Promise<CrawlerAgent | undefined>;
}

export interface CrawlerDeps {
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
