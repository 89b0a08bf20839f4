import { FeedCrawler } from './FeedCrawler';
import type { AgentSynthesizer, CrawlerAgent, CrawlerDeps } from '../types';
import { QUERY_PLACEHOLDER } from './types';
import { SynthesisError } from '../../utils/errors';

/**
 * Builds feed-backed crawlers for platforms that have a configured search
 * feed template. Platforms without one cannot be synthesized.
 */
export class FeedAgentSynthesizer implements AgentSynthesizer {
  private templates: Map<string, string>;

  constructor(
    private deps: CrawlerDeps,
    feedTemplates: Record<string, string> = {}
  ) {
    this.templates = new Map(
      Object.entries(feedTemplates).map(([platform, template]) => [platform.toLowerCase(), template])
    );
  }

  async synthesize(platform: string): Promise<CrawlerAgent | undefined> {
    const key = platform.toLowerCase();
    const urlTemplate = this.templates.get(key);

    if (!urlTemplate) {
      this.deps.logger.debug('No search feed template for platform', { platform: key });
      return undefined;
    }
    if (!urlTemplate.includes(QUERY_PLACEHOLDER)) {
      throw new SynthesisError(`Feed template for ${key} lacks ${QUERY_PLACEHOLDER}`, { platform: key });
    }

    return new FeedCrawler(this.deps, { platform: key, urlTemplate });
  }
}
