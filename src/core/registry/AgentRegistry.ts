// src/core/registry/AgentRegistry.ts

import type { AgentSynthesizer, CrawlerAgent } from '../../crawlers/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { errorMessage } from '../../utils/errors';

/**
 * Platform name → crawler agent, keyed case-insensitively.
 *
 * One instance per process (or per test fixture), passed to the dispatcher.
 * Synthesis for a key runs at most once at a time: concurrent callers share
 * the in-flight promise, and the insert never replaces an existing agent.
 */
export class AgentRegistry {
  private agents: Map<string, CrawlerAgent> = new Map();
  private pendingSynthesis: Map<string, Promise<CrawlerAgent | undefined>> = new Map();

  constructor(
    private logger: Logger,
    private metrics: MetricsCollector,
    private synthesizer?: AgentSynthesizer
  ) {}

  static key(platform: string): string {
    return platform.trim().toLowerCase();
  }

  /**
   * Register (or replace) the agent for a platform
   */
  register(platform: string, agent: CrawlerAgent): void {
    const key = AgentRegistry.key(platform);
    this.agents.set(key, agent);
    this.logger.info('Crawler agent registered', { platform: key });
  }

  get(platform: string): CrawlerAgent | undefined {
    return this.agents.get(AgentRegistry.key(platform));
  }

  has(platform: string): boolean {
    return this.agents.has(AgentRegistry.key(platform));
  }

  platforms(): string[] {
    return Array.from(this.agents.keys());
  }

  /**
   * Try to build and register an agent for an unknown platform.
   *
   * Resolves to the registered agent, or undefined when no synthesizer is
   * configured, it declines the platform, or it throws.
   */
  async synthesize(platform: string): Promise<CrawlerAgent | undefined> {
    const key = AgentRegistry.key(platform);

    const existing = this.agents.get(key);
    if (existing) return existing;

    const inFlight = this.pendingSynthesis.get(key);
    if (inFlight) {
      this.logger.debug('Synthesis already in progress, waiting', { platform: key });
      return inFlight;
    }

    const attempt = this.runSynthesis(key).finally(() => {
      this.pendingSynthesis.delete(key);
    });
    this.pendingSynthesis.set(key, attempt);
    return attempt;
  }

  private async runSynthesis(key: string): Promise<CrawlerAgent | undefined> {
    if (!this.synthesizer) {
      this.metrics.incrementCounter('synthesis_total', { platform: key, status: 'unsupported' });
      return undefined;
    }

    this.logger.info('Synthesizing crawler agent', { platform: key });

    let agent: CrawlerAgent | undefined;
    try {
      agent = await this.synthesizer.synthesize(key);
    } catch (error: unknown) {
      this.logger.warn('Crawler agent synthesis failed', { platform: key, error: errorMessage(error) });
      this.metrics.incrementCounter('synthesis_total', { platform: key, status: 'failed' });
      return undefined;
    }

    if (!agent) {
      this.logger.warn('Crawler agent synthesis declined', { platform: key });
      this.metrics.incrementCounter('synthesis_total', { platform: key, status: 'declined' });
      return undefined;
    }

    // Someone may have registered the platform while we were synthesizing
    const current = this.agents.get(key);
    if (current) {
      return current;
    }

    this.agents.set(key, agent);
    this.metrics.incrementCounter('synthesis_total', { platform: key, status: 'success' });
    this.logger.info('Crawler agent synthesized', { platform: key });
    return agent;
  }
}
