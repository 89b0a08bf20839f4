// src/sdk.ts

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { CrawlerAgent, CrawlerDeps } from './crawlers/types';
import type { RateLimitConfig } from './core/http/types';
import type { JudgeOracle } from './core/judge/types';
import type { Report } from './core/processing/types';
import type {
  Notification,
  NotificationSink,
  Subscription,
  SubscriptionStore,
} from './subscriptions/types';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { createJudge } from './core/judge/createJudge';
import { AgentRegistry } from './core/registry/AgentRegistry';
import { Dispatcher } from './core/registry/Dispatcher';
import { RelevanceFilter } from './core/processing/RelevanceFilter';
import { Summarizer } from './core/processing/Summarizer';
import { AggregationPipeline } from './core/pipeline/AggregationPipeline';
import { GoogleCrawler } from './crawlers/google/GoogleCrawler';
import { RedditCrawler } from './crawlers/reddit/RedditCrawler';
import { GitHubCrawler } from './crawlers/github/GitHubCrawler';
import { FeedCrawler } from './crawlers/rss/FeedCrawler';
import { FeedAgentSynthesizer } from './crawlers/rss/FeedAgentSynthesizer';
import { MemorySubscriptionStore } from './subscriptions/MemorySubscriptionStore';
import { RedisSubscriptionStore } from './subscriptions/RedisSubscriptionStore';
import { SubscriptionChecker } from './subscriptions/SubscriptionChecker';
import { SubscriptionScheduler } from './subscriptions/SubscriptionScheduler';
import { LogNotificationSink } from './subscriptions/LogNotificationSink';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, type AggregatorConfig, type ResolvedConfig } from './config/ConfigValidator';
import { InvalidRequestError, errorMessage } from './utils/errors';

const DEFAULT_RATE_LIMITS: Record<string, RateLimitConfig> = {
  google: { qps: 1, concurrency: 2 },
  reddit: { qps: 1, concurrency: 1 },
  github: { qps: 0.5, concurrency: 2 }, // Search API: 30 requests/minute with a token
  gemini: { qps: 5, concurrency: 4 },
  anthropic: { qps: 2, concurrency: 2 },
};

const keywordList = z
  .array(z.string())
  .transform((keywords) => keywords.map((k) => k.trim()).filter((k) => k.length > 0))
  .pipe(z.array(z.string()).min(1, 'At least one non-empty keyword is required'));

const platformList = z
  .array(z.string().trim().min(1, 'Platform names must not be empty'))
  .min(1, 'At least one platform is required');

export const SearchRequestSchema = z.object({
  keywords: keywordList,
  platforms: platformList,
  detail: z.string().default(''),
});

export type SearchRequest = z.input<typeof SearchRequestSchema>;

export const SubscribeRequestSchema = SearchRequestSchema.extend({
  userId: z.string().min(1),
  email: z.string().email().optional(),
});

export type SubscribeRequest = z.input<typeof SubscribeRequestSchema>;

export interface InitOptions {
  /** Use this judge instead of the one described by `config.judge` */
  judge?: JudgeOracle;
  store?: SubscriptionStore;
  sink?: NotificationSink;
}

interface CoreDeps extends CrawlerDeps {
  judge?: JudgeOracle;
  registry: AgentRegistry;
  pipeline: AggregationPipeline;
  store: SubscriptionStore;
}

export class IssueRadar {
  private core: CoreDeps;
  private storeMode: 'memory' | 'redis' | 'custom';

  /**
   * Dependencies are built before `this.core` is assigned
   */
  private constructor(
    private config: ResolvedConfig,
    logger: Logger,
    metrics: MetricsCollector,
    store: SubscriptionStore,
    storeMode: 'memory' | 'redis' | 'custom',
    private sink: NotificationSink | undefined,
    judgeOverride: JudgeOracle | undefined
  ) {
    const normalizer = new Normalizer(logger);
    const http = new HttpCore(
      { ...DEFAULT_RATE_LIMITS, ...config.rateLimits },
      config.http.retry,
      metrics,
      logger,
      config.http.timeout
    );
    const crawlerDeps: CrawlerDeps = { http, normalizer, logger, metrics };

    const judge = judgeOverride ?? createJudge(config.judge, http, logger, metrics);
    const synthesizer = config.synthesis.enabled
      ? new FeedAgentSynthesizer(crawlerDeps, config.synthesis.feedTemplates)
      : undefined;
    const registry = new AgentRegistry(logger, metrics, synthesizer);
    const pipeline = new AggregationPipeline(
      new Dispatcher(registry, logger, metrics),
      new RelevanceFilter(judge, logger, metrics),
      new Summarizer(judge, logger, metrics),
      logger
    );

    this.core = { ...crawlerDeps, judge, registry, pipeline, store };
    this.storeMode = storeMode;

    this.registerDefaultAgents();
  }

  /**
   * Initialize the aggregator
   *
   * Validates the configuration, builds the crawler registry and the judge,
   * and connects the subscription store. A Redis store that cannot be
   * reached is replaced by the in-memory store.
   *
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const radar = await IssueRadar.init({
   *   judge: { provider: 'gemini', apiKey: process.env.GOOGLE_API_KEY ?? '' },
   *   platforms: {
   *     google: { apiKey: process.env.GOOGLE_CSE_KEY ?? '', searchEngineId: 'my-engine' },
   *   },
   *   synthesis: {
   *     feedTemplates: { hackernews: 'https://hnrss.org/newest?q={query}' },
   *   },
   * });
   * ```
   */
  static async init(config: AggregatorConfig, options: InitOptions = {}): Promise<IssueRadar> {
    const validated = validateConfig(config);

    const logger = new Logger(validated.logging);
    const metrics = new MetricsCollector(validated.metrics, logger);
    const { store, mode } = await IssueRadar.openStore(validated, logger, options.store);

    const radar = new IssueRadar(validated, logger, metrics, store, mode, options.sink, options.judge);

    logger.info('Issue radar initialized', {
      platforms: radar.getAvailablePlatforms(),
      judge: radar.core.judge?.name ?? 'none',
      subscriptionStore: mode,
    });

    return radar;
  }

  /**
   * Crawl, filter and summarize in one call
   *
   * Platform and judge failures never reject; they shrink or degrade the
   * report instead.
   *
   * @throws {InvalidRequestError} If keywords or platforms are missing
   *
   * @example
   * ```typescript
   * const report = await radar.search({
   *   keywords: ['vitest', 'flaky'],
   *   platforms: ['github', 'reddit', 'hackernews'],
   *   detail: 'reports from the last few months',
   * });
   * console.log(report.summary, report.totalResults);
   * ```
   */
  async search(request: SearchRequest): Promise<Report> {
    const parsed = SearchRequestSchema.safeParse(request);
    if (!parsed.success) {
      const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new InvalidRequestError(`Invalid search request: ${errors.join('; ')}`, { errors });
    }

    return this.core.pipeline.run(parsed.data);
  }

  /**
   * Register a custom crawler agent
   *
   * @example
   * ```typescript
   * radar.registerAgent('changelog', {
   *   platform: 'changelog',
   *   crawl: async (keywords) => fetchChangelogEntries(keywords),
   * });
   * ```
   */
  registerAgent(platform: string, agent: CrawlerAgent): void {
    this.core.registry.register(platform, agent);
  }

  getAvailablePlatforms(): string[] {
    return this.core.registry.platforms();
  }

  /**
   * Store a new recurring search for a user
   *
   * @throws {InvalidRequestError} If the request is incomplete
   */
  async subscribe(request: SubscribeRequest): Promise<Subscription> {
    const parsed = SubscribeRequestSchema.safeParse(request);
    if (!parsed.success) {
      const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new InvalidRequestError(`Invalid subscription: ${errors.join('; ')}`, { errors });
    }

    const subscription: Subscription = {
      id: uuidv4(),
      ...parsed.data,
      active: true,
      createdAt: new Date().toISOString(),
    };
    await this.core.store.save(subscription);
    this.core.logger.info('Subscription created', {
      subscriptionId: subscription.id,
      userId: subscription.userId,
    });

    return subscription;
  }

  /**
   * Deactivate a subscription. Resolves to false when it does not exist.
   */
  async unsubscribe(userId: string, subscriptionId: string): Promise<boolean> {
    const existing = await this.core.store.get(userId, subscriptionId);
    if (!existing) return false;

    await this.core.store.save({ ...existing, active: false });
    return true;
  }

  /**
   * Stored notifications for a user, newest first
   */
  async listNotifications(userId: string, limit?: number): Promise<Notification[]> {
    return this.core.store.listNotifications(userId, limit);
  }

  createSubscriptionChecker(sink?: NotificationSink): SubscriptionChecker {
    const { pipeline, store, logger, metrics } = this.core;
    return new SubscriptionChecker(
      pipeline,
      store,
      sink ?? this.sink ?? new LogNotificationSink(logger),
      logger,
      metrics,
      {
        pauseBetweenChecksMs: this.config.subscriptions.pauseBetweenChecksMs,
        maxResultsPerNotification: this.config.subscriptions.maxResultsPerNotification,
      }
    );
  }

  createScheduler(sink?: NotificationSink): SubscriptionScheduler {
    return new SubscriptionScheduler(this.createSubscriptionChecker(sink), this.core.logger, {
      schedule: this.config.subscriptions.schedule,
    });
  }

  /**
   * Get system health status
   *
   * @example
   * ```typescript
   * const health = radar.getHealth();
   * console.log('Judge:', health.judge.configured ? health.judge.name : 'degraded');
   * ```
   */
  getHealth(): {
    judge: { configured: boolean; name?: string };
    platforms: string[];
    subscriptionStore: 'memory' | 'redis' | 'custom';
  } {
    return {
      judge: { configured: this.core.judge !== undefined, name: this.core.judge?.name },
      platforms: this.getAvailablePlatforms(),
      subscriptionStore: this.storeMode,
    };
  }

  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.core.store.close();
    await this.core.metrics.close();
  }

  private static async openStore(
    config: ResolvedConfig,
    logger: Logger,
    provided: SubscriptionStore | undefined
  ): Promise<{ store: SubscriptionStore; mode: 'memory' | 'redis' | 'custom' }> {
    if (provided) {
      return { store: provided, mode: 'custom' };
    }

    const { store, redisUrl } = config.subscriptions;
    if (store === 'redis' && redisUrl) {
      try {
        return { store: await RedisSubscriptionStore.connect(redisUrl, logger), mode: 'redis' };
      } catch (error: unknown) {
        logger.error('Failed to connect to Redis for subscriptions', { error: errorMessage(error) });
        logger.warn('Subscriptions kept in memory only', {
          impact: 'Seen results and notifications are lost on restart',
        });
      }
    }

    return { store: new MemorySubscriptionStore(), mode: 'memory' };
  }

  private registerDefaultAgents(): void {
    const deps: CrawlerDeps = this.core;
    const { platforms } = this.config;

    if (platforms.google) {
      this.registerAgent('google', new GoogleCrawler(deps, platforms.google));
    }

    // Public search APIs, available unless switched off
    if (platforms.reddit !== false) {
      this.registerAgent('reddit', new RedditCrawler(deps, platforms.reddit));
    }
    if (platforms.github !== false) {
      this.registerAgent('github', new GitHubCrawler(deps, platforms.github));
    }

    for (const [platform, urlTemplate] of Object.entries(platforms.feeds ?? {})) {
      this.registerAgent(platform, new FeedCrawler(deps, { platform, urlTemplate }));
    }
  }
}
