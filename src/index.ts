// src/index.ts

export { IssueRadar, SearchRequestSchema, SubscribeRequestSchema } from './sdk';
export type { SearchRequest, SubscribeRequest, InitOptions } from './sdk';

export type { RawResult, BuiltInPlatform } from './core/normalizer/types';
export type {
  ScoredResult,
  FilteredResult,
  FilteredByPlatform,
  Report,
  ResultPreview,
} from './core/processing/types';
export { isScored } from './core/processing/types';
export type { CrawlerAgent, AgentSynthesizer } from './crawlers/types';
export type { JudgeOracle, JudgeConfig, JudgeProvider } from './core/judge/types';

// Building blocks for custom wiring
export { AgentRegistry } from './core/registry/AgentRegistry';
export { Dispatcher } from './core/registry/Dispatcher';
export { RelevanceFilter } from './core/processing/RelevanceFilter';
export { Summarizer } from './core/processing/Summarizer';
export { AggregationPipeline } from './core/pipeline/AggregationPipeline';
export type { AggregationRequest } from './core/pipeline/AggregationPipeline';
export { parseScoreResponse } from './core/processing/responseParsing';
export type { JudgeScore, ScoreParseResult } from './core/processing/responseParsing';
export { BaseCrawler } from './crawlers/BaseCrawler';
export { FeedCrawler } from './crawlers/rss/FeedCrawler';
export { FeedAgentSynthesizer } from './crawlers/rss/FeedAgentSynthesizer';

// Subscriptions
export type {
  Subscription,
  Notification,
  NotificationSink,
  SubscriptionStore,
  CheckOutcome,
} from './subscriptions/types';
export { MemorySubscriptionStore } from './subscriptions/MemorySubscriptionStore';
export { RedisSubscriptionStore } from './subscriptions/RedisSubscriptionStore';
export { SubscriptionChecker } from './subscriptions/SubscriptionChecker';
export { SubscriptionScheduler } from './subscriptions/SubscriptionScheduler';
export { renderNotificationEmail } from './subscriptions/NotificationRenderer';
export type { RenderedEmail } from './subscriptions/NotificationRenderer';
export { LogNotificationSink } from './subscriptions/LogNotificationSink';

// Configuration
export { validateConfig, validateConfigSafe, AggregatorConfigSchema } from './config/ConfigValidator';
export type { AggregatorConfig, ResolvedConfig } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

// Export error classes for error handling
export {
  AggregatorError,
  ConfigError,
  InvalidRequestError,
  CrawlError,
  SynthesisError,
  JudgeError,
  JudgeTimeoutError,
  JudgeResponseError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
} from './utils/errors';
