// src/config/ConfigValidator.ts

import { z } from 'zod';
import cron from 'node-cron';
import { ConfigError } from '../utils/errors';

// Judge Configuration Schema
const JudgeConfigSchema = z.object({
  provider: z.enum(['gemini', 'anthropic'], {
    errorMap: () => ({ message: "Judge provider must be 'gemini' or 'anthropic'" }),
  }),
  apiKey: z.string().min(1, 'Judge apiKey must not be empty'),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).max(5).optional(),
});

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

export const DEFAULT_RETRY = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

// Platform Configuration Schemas
const FeedTemplateSchema = z
  .string()
  .min(1)
  .refine((template) => template.includes('{query}'), {
    message: "Feed template must contain the '{query}' placeholder",
  });

const GoogleSearchConfigSchema = z.object({
  apiKey: z.string().min(1),
  searchEngineId: z.string().min(1),
  maxPages: z.number().int().min(1).max(10).optional(),
});

const RedditConfigSchema = z.object({
  userAgent: z.string().min(1).optional(),
  sort: z.enum(['relevance', 'hot', 'top', 'new', 'comments']).optional(),
  time: z.enum(['hour', 'day', 'week', 'month', 'year', 'all']).optional(),
  limit: z.number().int().min(1).max(100).optional(),
});

const GitHubConfigSchema = z.object({
  token: z.string().min(1).optional(),
  sort: z.enum(['stars', 'forks', 'updated', 'best-match']).optional(),
  limit: z.number().int().min(1).max(100).optional(),
});

const PlatformsConfigSchema = z.object({
  google: GoogleSearchConfigSchema.optional(),
  reddit: z.union([RedditConfigSchema, z.literal(false)]).optional(),
  github: z.union([GitHubConfigSchema, z.literal(false)]).optional(),
  feeds: z.record(z.string().min(1), FeedTemplateSchema).optional(), // Always-registered search feeds
});

const SynthesisConfigSchema = z.object({
  enabled: z.boolean().default(true),
  feedTemplates: z.record(z.string().min(1), FeedTemplateSchema).default({}),
});

const SubscriptionsConfigSchema = z
  .object({
    store: z.enum(['memory', 'redis']).default('memory'),
    redisUrl: z.string().url().optional(),
    schedule: z
      .string()
      .default('0 * * * *')
      .refine((expression) => cron.validate(expression), {
        message: 'Subscription schedule must be a valid cron expression',
      }),
    pauseBetweenChecksMs: z.number().int().min(0).default(2000),
    maxResultsPerNotification: z.number().int().positive().default(10),
  })
  .refine((data) => data.store !== 'redis' || data.redisUrl !== undefined, {
    message: "Redis subscription store requires 'redisUrl'",
  });

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Aggregator Configuration Schema
export const AggregatorConfigSchema = z.object({
  judge: JudgeConfigSchema.optional(),
  http: z
    .object({
      timeout: z.number().positive().optional(),
      retry: RetryConfigSchema.default(DEFAULT_RETRY),
    })
    .default({}),
  rateLimits: z.record(z.string().min(1), RateLimitConfigSchema).default({}),
  platforms: PlatformsConfigSchema.default({}),
  synthesis: SynthesisConfigSchema.default({}),
  subscriptions: SubscriptionsConfigSchema.default({}),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

/** What callers pass in; defaults are still missing */
export type AggregatorConfig = z.input<typeof AggregatorConfigSchema>;

/** Validated configuration with every default applied */
export type ResolvedConfig = z.output<typeof AggregatorConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate aggregator configuration
 *
 * @returns Validated configuration with defaults applied
 * @throws {ConfigError} With every issue listed in `details.errors`
 */
export function validateConfig(config: unknown): ResolvedConfig {
  const result = AggregatorConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }

  return result.data;
}

export type ConfigValidationResult =
  | { success: true; data: ResolvedConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return user-friendly errors instead of throwing
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = AggregatorConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}
