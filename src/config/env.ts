// src/config/env.ts

import dotenv from 'dotenv';
import { validateConfig, type ResolvedConfig } from './ConfigValidator';
import { ConfigError } from '../utils/errors';

export interface EnvLoadOptions {
  /** Variables to read; defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  dotenvPath?: string;
}

/**
 * Minutes between subscription checks → cron expression.
 * 60 → hourly at minute 0; divisors of 60 run every N minutes; whole hours
 * up to a day run every N hours.
 */
export function intervalToCron(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new ConfigError(`Invalid check interval: ${minutes}`, { minutes });
  }
  if (minutes === 60) return '0 * * * *';
  if (minutes < 60 && 60 % minutes === 0) return `*/${minutes} * * * *`;
  if (minutes % 60 === 0 && 24 % (minutes / 60) === 0) return `0 */${minutes / 60} * * *`;
  throw new ConfigError(`Check interval ${minutes} does not map onto a cron schedule`, { minutes });
}

/**
 * `name=https://feed?q={query};other=...` → template record
 */
export function parseFeedTemplates(value: string | undefined): Record<string, string> {
  const templates: Record<string, string> = {};
  if (!value) return templates;

  for (const entry of value.split(';')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    const name = entry.slice(0, separator).trim().toLowerCase();
    const template = entry.slice(separator + 1).trim();
    if (name && template) templates[name] = template;
  }
  return templates;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Build and validate configuration from environment variables.
 *
 * The judge prefers Gemini (`GOOGLE_API_KEY`) and falls back to Anthropic
 * (`ANTHROPIC_API_KEY`); with neither set the judge stays unconfigured.
 *
 * @throws {ConfigError} When a variable holds an invalid value
 */
export function loadConfigFromEnv(options: EnvLoadOptions = {}): ResolvedConfig {
  if (!options.env) {
    dotenv.config(options.dotenvPath ? { path: options.dotenvPath } : undefined);
  }
  const env = options.env ?? process.env;

  const judge = env.GOOGLE_API_KEY
    ? { provider: 'gemini', apiKey: env.GOOGLE_API_KEY, model: env.GEMINI_MODEL }
    : env.ANTHROPIC_API_KEY
      ? { provider: 'anthropic', apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL }
      : undefined;

  const checkInterval = optionalNumber(env.SUBSCRIPTION_CHECK_INTERVAL);
  const schedule = env.SUBSCRIPTION_SCHEDULE ?? (checkInterval !== undefined ? intervalToCron(checkInterval) : undefined);

  return validateConfig({
    judge,
    platforms: {
      google:
        env.GOOGLE_CSE_KEY && env.GOOGLE_CSE_ID
          ? { apiKey: env.GOOGLE_CSE_KEY, searchEngineId: env.GOOGLE_CSE_ID }
          : undefined,
      reddit: { userAgent: env.REDDIT_USER_AGENT },
      github: { token: env.GITHUB_TOKEN },
    },
    synthesis: {
      feedTemplates: parseFeedTemplates(env.FEED_TEMPLATES),
    },
    subscriptions: {
      store: env.REDIS_URL ? 'redis' : 'memory',
      redisUrl: env.REDIS_URL,
      schedule,
    },
    metrics: {
      enabled: env.METRICS_ENABLED !== 'false',
      port: optionalNumber(env.METRICS_PORT),
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
  });
}
