// src/core/judge/createJudge.ts

import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { JudgeConfig, JudgeOracle } from './types';
import { GeminiJudge } from './GeminiJudge';
import { AnthropicJudge } from './AnthropicJudge';
import { ResilientJudge } from './ResilientJudge';

/**
 * Build the configured judge, or undefined when none is configured.
 *
 * Unavailability is decided here, once; the filter and summarizer switch to
 * their degraded modes when they receive no judge.
 */
export function createJudge(
  config: JudgeConfig | undefined,
  http: HttpCore,
  logger: Logger,
  metrics: MetricsCollector
): JudgeOracle | undefined {
  if (!config?.apiKey) {
    logger.warn('No relevance judge configured - filtering and summarization disabled');
    return undefined;
  }

  const inner = config.provider === 'anthropic' ? new AnthropicJudge(http, config) : new GeminiJudge(http, config);

  logger.info('Relevance judge initialized', { judge: inner.name, model: config.model });

  return new ResilientJudge(inner, logger, metrics, {
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
}
