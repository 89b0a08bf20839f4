// src/core/judge/ResilientJudge.ts

import type { JudgeOracle } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { ApiClientError, JudgeTimeoutError, errorMessage } from '../../utils/errors';

export interface ResilienceOptions {
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Wraps a judge with a per-attempt timeout and a bounded retry. A timed-out
 * attempt is aborted through its signal before the next one starts.
 *
 * Client errors (bad key, bad request) are not retried. The last error is
 * rethrown; callers decide how to degrade.
 */
export class ResilientJudge implements JudgeOracle {
  readonly name: string;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(
    private inner: JudgeOracle,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: ResilienceOptions = {}
  ) {
    this.name = inner.name;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxRetries = options.maxRetries ?? 1;
  }

  async invoke(prompt: string): Promise<string> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const startTime = Date.now();
      try {
        const text = await this.attempt(prompt);

        this.metrics.incrementCounter('judge_calls_total', { judge: this.name, status: 'success' });
        this.metrics.recordLatency('judge_duration', Date.now() - startTime, {
          judge: this.name,
          status: 'success',
        });
        return text;
      } catch (error: unknown) {
        lastError = error;
        const status = error instanceof JudgeTimeoutError ? 'timeout' : 'error';

        this.metrics.incrementCounter('judge_calls_total', { judge: this.name, status });
        this.metrics.recordLatency('judge_duration', Date.now() - startTime, {
          judge: this.name,
          status,
        });

        if (error instanceof ApiClientError || attempt === this.maxRetries) {
          break;
        }

        this.logger.warn('Judge call failed, retrying', {
          judge: this.name,
          attempt: attempt + 1,
          error: errorMessage(error),
        });
      }
    }

    throw lastError;
  }

  private attempt(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new JudgeTimeoutError(`Judge ${this.name} did not answer within ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    const call = this.inner.invoke(prompt, { signal: controller.signal });
    return Promise.race([call, timeout]).finally(() => clearTimeout(timer));
  }
}
