// src/core/http/RetryHandler.ts

import { isAxiosError } from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { CircuitBreaker } from './CircuitBreaker';
import { sleep } from '../../utils/helpers';

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNABORTED', 'ETIMEDOUT', 'EAI_AGAIN'];

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker
  ) {}

  async execute<T>(
    task: () => Promise<T>,
    target: string,
    maxRetries: number = this.config.maxRetries
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      // Check circuit breaker before each retry attempt (not just first attempt)
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(target)) {
        this.logger.warn('Circuit breaker open, skipping retry', { target, attempt });
        throw lastError;
      }

      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        if (!this.isRetryable(error) || attempt === maxRetries) {
          throw error;
        }

        const status = isAxiosError(error) ? error.response?.status : undefined;
        const retryAfter = isAxiosError(error)
          ? this.headerValue(error.response?.headers, 'retry-after')
          : undefined;

        let delay: number;
        if (retryAfter) {
          const retryAfterNum = parseInt(retryAfter, 10);
          if (!isNaN(retryAfterNum)) {
            // Retry-After is in seconds
            delay = retryAfterNum * 1000;
          } else {
            // Retry-After is an HTTP date
            const retryDate = new Date(retryAfter);
            delay = Math.max(0, retryDate.getTime() - Date.now());
          }
          delay = Math.min(delay, this.config.maxDelay);

          this.logger.warn('Retrying with Retry-After', {
            target,
            attempt: attempt + 1,
            delay,
            status,
            retryAfter,
          });
        } else {
          // Exponential backoff with jitter
          delay = Math.min(
            this.config.baseDelay * Math.pow(2, attempt) + Math.random() * 1000,
            this.config.maxDelay
          );

          this.logger.warn('Retrying request', {
            target,
            attempt: attempt + 1,
            delay,
            status,
          });
        }

        await sleep(delay);
      }
    }

    throw lastError;
  }

  private isRetryable(error: unknown): boolean {
    if (!isAxiosError(error)) return false;
    const status = error.response?.status;
    if (status !== undefined) {
      return this.config.retryableStatusCodes.includes(status);
    }
    return error.code !== undefined && RETRYABLE_NETWORK_CODES.includes(error.code);
  }

  private headerValue(headers: unknown, name: string): string | undefined {
    if (!headers || typeof headers !== 'object') return undefined;
    const value: unknown = Reflect.get(headers, name);
    return typeof value === 'string' ? value : undefined;
  }
}
