// src/core/http/HttpCore.ts

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpRequestConfig, HttpResponse, RateLimitConfig, RetryConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import {
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const USER_AGENT = 'issue-radar/0.1';

/**
 * Shared HTTP client for crawlers and judge adapters.
 *
 * Every request runs inside the rate-limit queue of its `target`, goes
 * through retry with backoff and a per-target circuit breaker, and maps
 * failures onto the typed error hierarchy.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;

  constructor(
    private rateLimits: Record<string, RateLimitConfig>,
    retryConfig: RetryConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    timeout: number = 30000
  ) {
    this.circuitBreaker = new CircuitBreaker(logger);
    this.retryHandler = new RetryHandler(retryConfig, logger, this.circuitBreaker);

    this.axiosInstance = axios.create({
      timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'>
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async post<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'>
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'POST', body });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const { target } = config;
    const method = config.method ?? 'GET';
    const requestId = this.generateRequestId();

    this.logger.debug('HTTP request', {
      requestId,
      target,
      url: config.url,
      method,
      headerKeys: Object.keys(config.headers || {}),
    });

    if (!this.circuitBreaker.canExecute(target)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${target}`, { target });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': USER_AGENT,
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(async () => {
            return this.axiosInstance.request<T>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
              timeout: config.timeout,
              signal: config.signal,
            });
          }, target, config.maxRetries);

          this.circuitBreaker.recordSuccess(target);

          this.metrics.incrementCounter('http_requests_total', {
            target,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            target,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          this.circuitBreaker.recordFailure(target);

          const errorStatus = isAxiosError(error) ? (error.response?.status ?? 'error') : 'error';
          this.metrics.incrementCounter('http_requests_total', {
            target,
            method,
            status: errorStatus.toString(),
          });
          this.metrics.incrementCounter('http_errors', { target, status: errorStatus });

          throw this.transformError(error, target);
        }
      });
    };

    return this.runThroughRateLimiter(target, config.skipRateLimit, execute);
  }

  private async runThroughRateLimiter<T>(
    target: string,
    skip: boolean | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = this.rateLimiters.get(target);

    if (!queue || skip) {
      return task();
    }

    const wrappedTask = async (): Promise<T> => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { target });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { target });

    return queue.add(wrappedTask, { throwOnTimeout: true });
  }

  private initializeRateLimiters(): void {
    for (const [target, config] of Object.entries(this.rateLimits)) {
      let intervalCap: number;
      let interval: number;

      if (config.qps >= 1) {
        intervalCap = Math.floor(config.qps);
        interval = 1000;
      } else {
        // e.g. 0.5 QPS = 1 request per 2000ms
        intervalCap = 1;
        interval = Math.floor(1000 / config.qps);
      }

      this.rateLimiters.set(
        target,
        new PQueue({
          intervalCap,
          interval,
          concurrency: config.concurrency,
        })
      );

      this.logger.debug('Rate limiter initialized', {
        target,
        originalQps: config.qps,
        intervalCap,
        interval,
        concurrency: config.concurrency,
      });
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, target: string): Error {
    if (!isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { target });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        target,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers['retry-after']);
        return new RateLimitError(
          `Rate limited by ${target}`,
          Number.isFinite(retryAfter) ? retryAfter : undefined,
          { target }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          target,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { target });
      }
    }
    if (error.code === 'ERR_CANCELED') {
      return new NetworkError('Request aborted', { target, code: error.code });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { target });
    }
    return new NetworkError(`Network error: ${error.message}`, { target, code: error.code });
  }
}
