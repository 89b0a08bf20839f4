// src/core/http/types.ts

export interface HttpRequestConfig {
  url: string;
  /** Rate-limit and circuit-breaker bucket, usually the platform or judge name */
  target: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
  skipRateLimit?: boolean;
  /** Overrides `RetryConfig.maxRetries` for this request */
  maxRetries?: number;
  signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}
