// src/utils/errors.ts

export class AggregatorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class InvalidRequestError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', details);
  }
}

// Platform errors
export class CrawlError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CRAWL_FAILED', details);
  }
}

export class SynthesisError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SYNTHESIS_FAILED', details);
  }
}

// Judge errors
export class JudgeError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JUDGE_ERROR', details);
  }
}

export class JudgeTimeoutError extends JudgeError {
  constructor(message: string = 'Judge call timed out', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'JUDGE_TIMEOUT';
  }
}

export class JudgeResponseError extends JudgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'JUDGE_MALFORMED_RESPONSE';
  }
}

// API errors
export class ApiError extends AggregatorError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends AggregatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

/**
 * Message of an unknown thrown value, for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
