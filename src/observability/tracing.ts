/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around pipeline runs, platform crawls and judge calls. The host
 * application registers the OpenTelemetry SDK and exporter; this module
 * only talks to `@opentelemetry/api`, so it is a no-op when nothing is
 * registered.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'issue-radar';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique id used to correlate the log lines of one pipeline run
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
  });
}

export async function withCrawlSpan<T>(
  platform: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Crawl ${platform}`, fn, { 'crawl.platform': platform });
}

/**
 * Create a span for judge oracle calls
 *
 * @param judge - Judge adapter name (e.g. 'gemini')
 * @param purpose - 'filter' or 'summary'
 */
export async function withJudgeSpan<T>(
  judge: string,
  purpose: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Judge ${purpose}`, fn, {
    'judge.name': judge,
    'judge.purpose': purpose,
  });
}
