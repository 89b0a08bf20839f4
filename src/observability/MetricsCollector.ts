// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['target', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['target', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['target', 'status'],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Current rate limit queue size',
        labelNames: ['target'],
        registers: [this.registry],
      })
    );

    // Crawl metrics
    this.histograms.set(
      'crawl_duration',
      new Histogram({
        name: 'crawl_duration_seconds',
        help: 'Per-platform crawl duration',
        labelNames: ['platform'],
        buckets: [0.5, 1, 2, 5, 10, 30],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'crawl_failures',
      new Counter({
        name: 'crawl_failures_total',
        help: 'Crawls that raised and were treated as empty',
        labelNames: ['platform'],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'results_raw',
      new Gauge({
        name: 'results_raw',
        help: 'Raw results returned by the last crawl',
        labelNames: ['platform'],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'results_filtered',
      new Gauge({
        name: 'results_filtered',
        help: 'Results kept by the last relevance filter run',
        labelNames: ['platform'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'synthesis_total',
      new Counter({
        name: 'agent_synthesis_total',
        help: 'Crawler agent synthesis attempts',
        labelNames: ['platform', 'status'],
        registers: [this.registry],
      })
    );

    // Judge metrics
    this.counters.set(
      'judge_calls_total',
      new Counter({
        name: 'judge_calls_total',
        help: 'Judge oracle calls',
        labelNames: ['judge', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'judge_duration',
      new Histogram({
        name: 'judge_duration_seconds',
        help: 'Judge oracle call duration',
        labelNames: ['judge', 'status'],
        buckets: [0.5, 1, 2, 5, 10, 30, 60],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'judge_fallbacks_total',
      new Counter({
        name: 'judge_fallbacks_total',
        help: 'Filter or summary runs that fell back after a judge failure',
        labelNames: ['stage', 'reason'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'subscription_checks_total',
      new Counter({
        name: 'subscription_checks_total',
        help: 'Subscription checks',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end('Metrics unavailable');
          this.logger?.error('Metrics rendering failed', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
    });

    this.server.on('error', (error: Error) => {
      this.logger?.error('MetricsCollector server error', { error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.server = undefined;
  }
}
