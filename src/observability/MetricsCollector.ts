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
    // Transport metrics
    this.counters.set(
      'api_requests_total',
      new Counter({
        name: 'api_requests_total',
        help: 'Total data API requests',
        labelNames: ['endpoint', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'api_request_duration',
      new Histogram({
        name: 'api_request_duration_seconds',
        help: 'Data API request duration',
        labelNames: ['endpoint', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'api_retries_total',
      new Counter({
        name: 'api_retries_total',
        help: 'Page requests retried after a transient failure',
        labelNames: ['endpoint', 'kind'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'api_request_failures_total',
      new Counter({
        name: 'api_request_failures_total',
        help: 'Page requests that exhausted their retries',
        labelNames: ['endpoint'],
        registers: [this.registry],
      })
    );

    // Rate limiting metrics
    this.counters.set(
      'rate_limit_waits',
      new Counter({
        name: 'rate_limit_waits_total',
        help: 'Admissions that had to wait for the sliding window',
        labelNames: ['endpoint'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'rate_limit_wait_duration',
      new Histogram({
        name: 'rate_limit_wait_duration_seconds',
        help: 'Time spent waiting for admission',
        labelNames: ['endpoint'],
        buckets: [0.5, 1, 5, 15, 30, 60],
        registers: [this.registry],
      })
    );

    // Limit discovery
    this.counters.set(
      'limit_probes_total',
      new Counter({
        name: 'limit_probes_total',
        help: 'Limit probes run against endpoints',
        labelNames: ['endpoint', 'status'],
        registers: [this.registry],
      })
    );

    // Pagination
    this.counters.set(
      'pages_fetched_total',
      new Counter({
        name: 'pages_fetched_total',
        help: 'Pages fetched',
        labelNames: ['endpoint', 'mode'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'fetch_duration',
      new Histogram({
        name: 'fetch_duration_seconds',
        help: 'Logical fetch duration',
        labelNames: ['endpoint'],
        buckets: [0.1, 0.5, 1, 5, 15, 60, 300],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'rows_fetched',
      new Gauge({
        name: 'rows_fetched',
        help: 'Rows returned by the last fetch',
        labelNames: ['endpoint'],
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
    this.server = http.createServer(async (req, res) => {
      if (req.url === path) {
        res.setHeader('Content-Type', this.registry.contentType);
        res.end(await this.getMetrics());
      } else {
        res.statusCode = 404;
        res.end('Not Found');
      }
    });

    this.server.on('error', (error: NodeJS.ErrnoException) => {
      this.logger?.error('Metrics server error', { port, code: error.code, error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = undefined;
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
