/**
 * MetricsCollector Unit Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

describe('MetricsCollector', () => {
  let metricsCollector: MetricsCollector;

  afterEach(async () => {
    await metricsCollector.close();
  });

  it('should register metrics with default config', async () => {
    metricsCollector = new MetricsCollector();

    const output = await metricsCollector.getMetrics();
    expect(output).toContain('# TYPE api_requests_total counter');
    expect(output).toContain('# TYPE api_request_duration_seconds histogram');
    expect(output).toContain('# TYPE rows_fetched gauge');
  });

  it('should register nothing when disabled', async () => {
    metricsCollector = new MetricsCollector({ enabled: false });
    metricsCollector.incrementCounter('api_requests_total', { endpoint: 'daily', status: 'ok' });

    expect(await metricsCollector.getMetrics()).not.toContain('api_requests_total');
  });

  it('should increment counters by label set', async () => {
    metricsCollector = new MetricsCollector();

    metricsCollector.incrementCounter('pages_fetched_total', { endpoint: 'daily', mode: 'concurrent' });
    metricsCollector.incrementCounter('pages_fetched_total', { endpoint: 'daily', mode: 'concurrent' });
    metricsCollector.incrementCounter('pages_fetched_total', { endpoint: 'weekly', mode: 'sequential' });

    const output = await metricsCollector.getMetrics();
    expect(output).toContain('pages_fetched_total{endpoint="daily",mode="concurrent"} 2');
    expect(output).toContain('pages_fetched_total{endpoint="weekly",mode="sequential"} 1');
  });

  it('should record latency in seconds', async () => {
    metricsCollector = new MetricsCollector();

    metricsCollector.recordLatency('fetch_duration', 1500, { endpoint: 'daily' });

    const output = await metricsCollector.getMetrics();
    expect(output).toContain('fetch_duration_seconds_sum{endpoint="daily"} 1.5');
    expect(output).toContain('fetch_duration_seconds_count{endpoint="daily"} 1');
  });

  it('should set gauges', async () => {
    metricsCollector = new MetricsCollector();

    metricsCollector.recordGauge('rows_fetched', 2500, { endpoint: 'daily' });
    metricsCollector.recordGauge('rows_fetched', 1200, { endpoint: 'daily' });

    expect(await metricsCollector.getMetrics()).toContain('rows_fetched{endpoint="daily"} 1200');
  });

  it('should ignore unknown metric names', () => {
    metricsCollector = new MetricsCollector();

    expect(() => {
      metricsCollector.incrementCounter('unknown_total', { endpoint: 'daily' });
      metricsCollector.recordLatency('unknown_duration', 10, { endpoint: 'daily' });
      metricsCollector.recordGauge('unknown_gauge', 1, { endpoint: 'daily' });
    }).not.toThrow();
  });

  it('should close without a server', async () => {
    metricsCollector = new MetricsCollector();

    await expect(metricsCollector.close()).resolves.toBeUndefined();
  });
});
