// tests/unit/RateLimiter.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter, RATE_WINDOW_MS } from '../../src/core/ratelimit/RateLimiter';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { FetchAbortedError } from '../../src/utils/errors';
import { FakeClock } from '../helpers/FakeClock';

describe('RateLimiter', () => {
  let clock: FakeClock;
  let metrics: MetricsCollector;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = new FakeClock();
    metrics = new MetricsCollector();
    limiter = new RateLimiter(new Logger({ level: 'error' }), metrics, clock);
  });

  it('should use a one minute window by default', () => {
    expect(RATE_WINDOW_MS).toBe(60_000);
  });

  it('should admit immediately while under the rate', async () => {
    await limiter.admit('daily', 3);
    await limiter.admit('daily', 3);
    await limiter.admit('daily', 3);

    expect(clock.sleeps).toEqual([]);
    expect(limiter.getHistory('daily')).toEqual([0, 0, 0]);
  });

  it('should serialize concurrent callers on one endpoint', async () => {
    await Promise.all(Array.from({ length: 5 }, () => limiter.admit('daily', 2)));

    // 2 at t=0, 2 at t=60s, 1 at t=120s
    expect(clock.sleeps).toEqual([60_000, 60_000]);
    expect(clock.now()).toBe(120_000);
    expect(limiter.getHistory('daily')).toEqual([120_000]);
  });

  it('should wait only until the oldest call leaves the window', async () => {
    const admittedAt: number[] = [];

    for (let i = 0; i < 6; i++) {
      await limiter.admit('daily', 3);
      admittedAt.push(clock.now());
      clock.advance(10_000);
    }

    expect(admittedAt).toEqual([0, 10_000, 20_000, 60_000, 70_000, 80_000]);
    expect(clock.sleeps).toEqual([30_000]);

    // No trailing 60s window holds more than 3 admissions
    for (const end of admittedAt) {
      const inWindow = admittedAt.filter((t) => t <= end && end - t < RATE_WINDOW_MS);
      expect(inWindow.length).toBeLessThanOrEqual(3);
    }
  });

  it('should never wait for an unrestricted endpoint', async () => {
    for (let i = 0; i < 10; i++) {
      await limiter.admit('stock_basic', 0);
    }

    expect(clock.sleeps).toEqual([]);
    expect(limiter.getHistory('stock_basic')).toEqual([]);
  });

  it('should keep separate budgets per endpoint', async () => {
    await limiter.admit('daily', 1);
    await limiter.admit('weekly', 1);

    expect(clock.sleeps).toEqual([]);
  });

  it('should count recorded calls against the budget', async () => {
    limiter.record('daily', 0);
    limiter.record('daily', 5_000);

    await limiter.admit('daily', 2);

    expect(clock.sleeps).toEqual([60_000]);
    expect(limiter.getHistory('daily')).toEqual([5_000, 60_000]);
  });

  it('should keep recorded history sorted', () => {
    limiter.record('daily', 300);
    limiter.record('daily', 100);
    limiter.record('daily', 200);

    expect(limiter.getHistory('daily')).toEqual([100, 200, 300]);
  });

  it('should reject admission for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.admit('daily', 1, controller.signal)).rejects.toBeInstanceOf(FetchAbortedError);
    expect(limiter.getHistory('daily')).toEqual([]);
  });

  it('should count waits in metrics', async () => {
    await limiter.admit('daily', 1);
    await limiter.admit('daily', 1);

    const output = await metrics.getMetrics();
    expect(output).toContain('rate_limit_waits_total{endpoint="daily"} 1');
  });
});
