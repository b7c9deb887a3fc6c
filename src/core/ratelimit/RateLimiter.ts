// src/core/ratelimit/RateLimiter.ts

import PQueue from 'p-queue';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { throwIfAborted } from '../../utils/errors';

export const RATE_WINDOW_MS = 60_000;

/**
 * Blocking sliding-window limiter, one budget per endpoint.
 *
 * Within any trailing window, admitted calls for an endpoint never exceed
 * its ratePerMinute. Each endpoint has a serial lane (a concurrency-1 queue)
 * so prune, check, wait and record happen as one step for concurrent callers.
 */
export class RateLimiter {
  private histories: Map<string, number[]> = new Map();
  private lanes: Map<string, PQueue> = new Map();

  constructor(
    private logger: Logger,
    private metrics: MetricsCollector,
    private clock: Clock = systemClock,
    private windowMs: number = RATE_WINDOW_MS
  ) {}

  async admit(endpoint: string, ratePerMinute: number, signal?: AbortSignal): Promise<void> {
    if (ratePerMinute <= 0) return;

    await this.lane(endpoint).add(() => this.admitNow(endpoint, ratePerMinute, signal));
  }

  /**
   * Record a call made outside admit (limit probing) so it counts against the budget
   */
  record(endpoint: string, at: number = this.clock.now()): void {
    const history = this.history(endpoint);
    history.push(at);
    history.sort((a, b) => a - b);
  }

  getHistory(endpoint: string): number[] {
    return [...(this.histories.get(endpoint) ?? [])];
  }

  private async admitNow(endpoint: string, ratePerMinute: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, { endpoint });

    let now = this.clock.now();
    let history = this.prune(endpoint, now);

    if (history.length >= ratePerMinute) {
      // Wait until enough of the oldest calls leave the window to free one slot
      const blocking = history[history.length - ratePerMinute];
      const waitMs = this.windowMs - (now - blocking);

      if (waitMs > 0) {
        this.logger.debug('Waiting for rate limit window', {
          endpoint,
          waitMs,
          ratePerMinute,
          inWindow: history.length,
        });
        this.metrics.incrementCounter('rate_limit_waits', { endpoint });
        this.metrics.recordLatency('rate_limit_wait_duration', waitMs, { endpoint });

        await this.clock.sleep(waitMs, signal);
        now = this.clock.now();
        history = this.prune(endpoint, now);
      }
    }

    history.push(now);
  }

  private prune(endpoint: string, now: number): number[] {
    const retained = this.history(endpoint).filter((t) => now - t < this.windowMs);
    this.histories.set(endpoint, retained);
    return retained;
  }

  private history(endpoint: string): number[] {
    let history = this.histories.get(endpoint);
    if (!history) {
      history = [];
      this.histories.set(endpoint, history);
    }
    return history;
  }

  private lane(endpoint: string): PQueue {
    let lane = this.lanes.get(endpoint);
    if (!lane) {
      lane = new PQueue({ concurrency: 1 });
      this.lanes.set(endpoint, lane);
    }
    return lane;
  }
}
