// src/core/limits/LimitProbe.ts

import type { EndpointLimits, LimitStore, ProbeConfig } from './types';
import type { RateLimiter } from '../ratelimit/RateLimiter';
import type { PageResult, RequestParams, Transport } from '../transport/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { withProbeSpan } from '../../observability/tracing';
import type { Clock } from '../../utils/clock';
import {
  ApplicationError,
  FetchAbortedError,
  ProbeFailedError,
  errorMessage,
  throwIfAborted,
} from '../../utils/errors';

export interface ProbeOptions {
  detectRate: boolean;
  signal?: AbortSignal;
  // Checked before the result is written to the store
  shouldPersist?: () => boolean;
}

/**
 * Cap implied by a single un-limited response.
 *
 * An explicit hasMore decides it. Without the flag, a positive multiple of
 * 1000 rows is taken as the cap and anything else as "uncapped".
 */
export function inferPerRequestCap(page: PageResult): number {
  const count = page.rows.length;

  if (page.hasMore === false) return 0;
  if (page.hasMore === true) return count;

  return count > 0 && count % 1000 === 0 ? count : 0;
}

export class LimitProbe {
  constructor(
    private transport: Transport,
    private credential: string,
    private store: LimitStore,
    private rateLimiter: RateLimiter,
    private config: ProbeConfig,
    private logger: Logger,
    private metrics: MetricsCollector,
    private clock: Clock
  ) {}

  async probeLimits(
    endpoint: string,
    requiredParams: RequestParams,
    options: ProbeOptions
  ): Promise<EndpointLimits> {
    return withProbeSpan(endpoint, async () => {
      this.logger.info('Probing endpoint limits', { endpoint, detectRate: options.detectRate });

      try {
        const perRequestCap = await this.detectPerRequestCap(endpoint, requiredParams, options.signal);
        const ratePerMinute = options.detectRate
          ? await this.detectRatePerMinute(endpoint, requiredParams, options.signal)
          : 0;

        const limits: EndpointLimits = {
          endpointName: endpoint,
          perRequestCap,
          ratePerMinute,
          lastUpdated: new Date(this.clock.now()),
        };

        if (options.shouldPersist?.() ?? true) {
          await this.store.put(limits);
        } else {
          this.logger.info('Discarding limits from a superseded probe', { endpoint });
        }
        this.metrics.incrementCounter('limit_probes_total', { endpoint, status: 'success' });
        this.logger.info('Endpoint limits detected', { endpoint, perRequestCap, ratePerMinute });

        return limits;
      } catch (error: unknown) {
        this.metrics.incrementCounter('limit_probes_total', { endpoint, status: 'failed' });
        throw error;
      }
    });
  }

  async detectPerRequestCap(
    endpoint: string,
    requiredParams: RequestParams,
    signal?: AbortSignal
  ): Promise<number> {
    try {
      const response = await this.transport.send(
        { endpoint, credential: this.credential, params: { ...requiredParams }, fields: [] },
        signal
      );

      if (response.statusCode !== 0) {
        throw new ApplicationError(`Error ${response.statusCode}: ${response.message}`, response.statusCode, {
          endpoint,
        });
      }

      const page = response.data ?? { fieldNames: [], rows: [] };
      const cap = inferPerRequestCap(page);

      this.logger.info(cap === 0 ? 'Endpoint appears uncapped' : 'Per-request cap detected', {
        endpoint,
        rows: page.rows.length,
        hasMore: page.hasMore,
        perRequestCap: cap,
      });

      return cap;
    } catch (error: unknown) {
      if (error instanceof FetchAbortedError) throw error;

      this.logger.warn('Per-request cap detection failed, using default', {
        endpoint,
        defaultPerRequestCap: this.config.defaultPerRequestCap,
        error: errorMessage(error),
      });
      return this.config.defaultPerRequestCap;
    }
  }

  /**
   * Sends small requests back to back until the server rejects one for
   * exceeding its rate, or the probe window runs out.
   */
  async detectRatePerMinute(
    endpoint: string,
    requiredParams: RequestParams,
    signal?: AbortSignal
  ): Promise<number> {
    const params: RequestParams = { ...requiredParams, limit: this.config.sampleLimit };
    const startedAt = this.clock.now();
    let count = 0;

    while (this.clock.now() - startedAt < this.config.windowMs) {
      throwIfAborted(signal, { endpoint });

      let rejection: string | undefined;
      try {
        const response = await this.transport.send(
          { endpoint, credential: this.credential, params, fields: [] },
          signal
        );
        if (response.statusCode !== 0) {
          rejection = `Error ${response.statusCode}: ${response.message}`;
        }
      } catch (error: unknown) {
        if (error instanceof FetchAbortedError) throw error;
        rejection = errorMessage(error);
      }

      if (rejection !== undefined) {
        if (this.isRateRejection(rejection)) break;

        throw new ProbeFailedError(`Rate detection for ${endpoint} failed: ${rejection}`, endpoint, {
          successfulCalls: count,
        });
      }

      count++;
      this.rateLimiter.record(endpoint, this.clock.now());
    }

    const detected = Math.max(1, count);
    this.logger.info('Rate limit detected', {
      endpoint,
      ratePerMinute: detected,
      elapsedMs: this.clock.now() - startedAt,
    });

    return detected;
  }

  private isRateRejection(message: string): boolean {
    return this.config.rateLimitMarkers.some((marker) => message.includes(marker));
  }
}
