// src/core/request/RequestExecutor.ts

import type { EndpointLimits } from '../limits/types';
import type { Page } from '../pagination/types';
import type { RateLimiter } from '../ratelimit/RateLimiter';
import type { PageResult, Transport } from '../transport/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent, withPageSpan } from '../../observability/tracing';
import type { Clock } from '../../utils/clock';
import {
  ApplicationError,
  FetchAbortedError,
  OffsetOutOfRangeError,
  RequestFailedError,
  errorMessage,
  isOffsetOutOfRange,
  throwIfAborted,
} from '../../utils/errors';
import { RetryHandler } from './RetryHandler';
import type { RetryConfig } from './RetryHandler';

export interface RequestExecutorConfig extends RetryConfig {
  credential: string;
  enableRateLimit: boolean;
}

/**
 * Limits already known for an endpoint, without triggering discovery
 */
export type KnownLimitsLookup = (endpoint: string) => EndpointLimits | undefined;

export class RequestExecutor {
  private retryHandler: RetryHandler;

  constructor(
    private transport: Transport,
    private rateLimiter: RateLimiter,
    private knownLimits: KnownLimitsLookup,
    private config: RequestExecutorConfig,
    private logger: Logger,
    private metrics: MetricsCollector,
    clock: Clock
  ) {
    this.retryHandler = new RetryHandler(config, logger, clock);
  }

  async execute(page: Page, signal?: AbortSignal): Promise<PageResult> {
    const offset = typeof page.params.offset === 'number' ? page.params.offset : 0;
    const limit = typeof page.params.limit === 'number' ? page.params.limit : undefined;
    let attempts = 0;

    return withPageSpan(page.endpoint, offset, limit, async () => {
      try {
        return await this.retryHandler.execute(
          async () => {
            attempts++;
            return this.attempt(page, signal);
          },
          page.endpoint,
          signal,
          (kind) => {
            this.metrics.incrementCounter('api_retries_total', { endpoint: page.endpoint, kind });
            addSpanEvent('page.retry', { kind, attempt: attempts });
          }
        );
      } catch (error: unknown) {
        throw this.toFailure(page, error, attempts);
      }
    });
  }

  private async attempt(page: Page, signal?: AbortSignal): Promise<PageResult> {
    throwIfAborted(signal, { endpoint: page.endpoint });

    // Rate limiting only applies once the endpoint's limits are known
    if (this.config.enableRateLimit) {
      const limits = this.knownLimits(page.endpoint);
      if (limits) {
        await this.rateLimiter.admit(page.endpoint, limits.ratePerMinute, signal);
      }
    }

    const response = await this.transport.send(
      {
        endpoint: page.endpoint,
        credential: this.config.credential,
        params: { ...page.params },
        fields: [...page.fields],
      },
      signal
    );

    if (response.statusCode !== 0) {
      throw new ApplicationError(`Error ${response.statusCode}: ${response.message}`, response.statusCode, {
        endpoint: page.endpoint,
      });
    }

    return response.data ?? { fieldNames: [], rows: [] };
  }

  private toFailure(page: Page, error: unknown, attempts: number): Error {
    if (error instanceof FetchAbortedError) return error;

    const message = errorMessage(error);
    const details = { pageIndex: page.index, offset: page.params.offset, limit: page.params.limit };

    if (isOffsetOutOfRange(message)) {
      return new OffsetOutOfRangeError(
        `Offset out of range for ${page.endpoint}: ${message}`,
        page.endpoint,
        attempts,
        details
      );
    }

    this.metrics.incrementCounter('api_request_failures_total', { endpoint: page.endpoint });
    this.logger.error('Request failed', {
      endpoint: page.endpoint,
      attempts,
      error: message,
      ...details,
    });

    return new RequestFailedError(
      `Request to ${page.endpoint} failed after ${attempts} attempt(s): ${message}`,
      page.endpoint,
      attempts,
      details
    );
  }
}
