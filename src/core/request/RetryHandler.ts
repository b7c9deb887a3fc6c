// src/core/request/RetryHandler.ts

import type { Logger } from '../../observability/Logger';
import type { Clock } from '../../utils/clock';
import { ApplicationError, ClientError, FetchAbortedError, TransportError } from '../../utils/errors';

export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  retryableStatusCodes: number[];
}

/**
 * -1 generic server error, 40203 rate exceeded, 500 internal error, 503 unavailable
 */
export const DEFAULT_RETRYABLE_STATUS_CODES = [-1, 40203, 500, 503];

export type ErrorKind = 'transport' | 'retryable-application' | 'application' | 'aborted' | 'fatal';

export function classifyError(error: unknown, retryableStatusCodes: number[]): ErrorKind {
  if (error instanceof FetchAbortedError) return 'aborted';
  if (error instanceof ApplicationError) {
    return retryableStatusCodes.includes(error.statusCode) ? 'retryable-application' : 'application';
  }
  if (error instanceof TransportError) return 'transport';
  // Our own non-transport errors are never transient
  if (error instanceof ClientError) return 'fatal';
  // Anything else was thrown by a custom transport: treat as transport-level
  return 'transport';
}

export function shouldRetry(kind: ErrorKind): boolean {
  return kind === 'transport' || kind === 'retryable-application';
}

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private clock: Clock
  ) {}

  /**
   * Runs task up to maxRetries + 1 times, pausing retryDelayMs between attempts.
   * The last error is rethrown once the budget is spent or the error is not retryable.
   */
  async execute<T>(
    task: (attempt: number) => Promise<T>,
    endpoint: string,
    signal?: AbortSignal,
    onRetry?: (kind: ErrorKind) => void
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await task(attempt);
      } catch (error: unknown) {
        lastError = error;

        const kind = classifyError(error, this.config.retryableStatusCodes);
        if (!shouldRetry(kind) || attempt === this.config.maxRetries) {
          throw error;
        }

        this.logger.warn('Retrying request', {
          endpoint,
          attempt: attempt + 1,
          delay: this.config.retryDelayMs,
          kind,
          error: error instanceof Error ? error.message : String(error),
        });
        onRetry?.(kind);

        await this.clock.sleep(this.config.retryDelayMs, signal);
      }
    }

    throw lastError;
  }
}
