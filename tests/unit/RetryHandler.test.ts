// tests/unit/RetryHandler.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import {
  RetryHandler,
  classifyError,
  shouldRetry,
  DEFAULT_RETRYABLE_STATUS_CODES,
} from '../../src/core/request/RetryHandler';
import type { ErrorKind } from '../../src/core/request/RetryHandler';
import { Logger } from '../../src/observability/Logger';
import {
  ApplicationError,
  ConfigError,
  FetchAbortedError,
  TransportError,
  TransportTimeoutError,
} from '../../src/utils/errors';
import { FakeClock } from '../helpers/FakeClock';

describe('classifyError', () => {
  const codes = DEFAULT_RETRYABLE_STATUS_CODES;

  it('should classify each failure kind', () => {
    expect(classifyError(new FetchAbortedError(), codes)).toBe('aborted');
    expect(classifyError(new ApplicationError('Error 40203: busy', 40203), codes)).toBe(
      'retryable-application'
    );
    expect(classifyError(new ApplicationError('Error -1: server error', -1), codes)).toBe(
      'retryable-application'
    );
    expect(classifyError(new ApplicationError('Error 40101: denied', 40101), codes)).toBe('application');
    expect(classifyError(new TransportError('Network error'), codes)).toBe('transport');
    expect(classifyError(new TransportTimeoutError(), codes)).toBe('transport');
    expect(classifyError(new ConfigError('bad'), codes)).toBe('fatal');
    expect(classifyError(new Error('socket closed'), codes)).toBe('transport');
  });

  it('should retry only transient kinds', () => {
    const kinds: ErrorKind[] = ['transport', 'retryable-application', 'application', 'aborted', 'fatal'];

    expect(kinds.filter(shouldRetry)).toEqual(['transport', 'retryable-application']);
  });
});

describe('RetryHandler', () => {
  let clock: FakeClock;
  let handler: RetryHandler;

  beforeEach(() => {
    clock = new FakeClock();
    handler = new RetryHandler(
      { maxRetries: 2, retryDelayMs: 1000, retryableStatusCodes: DEFAULT_RETRYABLE_STATUS_CODES },
      new Logger({ level: 'error' }),
      clock
    );
  });

  it('should return the first successful result', async () => {
    const attempts: number[] = [];

    const result = await handler.execute(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 2) throw new TransportError('Network error: ECONNRESET');
      return 'done';
    }, 'daily');

    expect(result).toBe('done');
    expect(attempts).toEqual([0, 1, 2]);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('should not retry non-retryable application errors', async () => {
    let calls = 0;

    await expect(
      handler.execute(async () => {
        calls++;
        throw new ApplicationError('Error 40101: permission denied', 40101);
      }, 'daily')
    ).rejects.toThrow('Error 40101: permission denied');

    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should rethrow the last error once retries are spent', async () => {
    let calls = 0;

    await expect(
      handler.execute(async () => {
        calls++;
        throw new ApplicationError(`Error 503: unavailable (${calls})`, 503);
      }, 'daily')
    ).rejects.toThrow('Error 503: unavailable (3)');

    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('should report each retry with its kind', async () => {
    const kinds: ErrorKind[] = [];

    await handler.execute(
      async (attempt) => {
        if (attempt === 0) throw new ApplicationError('Error 40203: busy', 40203);
        if (attempt === 1) throw new TransportTimeoutError();
        return attempt;
      },
      'daily',
      undefined,
      (kind) => kinds.push(kind)
    );

    expect(kinds).toEqual(['retryable-application', 'transport']);
  });

  it('should stop waiting when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      handler.execute(
        async () => {
          throw new TransportError('Network error');
        },
        'daily',
        controller.signal
      )
    ).rejects.toBeInstanceOf(FetchAbortedError);
  });
});
