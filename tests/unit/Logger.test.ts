// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'error', format: 'json' });

  it('should redact the credential in metadata', () => {
    const redacted = logger['redactSensitive']({ endpoint: 'daily', credential: 'test-secret' });

    expect(redacted).toEqual({ endpoint: 'daily', credential: '[REDACTED]' });
  });

  it('should redact the token inside a request payload', () => {
    const redacted = logger['redactSensitive']({
      requestId: 'req_1',
      payload: { api_name: 'daily', token: 'test-secret', params: { limit: 10 } },
    });

    expect(redacted).toEqual({
      requestId: 'req_1',
      payload: { api_name: 'daily', token: '[REDACTED]', params: { limit: 10 } },
    });
  });

  it('should preserve non-sensitive data', () => {
    const data = { endpoint: 'daily', offset: 2000, limit: 1000, rows: 1000 };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should leave the input object untouched', () => {
    const data = { credential: 'test-secret' };
    logger['redactSensitive'](data);

    expect(data.credential).toBe('test-secret');
  });

  it('should pass non-object values through', () => {
    expect(logger['redactSensitive'](null)).toBe(null);
    expect(logger['redactSensitive'](undefined)).toBe(undefined);
    expect(logger['redactSensitive']('string')).toBe('string');
    expect(logger['redactSensitive']([1, 2])).toEqual([1, 2]);
  });

  it('should not throw when logging', () => {
    const pretty = new Logger({ level: 'error', format: 'pretty' });

    expect(() => {
      logger.debug('debug message', { endpoint: 'daily' });
      logger.info('info message');
      logger.warn('warn message', { credential: 'test-secret' });
      pretty.debug('pretty debug');
    }).not.toThrow();
  });
});
