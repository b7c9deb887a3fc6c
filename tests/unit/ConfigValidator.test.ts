// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import {
  validateOptions,
  validateOptionsSafe,
  FetchOptionsSchema,
} from '../../src/config/ConfigValidator';
import { PROFILES, resolveProfile } from '../../src/config/profiles';

describe('ConfigValidator', () => {
  it('should fill in defaults for empty options', () => {
    const options = validateOptions({});

    expect(options.profile).toBe('tushare');
    expect(options.workerPoolSize).toBe(5);
    expect(options.maxRetries).toBe(3);
    expect(options.retryDelaySeconds).toBe(1);
    expect(options.enableRateLimit).toBeUndefined();
    expect(options.retryableStatusCodes).toEqual([-1, 40203, 500, 503]);
    expect(options.transport).toEqual({ timeoutMs: 30000, keepAlive: true });
    expect(options.pagination).toEqual({
      defaultMaxPages: 1000,
      emptyPageThreshold: 2,
      resultOrder: 'completion',
    });
    expect(options.probe).toEqual({ defaultPerRequestCap: 5000, sampleLimit: 100, windowSeconds: 60 });
    expect(options.limitStore).toEqual({ backend: 'memory' });
  });

  it('should not share the default retryable codes between calls', () => {
    const first = validateOptions({});
    first.retryableStatusCodes.push(429);

    expect(validateOptions({}).retryableStatusCodes).toEqual([-1, 40203, 500, 503]);
  });

  it('should accept a valid full configuration', () => {
    const options = validateOptions({
      profile: 'datacube',
      credential: 'test-secret',
      workerPoolSize: 8,
      maxRetries: 0,
      retryDelaySeconds: 0.5,
      enableRateLimit: true,
      limitStore: { backend: 'redis', url: 'redis://localhost:6379' },
      requiredParams: { index_weight: { index_code: '000300.SH' } },
      logging: { level: 'debug', format: 'pretty' },
    });

    expect(options.profile).toBe('datacube');
    expect(options.workerPoolSize).toBe(8);
    expect(options.limitStore).toEqual({ backend: 'redis', url: 'redis://localhost:6379' });
  });

  it('should accept a custom profile', () => {
    const profile = { ...PROFILES.datacube, name: 'staging', baseUrl: 'http://staging.example.test' };
    const options = validateOptions({ profile });

    expect(resolveProfile(options.profile).baseUrl).toBe('http://staging.example.test');
  });

  it('should reject a redis store without url', () => {
    const result = validateOptionsSafe({ limitStore: { backend: 'redis' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toContain("limitStore: Redis and Postgres backends require 'url' configuration");
    }
  });

  it('should reject an unknown backend', () => {
    const result = validateOptionsSafe({ limitStore: { backend: 'sqlite' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toContain(
        "limitStore.backend: Limit store backend must be 'memory', 'redis', or 'postgres'"
      );
    }
  });

  it('should reject a worker pool of zero', () => {
    const result = validateOptionsSafe({ workerPoolSize: 0 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^workerPoolSize: /);
    }
  });

  it('should reject an unknown profile name', () => {
    expect(() => validateOptions({ profile: 'other' })).toThrow();
  });

  it('should reject required params that are not objects', () => {
    expect(validateOptionsSafe({ requiredParams: { daily: 5 } }).success).toBe(false);
  });

  it('should return parsed data from the safe variant', () => {
    const result = validateOptionsSafe({ maxRetries: 5 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.maxRetries).toBe(5);
    }
  });
});

describe('FetchOptionsSchema', () => {
  it('should accept paging options', () => {
    expect(FetchOptionsSchema.parse({ concurrent: true, limit: 2500, offset: 0 })).toEqual({
      concurrent: true,
      limit: 2500,
      offset: 0,
    });
  });

  it('should reject non-positive limits and negative offsets', () => {
    expect(FetchOptionsSchema.safeParse({ limit: 0 }).success).toBe(false);
    expect(FetchOptionsSchema.safeParse({ offset: -1 }).success).toBe(false);
    expect(FetchOptionsSchema.safeParse({ maxPages: 1.5 }).success).toBe(false);
  });
});
