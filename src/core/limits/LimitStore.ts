// src/core/limits/LimitStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { z } from 'zod';
import type { EndpointLimits, LimitStore, LimitStoreConfig } from './types';
import type { Logger } from '../../observability/Logger';
import { ConfigError } from '../../utils/errors';

/**
 * Older records wrote "no limit" as Infinity (serialized as null or "inf").
 * Everything that is not a finite, non-negative number reads back as 0.
 */
const LimitValueSchema = z
  .union([z.number(), z.string(), z.null()])
  .transform((value) => {
    const n = typeof value === 'string' ? Number(value) : value;
    if (n === null || !Number.isFinite(n) || n < 0) return 0;
    return Math.floor(n);
  });

export const StoredLimitsSchema = z.object({
  endpointName: z.string().min(1),
  perRequestCap: LimitValueSchema,
  ratePerMinute: LimitValueSchema,
  lastUpdated: z.union([z.string(), z.number()]).transform((value) => new Date(value)),
});

interface StoredLimits {
  endpointName: string;
  perRequestCap: number;
  ratePerMinute: number;
  lastUpdated: string;
}

export class KeyvLimitStore implements LimitStore {
  private store: Keyv<unknown>;

  constructor(
    config: LimitStoreConfig,
    private logger: Logger
  ) {
    const namespace = config.namespace ?? 'endpoint-limits';

    if (config.backend !== 'memory' && !config.url) {
      throw new ConfigError(`Limit store backend '${config.backend}' requires a url`);
    }

    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<unknown>({ store: new KeyvRedis(config.url), namespace });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<unknown>({ store: new KeyvPostgres({ uri: config.url }), namespace });
    } else {
      this.store = new Keyv<unknown>({ namespace }); // Memory
    }

    this.store.on('error', (error: unknown) => {
      this.logger.error('Limit store backend error', {
        backend: config.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async get(endpointName: string): Promise<EndpointLimits | null> {
    const raw = await this.store.get(this.createKey(endpointName));
    if (raw === undefined || raw === null) {
      this.logger.debug('No stored limits', { endpoint: endpointName });
      return null;
    }

    const parsed = StoredLimitsSchema.safeParse(raw);
    if (!parsed.success || Number.isNaN(parsed.data.lastUpdated.getTime())) {
      this.logger.warn('Ignoring unreadable stored limits', {
        endpoint: endpointName,
        issues: parsed.success ? ['lastUpdated'] : parsed.error.errors.map((err) => err.message),
      });
      return null;
    }

    return parsed.data;
  }

  async put(limits: EndpointLimits): Promise<void> {
    const record: StoredLimits = {
      endpointName: limits.endpointName,
      perRequestCap: limits.perRequestCap,
      ratePerMinute: limits.ratePerMinute,
      lastUpdated: limits.lastUpdated.toISOString(),
    };

    await this.store.set(this.createKey(limits.endpointName), record);

    this.logger.info('Endpoint limits saved', {
      endpoint: limits.endpointName,
      perRequestCap: limits.perRequestCap,
      ratePerMinute: limits.ratePerMinute,
    });
  }

  async delete(endpointName: string): Promise<void> {
    const removed = await this.store.delete(this.createKey(endpointName));
    this.logger.info(removed ? 'Endpoint limits deleted' : 'No stored limits to delete', {
      endpoint: endpointName,
    });
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private createKey(endpointName: string): string {
    return `limits:${endpointName}`;
  }
}
