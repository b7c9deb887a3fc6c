// src/config/ConfigValidator.ts

import { z } from 'zod';
import { DEFAULT_RETRYABLE_STATUS_CODES } from '../core/request/RetryHandler';

const ParamValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// endpoint -> fixed params the endpoint needs before it returns anything
export const RequiredParamsSchema = z.record(z.record(ParamValueSchema));

const ProfileSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  credentialEnvVar: z.string().min(1),
  enableRateLimit: z.boolean(),
  limitsNamespace: z.string().min(1),
  requiredParams: RequiredParamsSchema,
  rateLimitMarkers: z.array(z.string().min(1)).min(1),
});

const LimitStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Limit store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
  })
  .refine((data) => data.backend === 'memory' || !!data.url, {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const TransportConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
  keepAlive: z.boolean().default(true),
});

const PaginationConfigSchema = z.object({
  defaultMaxPages: z.number().int().positive().default(1000),
  emptyPageThreshold: z.number().int().min(1).default(2),
  resultOrder: z.enum(['completion', 'offset']).default('completion'),
});

const ProbeConfigSchema = z.object({
  defaultPerRequestCap: z.number().int().positive().default(5000),
  sampleLimit: z.number().int().positive().default(100),
  windowSeconds: z.number().positive().default(60),
  rateLimitMarkers: z.array(z.string().min(1)).min(1).optional(),
});

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

export const ClientOptionsSchema = z.object({
  profile: z.union([z.enum(['tushare', 'datacube']), ProfileSchema]).default('tushare'),
  credential: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  workerPoolSize: z.number().int().min(1).max(64).default(5),
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryDelaySeconds: z.number().min(0).default(1),
  enableRateLimit: z.boolean().optional(), // falls back to the profile's default
  retryableStatusCodes: z
    .array(z.number().int())
    .default(() => [...DEFAULT_RETRYABLE_STATUS_CODES]),
  transport: TransportConfigSchema.default({}),
  pagination: PaginationConfigSchema.default({}),
  probe: ProbeConfigSchema.default({}),
  limitStore: LimitStoreConfigSchema.default({ backend: 'memory' }),
  requiredParams: RequiredParamsSchema.optional(),
  requiredParamsFile: z.string().min(1).optional(),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export const FetchOptionsSchema = z.object({
  autoPaging: z.boolean().optional(),
  concurrent: z.boolean().optional(),
  maxPages: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
  offset: z.number().int().min(0).optional(),
});

export type ClientOptions = z.input<typeof ClientOptionsSchema>;
export type ValidatedClientOptions = z.output<typeof ClientOptionsSchema>;

/**
 * Validate client options and fill in defaults
 *
 * @throws {z.ZodError} If options are invalid
 */
export function validateOptions(options: unknown): ValidatedClientOptions {
  return ClientOptionsSchema.parse(options);
}

/**
 * Validate options and return readable errors instead of throwing
 */
export function validateOptionsSafe(options: unknown):
  | { success: true; data: ValidatedClientOptions }
  | { success: false; errors: string[] } {
  const result = ClientOptionsSchema.safeParse(options);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
