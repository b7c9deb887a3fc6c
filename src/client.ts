// src/client.ts

import type { EndpointLimits, LimitStore } from './core/limits/types';
import type { FetchRequest, FetchResult, LimitsResolver } from './core/pagination/types';
import type { CellValue, ParamValue, RequestParams, Transport } from './core/transport/types';
import { HttpTransport } from './core/transport/HttpTransport';
import { KeyvLimitStore } from './core/limits/LimitStore';
import { LimitProbe } from './core/limits/LimitProbe';
import { RateLimiter } from './core/ratelimit/RateLimiter';
import { RequestExecutor } from './core/request/RequestExecutor';
import { Paginator } from './core/pagination/Paginator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withFetchSpan } from './observability/tracing';
import { validateOptions, FetchOptionsSchema } from './config/ConfigValidator';
import type { ClientOptions, ValidatedClientOptions } from './config/ConfigValidator';
import { resolveProfile } from './config/profiles';
import type { ClientProfile } from './config/profiles';
import { loadRequiredParamsFile, mergeRequiredParams } from './config/requiredParams';
import { systemClock } from './utils/clock';
import type { Clock } from './utils/clock';
import { ConfigError, errorMessage, raceAbort } from './utils/errors';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface ClientDeps {
  transport?: Transport;
  limitStore?: LimitStore;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface FetchOptions {
  autoPaging?: boolean;
  concurrent?: boolean;
  maxPages?: number;
  limit?: number;
  offset?: number;
  signal?: AbortSignal;
}

interface ClientSettings {
  profile: ClientProfile;
  credential: string;
  enableRateLimit: boolean;
  requiredParams: Map<string, RequestParams>;
}

/**
 * `limit`/`offset` given as params; numeric strings are accepted
 *
 * @throws {ConfigError} If the value is not a non-negative integer
 */
function toCount(name: 'limit' | 'offset', value: ParamValue | undefined): number | undefined {
  if (value === undefined) return undefined;

  const count = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof count === 'number' && Number.isInteger(count) && count >= 0) {
    return count;
  }

  throw new ConfigError(`Param '${name}' must be a non-negative integer, got ${JSON.stringify(value)}`, {
    [name]: value,
  });
}

export class PagedDataClient implements LimitsResolver {
  private limitsCache: Map<string, EndpointLimits> = new Map();
  private pendingLimits: Map<string, Promise<EndpointLimits>> = new Map();
  // Bumped by clearLimits; lookups started under an older generation are discarded
  private limitGenerations: Map<string, number> = new Map();
  private requiredParams: Map<string, RequestParams>;
  private readonly enableRateLimit: boolean;
  private readonly profile: ClientProfile;

  private store: LimitStore;
  private probe: LimitProbe;
  private paginator: Paginator;
  private logger: Logger;
  private metrics: MetricsCollector;

  private constructor(
    options: ValidatedClientOptions,
    settings: ClientSettings,
    deps: ClientDeps
  ) {
    const logger = deps.logger ?? new Logger(options.logging);
    const metrics = deps.metrics ?? new MetricsCollector(options.metrics, logger);
    const clock = deps.clock ?? systemClock;
    const { profile, credential } = settings;

    const transport =
      deps.transport ??
      new HttpTransport(
        {
          baseUrl: options.baseUrl ?? profile.baseUrl,
          timeoutMs: options.transport.timeoutMs,
          keepAlive: options.transport.keepAlive,
        },
        metrics,
        logger
      );
    const store =
      deps.limitStore ??
      new KeyvLimitStore(
        { ...options.limitStore, namespace: options.limitStore.namespace ?? profile.limitsNamespace },
        logger
      );
    const rateLimiter = new RateLimiter(logger, metrics, clock);

    this.logger = logger;
    this.metrics = metrics;
    this.store = store;
    this.profile = profile;
    this.enableRateLimit = settings.enableRateLimit;
    this.requiredParams = settings.requiredParams;

    this.probe = new LimitProbe(
      transport,
      credential,
      store,
      rateLimiter,
      {
        defaultPerRequestCap: options.probe.defaultPerRequestCap,
        sampleLimit: options.probe.sampleLimit,
        windowMs: options.probe.windowSeconds * 1000,
        rateLimitMarkers: options.probe.rateLimitMarkers ?? profile.rateLimitMarkers,
      },
      logger,
      metrics,
      clock
    );

    const executor = new RequestExecutor(
      transport,
      rateLimiter,
      (endpoint) => this.limitsCache.get(endpoint),
      {
        credential,
        enableRateLimit: settings.enableRateLimit,
        maxRetries: options.maxRetries,
        retryDelayMs: options.retryDelaySeconds * 1000,
        retryableStatusCodes: options.retryableStatusCodes,
      },
      logger,
      metrics,
      clock
    );

    this.paginator = new Paginator(
      executor,
      this,
      { ...options.pagination, workerPoolSize: options.workerPoolSize },
      logger,
      metrics
    );
  }

  /**
   * Create a client
   *
   * Validates options, resolves the profile and credential, and loads the
   * required params file when one is configured.
   *
   * @param options - Client options; the credential may come from the profile's env var
   * @param deps - Optional collaborators (transport, limit store, clock, logger, metrics)
   * @throws {z.ZodError} If options are invalid
   * @throws {ConfigError} If no credential is available or the params file is unreadable
   *
   * @example
   * ```typescript
   * const client = await PagedDataClient.init({
   *   profile: 'tushare',
   *   credential: process.env.TUSHARE_TOKEN,
   *   workerPoolSize: 5,
   * });
   *
   * const daily = await client.fetch('daily', ['ts_code', 'trade_date', 'close'], {}, {
   *   limit: 240000,
   *   concurrent: true,
   * });
   * ```
   */
  static async init(options: ClientOptions = {}, deps: ClientDeps = {}): Promise<PagedDataClient> {
    const validated = validateOptions(options);
    const profile = resolveProfile(validated.profile);
    const logger = deps.logger ?? new Logger(validated.logging);

    const credential = validated.credential ?? process.env[profile.credentialEnvVar];
    if (!credential) {
      throw new ConfigError(
        `A credential must be provided either as an option or via the ${profile.credentialEnvVar} environment variable`,
        { profile: profile.name }
      );
    }

    const fileParams = validated.requiredParamsFile
      ? await loadRequiredParamsFile(validated.requiredParamsFile)
      : undefined;

    const client = new PagedDataClient(
      validated,
      {
        profile,
        credential,
        enableRateLimit: validated.enableRateLimit ?? profile.enableRateLimit,
        requiredParams: mergeRequiredParams(
          logger,
          profile.requiredParams,
          fileParams,
          validated.requiredParams
        ),
      },
      { ...deps, logger }
    );

    logger.info('Client initialized', {
      profile: profile.name,
      enableRateLimit: client.enableRateLimit,
      workerPoolSize: validated.workerPoolSize,
    });

    return client;
  }

  /**
   * Fetch the complete result set for an endpoint
   *
   * With auto paging on (the default) the endpoint's per-request cap is
   * resolved first (probing it on first use) and the fetch is split into pages.
   * `limit` and `offset` may be given in options or as params.
   *
   * @throws {RequestFailedError} If a page exhausts its retries
   * @throws {FetchAbortedError} If the signal is aborted
   */
  async fetch(
    endpoint: string,
    fields: string[] = [],
    params: RequestParams = {},
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    const { limit: paramLimit, offset: paramOffset, ...rest } = params;
    const validated = FetchOptionsSchema.parse({
      autoPaging: options.autoPaging,
      concurrent: options.concurrent,
      maxPages: options.maxPages,
      limit: options.limit ?? toCount('limit', paramLimit),
      offset: options.offset ?? toCount('offset', paramOffset),
    });

    const request: FetchRequest = {
      endpoint,
      fields,
      params: rest,
      autoPaging: validated.autoPaging ?? true,
      concurrent: validated.concurrent ?? false,
      maxPages: validated.maxPages,
      limit: validated.limit,
      offset: validated.offset,
      signal: options.signal,
      correlationId: generateCorrelationId(),
    };

    const mode = !request.autoPaging ? 'single' : request.concurrent ? 'concurrent' : 'sequential';
    const startTime = Date.now();

    return withFetchSpan(endpoint, mode, async () => {
      try {
        const result = await this.paginator.fetch(request);

        this.metrics.recordLatency('fetch_duration', Date.now() - startTime, { endpoint });
        this.metrics.recordGauge('rows_fetched', result.rows.length, { endpoint });
        this.logger.info('Fetch complete', {
          endpoint,
          mode,
          rows: result.rows.length,
          pages: result.pageCount,
          correlationId: request.correlationId,
        });

        return result;
      } catch (error: unknown) {
        this.logger.error('Fetch failed', {
          endpoint,
          mode,
          correlationId: request.correlationId,
          error: errorMessage(error),
        });
        throw error;
      }
    });
  }

  /**
   * Limits for an endpoint: memory cache, then the limit store, then a probe.
   * Concurrent first-use calls share a single resolution, which runs detached
   * from any one caller's signal; each caller stops waiting on its own abort.
   */
  async getLimits(endpoint: string, signal?: AbortSignal): Promise<EndpointLimits> {
    const cached = this.limitsCache.get(endpoint);
    if (cached) return cached;

    let resolution = this.pendingLimits.get(endpoint);
    if (!resolution) {
      const started: Promise<EndpointLimits> = this.resolveLimits(endpoint, this.generationOf(endpoint)).finally(
        () => {
          if (this.pendingLimits.get(endpoint) === started) {
            this.pendingLimits.delete(endpoint);
          }
        }
      );
      this.pendingLimits.set(endpoint, started);
      resolution = started;
    }

    return raceAbort(resolution, signal, { endpoint });
  }

  async clearLimits(endpoint: string): Promise<void> {
    this.limitGenerations.set(endpoint, this.generationOf(endpoint) + 1);
    const wasCached = this.limitsCache.delete(endpoint);
    const wasPending = this.pendingLimits.delete(endpoint);
    await this.store.delete(endpoint);

    this.logger.info('Endpoint limits cleared', { endpoint, wasCached, wasPending });
  }

  /**
   * Drop everything known about an endpoint's limits and probe it again
   */
  async forceRedetect(endpoint: string, signal?: AbortSignal): Promise<EndpointLimits> {
    await this.clearLimits(endpoint);
    this.logger.info('Re-detecting endpoint limits', { endpoint });

    try {
      return await this.getLimits(endpoint, signal);
    } catch (error: unknown) {
      this.logger.error('Limit re-detection failed', { endpoint, error: errorMessage(error) });
      throw error;
    }
  }

  /**
   * Fixed params an endpoint needs to answer a probe meaningfully (e.g. an index code)
   */
  registerRequiredParams(endpoint: string, params: RequestParams): void {
    this.requiredParams.set(endpoint, { ...params });
    this.logger.info('Required params registered', { endpoint, params });
  }

  getProfile(): ClientProfile {
    return this.profile;
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.store.disconnect?.();
    await this.metrics.close();
  }

  private generationOf(endpoint: string): number {
    return this.limitGenerations.get(endpoint) ?? 0;
  }

  private async resolveLimits(endpoint: string, generation: number): Promise<EndpointLimits> {
    const isCurrent = () => this.generationOf(endpoint) === generation;
    const stored = await this.store.get(endpoint);
    let limits: EndpointLimits;

    if (stored) {
      // With rate limiting off, a stored rate is ignored
      limits = this.enableRateLimit ? stored : { ...stored, ratePerMinute: 0 };
      this.logger.debug('Using stored endpoint limits', {
        endpoint,
        perRequestCap: limits.perRequestCap,
        ratePerMinute: limits.ratePerMinute,
      });
    } else {
      limits = await this.probe.probeLimits(endpoint, this.requiredParams.get(endpoint) ?? {}, {
        detectRate: this.enableRateLimit,
        shouldPersist: isCurrent,
      });
    }

    // Cleared while resolving: hand the result to waiting callers only
    if (isCurrent()) {
      this.limitsCache.set(endpoint, limits);
    }
    return limits;
  }
}

/**
 * Rows as objects keyed by field name
 */
export function toRecords(result: FetchResult): Array<Record<string, CellValue>> {
  return result.rows.map((row) => {
    const record: Record<string, CellValue> = {};
    result.fieldNames.forEach((name, i) => {
      record[name] = i < row.length ? row[i] : null;
    });
    return record;
  });
}
