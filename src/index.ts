// src/index.ts

export { PagedDataClient, toRecords } from './client';
export type { ClientDeps, FetchOptions } from './client';

export type { CellValue, Row, RequestParams, PageResult, Transport, TransportRequest, TransportResponse } from './core/transport/types';
export type { EndpointLimits, LimitStore, LimitStoreConfig } from './core/limits/types';
export type { FetchResult } from './core/pagination/types';
export type { Clock } from './utils/clock';

export { HttpTransport } from './core/transport/HttpTransport';
export { KeyvLimitStore } from './core/limits/LimitStore';
export { inferPerRequestCap } from './core/limits/LimitProbe';
export { hasMorePages } from './core/pagination/Paginator';
export { RATE_WINDOW_MS } from './core/ratelimit/RateLimiter';
export { classifyError, shouldRetry, DEFAULT_RETRYABLE_STATUS_CODES } from './core/request/RetryHandler';
export type { ErrorKind } from './core/request/RetryHandler';

export { PROFILES, RATE_LIMIT_MARKER, resolveProfile } from './config/profiles';
export type { ClientProfile, ProfileName } from './config/profiles';
export { validateOptions, validateOptionsSafe } from './config/ConfigValidator';
export type { ClientOptions, ValidatedClientOptions } from './config/ConfigValidator';

export { Logger } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export { initializeTracing } from './observability/tracing';

// Export error classes for error handling
export {
  ClientError,
  ConfigError,
  TransportError,
  TransportTimeoutError,
  ApplicationError,
  RequestFailedError,
  OffsetOutOfRangeError,
  ProbeFailedError,
  FetchAbortedError,
} from './utils/errors';
