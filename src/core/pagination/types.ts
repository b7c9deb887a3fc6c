// src/core/pagination/types.ts

import type { EndpointLimits } from '../limits/types';
import type { RequestParams, Row } from '../transport/types';

export interface Page {
  readonly endpoint: string;
  readonly params: Readonly<RequestParams>;
  readonly fields: readonly string[];
  readonly index: number;
}

export interface FetchRequest {
  endpoint: string;
  fields: string[];
  params: RequestParams;
  autoPaging: boolean;
  concurrent: boolean;
  maxPages?: number;
  limit?: number; // total rows wanted across all pages
  offset?: number;
  signal?: AbortSignal;
  correlationId?: string;
}

export interface FetchResult {
  fieldNames: string[];
  rows: Row[];
  pageCount: number;
}

export interface PaginationConfig {
  workerPoolSize: number;
  defaultMaxPages: number;
  emptyPageThreshold: number;
  resultOrder: 'completion' | 'offset';
}

export interface LimitsResolver {
  getLimits(endpoint: string, signal?: AbortSignal): Promise<EndpointLimits>;
}
