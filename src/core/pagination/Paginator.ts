// src/core/pagination/Paginator.ts

import PQueue from 'p-queue';
import type { FetchRequest, FetchResult, LimitsResolver, Page, PaginationConfig } from './types';
import type { RequestExecutor } from '../request/RequestExecutor';
import type { PageResult, RequestParams, Row } from '../transport/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { OffsetOutOfRangeError, throwIfAborted } from '../../utils/errors';

type Mode = 'single' | 'sequential' | 'concurrent';

/**
 * Whether another page should follow. An explicit flag wins; without one a
 * full page means there may be more.
 */
export function hasMorePages(result: PageResult, requestedLimit: number): boolean {
  if (typeof result.hasMore === 'boolean') return result.hasMore;
  return result.rows.length >= requestedLimit;
}

export class Paginator {
  constructor(
    private executor: RequestExecutor,
    private limits: LimitsResolver,
    private config: PaginationConfig,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    throwIfAborted(request.signal, { endpoint: request.endpoint });

    if (!request.autoPaging) {
      return this.fetchSingle(request);
    }

    const { perRequestCap } = await this.limits.getLimits(request.endpoint, request.signal);

    // No cap: the server returns everything in one call
    if (perRequestCap === 0) {
      return this.fetchSingle(request);
    }

    return request.concurrent
      ? this.fetchConcurrent(request, perRequestCap)
      : this.fetchSequential(request, perRequestCap);
  }

  /**
   * Offset/limit descriptors for concurrent mode, in ascending offset order
   */
  planPages(request: FetchRequest, perRequestCap: number): Page[] {
    const offset = request.offset ?? 0;
    const userLimit = request.limit;
    let maxPages = request.maxPages;

    if (maxPages === undefined) {
      if (userLimit !== undefined) {
        maxPages = Math.ceil(userLimit / perRequestCap);
      } else {
        maxPages = this.config.defaultMaxPages;
        this.logger.warn('No limit or maxPages for concurrent fetch, using page ceiling', {
          endpoint: request.endpoint,
          maxPages,
          correlationId: request.correlationId,
        });
      }
    }

    const pages: Page[] = [];
    for (let index = 0; index < maxPages; index++) {
      let pageLimit = perRequestCap;

      if (userLimit !== undefined) {
        const remaining = userLimit - index * perRequestCap;
        if (remaining <= 0) break;
        pageLimit = Math.min(perRequestCap, remaining);
      }

      pages.push(this.buildPage(request, index, offset + index * perRequestCap, pageLimit));
    }

    return pages;
  }

  private async fetchSingle(request: FetchRequest): Promise<FetchResult> {
    const params: RequestParams = { ...request.params };
    if (request.offset !== undefined) params.offset = request.offset;
    if (request.limit !== undefined) params.limit = request.limit;

    const page: Page = { endpoint: request.endpoint, params, fields: request.fields, index: 0 };
    const result = await this.executor.execute(page, request.signal);
    this.recordPage(request.endpoint, 'single');

    return { fieldNames: result.fieldNames, rows: result.rows, pageCount: 1 };
  }

  private async fetchSequential(request: FetchRequest, perRequestCap: number): Promise<FetchResult> {
    const rows: Row[] = [];
    const userLimit = request.limit;
    let fieldNames: string[] | undefined;
    let offset = request.offset ?? 0;
    let pageCount = 0;

    for (;;) {
      throwIfAborted(request.signal, { endpoint: request.endpoint });

      let pageLimit = perRequestCap;
      if (userLimit !== undefined) {
        const remaining = userLimit - rows.length;
        if (remaining <= 0) break;
        pageLimit = Math.min(perRequestCap, remaining);
      }

      const page = this.buildPage(request, pageCount, offset, pageLimit);
      this.logger.info('Requesting page', {
        endpoint: request.endpoint,
        offset,
        limit: pageLimit,
        correlationId: request.correlationId,
      });

      const result = await this.fetchPage(page, request.signal);
      pageCount++;
      this.recordPage(request.endpoint, 'sequential');

      if (!fieldNames && result.rows.length > 0) {
        fieldNames = result.fieldNames;
      }
      for (const row of result.rows) rows.push(row);

      if (!hasMorePages(result, pageLimit)) break;

      // An empty page cannot advance the offset
      if (result.rows.length === 0) {
        this.logger.warn('Empty page while the server reports more data, stopping', {
          endpoint: request.endpoint,
          offset,
          pages: pageCount,
          correlationId: request.correlationId,
        });
        break;
      }

      offset += result.rows.length;
    }

    this.logger.info('Sequential fetch complete', {
      endpoint: request.endpoint,
      rows: rows.length,
      pages: pageCount,
      correlationId: request.correlationId,
    });

    return { fieldNames: fieldNames ?? [...request.fields], rows, pageCount };
  }

  private async fetchConcurrent(request: FetchRequest, perRequestCap: number): Promise<FetchResult> {
    const pages = this.planPages(request, perRequestCap);
    const batchSize = this.config.workerPoolSize;
    const pool = new PQueue({ concurrency: batchSize });
    const collected: Array<{ index: number; rows: Row[] }> = [];

    let fieldNames: string[] | undefined;
    let emptyStreak = 0;
    let exhausted = false;
    let pageCount = 0;

    for (let start = 0; start < pages.length; start += batchSize) {
      if (exhausted || emptyStreak >= this.config.emptyPageThreshold) {
        this.logger.info('No more data, stopping before next batch', {
          endpoint: request.endpoint,
          submittedPages: start,
          plannedPages: pages.length,
          emptyStreak,
          correlationId: request.correlationId,
        });
        break;
      }
      throwIfAborted(request.signal, { endpoint: request.endpoint });

      const batch = pages.slice(start, start + batchSize);
      const failures: unknown[] = [];

      // Results are taken in completion order; the batch fully settles before the next one
      await Promise.all(
        batch.map((page) =>
          pool.add(async () => {
            try {
              const result = await this.fetchPage(page, request.signal);
              pageCount++;
              this.recordPage(request.endpoint, 'concurrent');

              if (!fieldNames && result.rows.length > 0) {
                fieldNames = result.fieldNames;
              }

              if (result.rows.length === 0) {
                emptyStreak++;
              } else {
                emptyStreak = 0;
                collected.push({ index: page.index, rows: result.rows });
              }

              if (result.hasMore === false) {
                exhausted = true;
              }
            } catch (error: unknown) {
              failures.push(error);
            }
          })
        )
      );

      if (failures.length > 0) {
        throw failures[0];
      }
    }

    if (this.config.resultOrder === 'offset') {
      collected.sort((a, b) => a.index - b.index);
    }

    const rows: Row[] = [];
    for (const chunk of collected) {
      for (const row of chunk.rows) rows.push(row);
    }

    this.logger.info('Concurrent fetch complete', {
      endpoint: request.endpoint,
      rows: rows.length,
      pages: pageCount,
      correlationId: request.correlationId,
    });

    return { fieldNames: fieldNames ?? [...request.fields], rows, pageCount };
  }

  private async fetchPage(page: Page, signal?: AbortSignal): Promise<PageResult> {
    try {
      return await this.executor.execute(page, signal);
    } catch (error: unknown) {
      if (error instanceof OffsetOutOfRangeError) {
        this.logger.warn('Offset out of range, treating page as empty', {
          endpoint: page.endpoint,
          offset: page.params.offset,
          error: error.message,
        });
        return { fieldNames: [], rows: [], hasMore: false };
      }
      throw error;
    }
  }

  private buildPage(request: FetchRequest, index: number, offset: number, limit: number): Page {
    return {
      endpoint: request.endpoint,
      params: { ...request.params, offset, limit },
      fields: request.fields,
      index,
    };
  }

  private recordPage(endpoint: string, mode: Mode): void {
    this.metrics.incrementCounter('pages_fetched_total', { endpoint, mode });
  }
}
