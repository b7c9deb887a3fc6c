// src/core/transport/HttpTransport.ts

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { z } from 'zod';
import type {
  HttpTransportConfig,
  PageResult,
  Transport,
  TransportRequest,
  TransportResponse,
} from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  FetchAbortedError,
  TransportError,
  TransportTimeoutError,
  errorMessage,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// Wire shape: {code, msg, data: {fields, items, has_more}}
const WireResponseSchema = z.object({
  code: z.number().int(),
  msg: z.string().nullish(),
  data: z
    .object({
      fields: z.array(z.string()),
      items: z.array(z.array(CellSchema)),
      has_more: z.boolean().nullish(),
    })
    .nullish(),
});

type WireResponse = z.infer<typeof WireResponseSchema>;

export class HttpTransport implements Transport {
  private axiosInstance: AxiosInstance;
  private baseUrl: string;

  constructor(
    config: HttpTransportConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.baseUrl = config.baseUrl;
    const keepAlive = config.keepAlive ?? true;

    this.axiosInstance = axios.create({
      timeout: config.timeoutMs ?? 30000,
      headers: { 'Content-Type': 'application/json' },
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
    });
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    const requestId = this.generateRequestId();
    const { endpoint } = request;

    this.logger.debug('Data API request', {
      requestId,
      endpoint,
      params: request.params,
      fields: request.fields,
    });

    return withHttpSpan(endpoint, this.baseUrl, async () => {
      const startTime = Date.now();
      const payload = {
        api_name: endpoint,
        token: request.credential,
        params: request.params,
        fields: request.fields.join(','),
      };

      let body: unknown;
      try {
        const response = await this.axiosInstance.post<unknown>(this.baseUrl, payload, { signal });
        body = response.data;
      } catch (error: unknown) {
        this.metrics.incrementCounter('api_requests_total', { endpoint, status: 'error' });
        throw this.transformError(error, endpoint, signal);
      }

      const decoded = WireResponseSchema.safeParse(body);
      if (!decoded.success) {
        this.metrics.incrementCounter('api_requests_total', { endpoint, status: 'malformed' });
        throw new TransportError(`Malformed response from ${endpoint}`, {
          endpoint,
          requestId,
          issues: decoded.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
        });
      }

      const status = decoded.data.code === 0 ? 'ok' : String(decoded.data.code);
      this.metrics.incrementCounter('api_requests_total', { endpoint, status });
      this.metrics.recordLatency('api_request_duration', Date.now() - startTime, {
        endpoint,
        status,
      });

      return this.toTransportResponse(decoded.data);
    });
  }

  private toTransportResponse(wire: WireResponse): TransportResponse {
    const response: TransportResponse = {
      statusCode: wire.code,
      message: wire.msg ?? '',
    };

    if (wire.data) {
      const page: PageResult = { fieldNames: wire.data.fields, rows: wire.data.items };
      if (typeof wire.data.has_more === 'boolean') {
        page.hasMore = wire.data.has_more;
      }
      response.data = page;
    }

    return response;
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private transformError(error: unknown, endpoint: string, signal?: AbortSignal): Error {
    if (signal?.aborted || axios.isCancel(error)) {
      return new FetchAbortedError(`Request to ${endpoint} aborted`, { endpoint });
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        this.logger.debug('HTTP error response', {
          endpoint,
          status,
          statusText: error.response.statusText,
        });
        return new TransportError(`HTTP ${status} from ${endpoint}`, { endpoint, status });
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TransportTimeoutError(`Request to ${endpoint} timed out`, { endpoint });
      }
      return new TransportError(`Network error: ${error.message}`, {
        endpoint,
        cause: error.code,
      });
    }

    return new TransportError(errorMessage(error), { endpoint });
  }
}
