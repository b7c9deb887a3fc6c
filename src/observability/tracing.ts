/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around logical fetches, page requests, limit probes and HTTP calls.
 * No-op unless enabled:
 * - OTEL_ENABLED=1
 * - OTEL_SERVICE_NAME=paged-data-client
 * - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces
 */

import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'paged-data-client';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Correlation id attached to every log line of one logical fetch
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : message);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  endpoint: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('HTTP POST', fn, {
    'http.method': 'POST',
    'http.url': url,
    'api.endpoint': endpoint,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span covering one logical fetch (all of its pages)
 */
export async function withFetchSpan<T>(
  endpoint: string,
  mode: 'single' | 'sequential' | 'concurrent',
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Fetch ${endpoint}`, fn, {
    'fetch.endpoint': endpoint,
    'fetch.mode': mode,
  });
}

export async function withPageSpan<T>(
  endpoint: string,
  offset: number,
  limit: number | undefined,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  const attributes: Record<string, string | number> = {
    'page.endpoint': endpoint,
    'page.offset': offset,
  };
  if (limit !== undefined) attributes['page.limit'] = limit;

  return withSpan(`Page ${endpoint}`, fn, attributes);
}

export async function withProbeSpan<T>(
  endpoint: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Probe ${endpoint}`, fn, { 'probe.endpoint': endpoint });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

export function addSpanEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}

/**
 * Initialize OpenTelemetry SDK (call once at app startup)
 *
 * @returns true if initialized, false if disabled
 */
export async function initializeTracing(): Promise<boolean> {
  if (!isOTelEnabled()) {
    return false;
  }

  try {
    // Loaded lazily so the SDK stays out of the process unless tracing is on
    const { NodeSDK } = await import('@opentelemetry/sdk-node');
    const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');

    const serviceName = process.env.OTEL_SERVICE_NAME || TRACER_NAME;
    const otlpEndpoint =
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces';

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: otlpEndpoint }),
    });

    sdk.start();

    console.log(`[OTEL] Tracing initialized: ${serviceName} -> ${otlpEndpoint}`);

    process.on('SIGTERM', () => {
      sdk
        .shutdown()
        .then(() => console.log('[OTEL] Tracing terminated'))
        .catch((error: unknown) => console.error('[OTEL] Error terminating tracing', error));
    });

    return true;
  } catch (error: unknown) {
    console.error('[OTEL] Failed to initialize tracing:', error instanceof Error ? error.message : error);
    return false;
  }
}
