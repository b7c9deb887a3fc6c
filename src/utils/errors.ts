// src/utils/errors.ts

export class ClientError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Transport errors: the request never produced a decoded server response
export class TransportError extends ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TRANSPORT_TIMEOUT';
  }
}

/**
 * The server answered, but with a non-zero status code.
 */
export class ApplicationError extends ClientError {
  constructor(
    message: string,
    public statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'APPLICATION_ERROR', { ...details, statusCode });
  }
}

export class RequestFailedError extends ClientError {
  constructor(
    message: string,
    public endpoint: string,
    public attempts: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'REQUEST_FAILED', { ...details, endpoint, attempts });
  }
}

/**
 * A page was requested past the end of the data. The paginator turns this
 * into an empty final page instead of failing the fetch.
 */
export class OffsetOutOfRangeError extends RequestFailedError {
  constructor(message: string, endpoint: string, attempts: number, details?: Record<string, unknown>) {
    super(message, endpoint, attempts, details);
    this.code = 'OFFSET_OUT_OF_RANGE';
  }
}

export class ProbeFailedError extends ClientError {
  constructor(
    message: string,
    public endpoint: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'PROBE_FAILED', { ...details, endpoint });
  }
}

export class FetchAbortedError extends ClientError {
  constructor(message: string = 'Fetch aborted', details?: Record<string, unknown>) {
    super(message, 'FETCH_ABORTED', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const OFFSET_OUT_OF_RANGE_MARKERS = ['超出范围'];

export function isOffsetOutOfRange(message: string): boolean {
  if (message.toLowerCase().includes('offset')) return true;
  return OFFSET_OUT_OF_RANGE_MARKERS.some((marker) => message.includes(marker));
}

export function throwIfAborted(signal: AbortSignal | undefined, details?: Record<string, unknown>): void {
  if (signal?.aborted) {
    throw new FetchAbortedError('Fetch aborted', details);
  }
}

/**
 * Settles with `promise`, or rejects with FetchAbortedError as soon as
 * `signal` aborts. The underlying work keeps running.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  details?: Record<string, unknown>
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new FetchAbortedError('Fetch aborted', details));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new FetchAbortedError('Fetch aborted', details));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
