import { REQUEST_TIMEOUT_MS } from '../settings.js';
import { ConnectionError } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Minimal HTTP transport the session sends every request through
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Transport backed by the global fetch, with a per-request timeout
 */
export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number = REQUEST_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    // An abort listener never fires for a signal that is already aborted
    if (request.signal?.aborted) {
      throw request.signal.reason;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // Caller cancellation aborts the same request
    const onAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new ConnectionError('Request timed out');
        }
        throw new ConnectionError(`Network error: ${error.message}`);
      }
      throw new ConnectionError('Unknown network error');
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Reject as soon as the signal aborts, without cancelling the underlying promise.
 * Used when several callers share one in-flight operation.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    // Settling after an abort is a no-op, but keeps the shared promise handled
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
