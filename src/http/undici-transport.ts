/**
 * undici-backed HTTP transport.
 *
 * One undici `Pool` is kept per origin. Requests are driven through
 * `dispatch` so the response head can be handed to the caller as soon as it
 * arrives, with the body streamed through a `PushBodyStream`.
 *
 * @module http/undici-transport
 */

import { Readable } from 'node:stream';
import { Pool, errors as undiciErrors, type Dispatcher } from 'undici';
import { HttpResponse } from './response.js';
import { BodyStream } from './body-stream.js';
import { PushBodyStream, DEFAULT_HIGH_WATER_MARK } from './push-body-stream.js';
import type { HttpRequest, HttpTransport } from './types.js';
import {
  NetworkError,
  OperationCancelledError,
  StorageError,
  TimeoutError,
  ValidationError,
} from '../errors/index.js';

/**
 * Transport configuration
 */
export interface UndiciTransportOptions {
  /** Time allowed for the response head, and between body chunks (default: 300000) */
  timeout?: number;
  /** Maximum connections per origin (default: 16) */
  connections?: number;
  /** Idle keep-alive timeout in milliseconds (default: 90000) */
  keepAliveTimeout?: number;
  /** Body bytes buffered before the socket is paused (default: 1 MB) */
  highWaterMark?: number;
}

const DEFAULT_TRANSPORT_OPTIONS: Required<UndiciTransportOptions> = {
  timeout: 300000,
  connections: 16,
  keepAliveTimeout: 90000,
  highWaterMark: DEFAULT_HIGH_WATER_MARK,
};

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map an undici or socket failure to the storage error hierarchy.
 * Errors already in the hierarchy pass through unchanged.
 */
export function mapTransportError(error: Error, url: string, operation = 'request'): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  if (
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError ||
    error instanceof undiciErrors.ConnectTimeoutError
  ) {
    return new TimeoutError({ message: error.message, operation, url, cause: error });
  }
  if (error instanceof undiciErrors.RequestAbortedError) {
    return new OperationCancelledError({ operation, cause: error });
  }
  const code = errorCode(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return new NetworkError({ message: error.message, url, cause: error });
  }
  return new StorageError({ message: `Request to ${url} failed: ${error.message}`, url, cause: error });
}

/**
 * Production transport built on undici.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport({ timeout: 60000 });
 * const response = await transport.send({ method: 'GET', url, headers: {} });
 * const body = await response.readBody();
 * await transport.close();
 * ```
 */
export class UndiciTransport implements HttpTransport {
  private readonly options: Required<UndiciTransportOptions>;
  private readonly pools = new Map<string, Pool>();
  private closed = false;

  constructor(options: UndiciTransportOptions = {}) {
    this.options = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new NetworkError({ message: 'Transport is closed', url: request.url });
    }
    if (request.signal?.aborted) {
      throw new OperationCancelledError({ operation: 'request' });
    }

    let url: URL;
    try {
      url = new URL(request.url);
    } catch (error) {
      throw new ValidationError({
        message: `Invalid request URL: ${request.url}`,
        field: 'url',
        cause: error instanceof Error ? error : undefined,
      });
    }
    const pool = this.poolFor(url.origin);

    return new Promise<HttpResponse>((resolve, reject) => {
      const signal = request.signal;
      let abortRequest: ((error: Error) => void) | undefined;
      let pendingAbort: Error | undefined;
      let response: HttpResponse | undefined;
      let body: PushBodyStream | undefined;
      let resumeSocket: (() => void) | undefined;
      let settled = false;

      const abort = (error: Error): void => {
        if (abortRequest) {
          abortRequest(error);
        } else {
          pendingAbort = error;
        }
      };

      const onSignal = (): void => {
        abort(new OperationCancelledError({ operation: response ? 'download' : 'request' }));
      };

      const finish = (): void => {
        signal?.removeEventListener('abort', onSignal);
      };

      signal?.addEventListener('abort', onSignal, { once: true });

      const handler: Dispatcher.DispatchHandlers = {
        onConnect: (abortFn) => {
          abortRequest = abortFn;
          if (pendingAbort) {
            abortFn(pendingAbort);
          }
        },

        onHeaders: (statusCode, rawHeaders, resume, statusText) => {
          if (statusCode < 200) {
            // Interim responses carry no body and are followed by the final head.
            return true;
          }

          response = new HttpResponse(statusCode, statusText);
          for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
            response.addHeader(rawHeaders[i].toString('latin1'), rawHeaders[i + 1].toString('latin1'));
          }

          resumeSocket = resume;
          const contentLength = response.headers.get('content-length');
          const length = contentLength !== undefined ? Number.parseInt(contentLength, 10) : undefined;
          body = new PushBodyStream({
            length: length !== undefined && Number.isFinite(length) ? length : undefined,
            highWaterMark: this.options.highWaterMark,
            onDrain: () => resumeSocket?.(),
            onRelease: () => abort(new OperationCancelledError({ operation: 'download' })),
          });
          response.setBodyStream(request.method === 'HEAD' ? undefined : body);

          settled = true;
          resolve(response);
          return true;
        },

        onData: (chunk) => {
          return body ? body.push(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength)) : true;
        },

        onComplete: () => {
          finish();
          body?.end();
        },

        onError: (error) => {
          finish();
          const mapped = mapTransportError(error, request.url, settled ? 'download' : 'request');
          if (!settled) {
            settled = true;
            reject(mapped);
            return;
          }
          body?.fail(mapped);
        },
      };

      pool.dispatch(
        {
          origin: url.origin,
          path: `${url.pathname}${url.search}`,
          method: request.method,
          headers: request.headers,
          body: toDispatchBody(request.body),
        },
        handler
      );
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }

  private poolFor(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: this.options.connections,
        pipelining: 1,
        keepAliveTimeout: this.options.keepAliveTimeout,
        headersTimeout: this.options.timeout,
        bodyTimeout: this.options.timeout,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }
}

function toDispatchBody(body: HttpRequest['body']): Uint8Array | Readable | undefined {
  if (body === undefined) {
    return undefined;
  }
  if (body instanceof BodyStream) {
    return Readable.from(body, { objectMode: false });
  }
  return body;
}
