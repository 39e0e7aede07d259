/**
 * HTTP transport type definitions
 */

import type { BodyStream } from './body-stream.js';
import type { HttpResponse } from './response.js';

/**
 * HTTP methods used by the blob service
 */
export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** Request headers; later policies may overwrite earlier values */
  headers: Record<string, string>;
  /** Request body (optional). A `BodyStream` is consumed by the transport. */
  body?: Uint8Array | BodyStream;
  /** Aborts the request and any body read still in flight */
  signal?: AbortSignal;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends a request and resolves once the response head has arrived.
   *
   * The returned response owns a streaming body; the caller must drain,
   * take or release it.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases pooled connections
   */
  close(): Promise<void>;
}

