/**
 * In-process transport for tests.
 *
 * Responses are written as raw HTTP heads and parsed the same way a
 * transport would, so header handling is exercised end to end.
 *
 * @module testing/mock-transport
 */

import { BodyStream, IterableBodyStream, MemoryBodyStream } from '../http/body-stream.js';
import { parseResponseHead, type HttpResponse } from '../http/response.js';
import type { HttpMethod, HttpRequest, HttpTransport } from '../http/types.js';
import { NetworkError, OperationCancelledError } from '../errors/index.js';

/** A request as seen by the transport, with its body drained */
export interface RecordedRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body: Uint8Array;
}

/** Canned response */
export interface MockResponse {
  /** Status line and header lines, e.g. `HTTP/1.1 200 OK\r\nETag: "0x1"\r\n` */
  head: string;
  /** Body as one buffer, or as chunks delivered one by one */
  body?: Uint8Array | string | Uint8Array[];
}

export type MockHandler = (request: RecordedRequest) => MockResponse | Promise<MockResponse>;

const REASONS: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  206: 'Partial Content',
  304: 'Not Modified',
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  412: 'Precondition Failed',
  416: 'Range Not Satisfiable',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

/**
 * Build a canned response from a status, header pairs and a body.
 * Header values given as arrays become repeated header lines.
 */
export function reply(
  statusCode: number,
  headers: Record<string, string | string[]> = {},
  body?: MockResponse['body']
): MockResponse {
  const lines = [`HTTP/1.1 ${statusCode} ${REASONS[statusCode] ?? 'Unknown'}`];
  for (const [name, value] of Object.entries(headers)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      lines.push(`${name}: ${item}`);
    }
  }
  return { head: `${lines.join('\r\n')}\r\n\r\n`, body };
}

/**
 * Service error response with an XML body.
 */
export function errorReply(statusCode: number, code: string, message = 'test error'): MockResponse {
  const xml = `<?xml version="1.0" encoding="utf-8"?><Error><Code>${code}</Code><Message>${message}</Message></Error>`;
  return reply(statusCode, { 'x-ms-error-code': code, 'x-ms-request-id': 'req-test', 'Content-Type': 'application/xml' }, xml);
}

function toBodyStream(body: MockResponse['body']): BodyStream | undefined {
  if (body === undefined) {
    return undefined;
  }
  if (Array.isArray(body)) {
    const chunks = body;
    const length = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    async function* source(): AsyncGenerator<Uint8Array> {
      for (const chunk of chunks) {
        yield chunk;
      }
    }
    return new IterableBodyStream(source(), length);
  }
  return typeof body === 'string' ? new MemoryBodyStream(new TextEncoder().encode(body)) : new MemoryBodyStream(body);
}

/**
 * Mock transport: answers from a queue of canned responses, then from the
 * handler, and records every request.
 */
export class MockTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly queue: (MockResponse | MockHandler)[] = [];
  private handler: MockHandler | undefined;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Queue responses, used in order */
  enqueue(...responses: (MockResponse | MockHandler)[]): this {
    this.queue.push(...responses);
    return this;
  }

  /** Answer every request not covered by the queue */
  setHandler(handler: MockHandler): this {
    this.handler = handler;
    return this;
  }

  /** The only request sent; fails when there were none or several */
  single(): RecordedRequest {
    if (this.requests.length !== 1) {
      throw new Error(`Expected exactly one request, got ${this.requests.length}`);
    }
    return this.requests[0];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new NetworkError({ message: 'Transport is closed', url: request.url });
    }
    if (request.signal?.aborted) {
      throw new OperationCancelledError({ operation: 'request' });
    }

    let body: Uint8Array = new Uint8Array(0);
    if (request.body instanceof BodyStream) {
      body = await request.body.readToEnd(request.signal);
    } else if (request.body) {
      body = request.body;
    }

    const recorded: RecordedRequest = {
      method: request.method,
      url: new URL(request.url),
      headers: { ...request.headers },
      body,
    };
    this.requests.push(recorded);

    const next = this.queue.shift() ?? this.handler;
    if (!next) {
      throw new NetworkError({ message: `No mock response for ${request.method} ${request.url}`, url: request.url });
    }
    const canned = typeof next === 'function' ? await next(recorded) : next;

    const response = parseResponseHead(canned.head);
    response.setBodyStream(request.method === 'HEAD' ? undefined : toBodyStream(canned.body));
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
