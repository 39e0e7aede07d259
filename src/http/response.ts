/**
 * HTTP response model.
 *
 * A transport creates an `HttpResponse` from the status line, feeds it the
 * header lines one at a time and attaches the body stream. Callers read the
 * status and headers, then drain or take the body.
 *
 * @module http/response
 */

import { HeaderStore, type ReadonlyHeaders } from './headers.js';
import type { BodyStream } from './body-stream.js';
import { BodyStreamError, ValidationError } from '../errors/index.js';

/**
 * Coarse category of a status code.
 */
export type StatusClass = 'informational' | 'success' | 'redirection' | 'clientError' | 'serverError';

/**
 * Map a status code to its class.
 *
 * @example
 * ```typescript
 * statusClassOf(206); // 'success'
 * statusClassOf(503); // 'serverError'
 * ```
 */
export function statusClassOf(statusCode: number): StatusClass {
  if (statusCode < 200) return 'informational';
  if (statusCode < 300) return 'success';
  if (statusCode < 400) return 'redirection';
  if (statusCode < 500) return 'clientError';
  return 'serverError';
}

/**
 * Parsed `HTTP/<version> <code> <reason>` line.
 */
export interface StatusLine {
  httpVersion: string;
  statusCode: number;
  reasonPhrase: string;
}

const STATUS_LINE = /^HTTP\/(\d+(?:\.\d+)?) (\d{3})(?: (.*))?$/;

/**
 * Parse a response status line. A trailing `\r` is ignored; the reason
 * phrase may be empty.
 *
 * @throws {ValidationError} If the line is not a status line
 */
export function parseStatusLine(line: string): StatusLine {
  const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
  const match = STATUS_LINE.exec(trimmed);
  if (!match) {
    throw new ValidationError({ message: `Malformed status line: ${JSON.stringify(line)}`, field: 'statusLine' });
  }
  return {
    httpVersion: match[1],
    statusCode: Number.parseInt(match[2], 10),
    reasonPhrase: match[3] ?? '',
  };
}

/**
 * One HTTP response: status, headers and an optional owned body.
 *
 * The status code and reason phrase never change after construction.
 * Headers are appended while the head is parsed; callers only see them
 * through the read-only `headers` view.
 */
export class HttpResponse {
  private readonly status: number;
  private readonly reason: string;
  private readonly headerStore = new HeaderStore();
  private body: BodyStream | undefined;
  private bodyTaken = false;

  /**
   * @throws {ValidationError} If `statusCode` is not an integer in 100..599
   */
  constructor(statusCode: number, reasonPhrase: string) {
    if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
      throw new ValidationError({ message: `Invalid HTTP status code: ${statusCode}`, field: 'statusCode' });
    }
    this.status = statusCode;
    this.reason = reasonPhrase;
  }

  get statusCode(): number {
    return this.status;
  }

  get reasonPhrase(): string {
    return this.reason;
  }

  get statusClass(): StatusClass {
    return statusClassOf(this.status);
  }

  get headers(): ReadonlyHeaders {
    return this.headerStore;
  }

  /** Parse and store one raw header line; lines without `:` are ignored. */
  addHeaderLine(line: string): void {
    this.headerStore.addLine(line);
  }

  addHeader(name: string, value: string): void {
    this.headerStore.add(name, value);
  }

  /**
   * Attach the body, taking ownership. A previously attached body is released.
   */
  setBodyStream(stream: BodyStream | undefined): void {
    const previous = this.body;
    this.body = stream;
    this.bodyTaken = false;
    if (previous && previous !== stream) {
      previous.release();
    }
  }

  /** Whether a body is attached and still owned by this response */
  get hasBody(): boolean {
    return this.body !== undefined;
  }

  /**
   * Hand the body over to the caller. After this the response no longer
   * owns a body.
   *
   * @returns The body, or `undefined` for a response without one
   * @throws {BodyStreamError} If the body was already taken
   */
  takeBodyStream(): BodyStream | undefined {
    if (this.bodyTaken) {
      throw new BodyStreamError({ message: 'Response body has already been taken', reason: 'TAKEN' });
    }
    const body = this.body;
    this.body = undefined;
    this.bodyTaken = body !== undefined;
    return body;
  }

  /**
   * Drain the attached body. A response without a body yields an empty array.
   *
   * @throws {BodyStreamError} If the body was taken
   */
  async readBody(signal?: AbortSignal): Promise<Uint8Array> {
    if (this.bodyTaken) {
      throw new BodyStreamError({ message: 'Response body has already been taken', reason: 'TAKEN' });
    }
    if (!this.body) {
      return new Uint8Array(0);
    }
    return this.body.readToEnd(signal);
  }

  /** Drain the attached body and decode it as UTF-8. */
  async readBodyAsText(signal?: AbortSignal): Promise<string> {
    return new TextDecoder().decode(await this.readBody(signal));
  }

  /** Release the attached body, if any. */
  release(): void {
    this.body?.release();
  }
}

/**
 * Build a response from a raw head: a status line followed by header lines,
 * separated by `\n` (a `\r` before it is cut by the header parser). Parsing
 * stops at the first empty line.
 *
 * @throws {ValidationError} If the status line is malformed
 */
export function parseResponseHead(head: string): HttpResponse {
  const lines = head.split('\n');
  const status = parseStatusLine(lines[0] ?? '');
  const response = new HttpResponse(status.statusCode, status.reasonPhrase);

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line === '' || line === '\r') {
      break;
    }
    response.addHeaderLine(line);
  }

  return response;
}
