/**
 * Request header builders.
 *
 * @module blobs/serialize
 */

import { ValidationError } from '../errors/index.js';
import type { BodyStream } from '../http/body-stream.js';
import type { AccessConditions, BlobHttpHeaders, ByteRange, Metadata } from './models.js';

const METADATA_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const METADATA_VALUE = /^[\x20-\x7e]*$/;

/** Page blob writes must be aligned to this many bytes */
export const PAGE_SIZE = 512;

/**
 * Check metadata names and values.
 *
 * Names must be identifiers and are compared case-insensitively; values must
 * be printable ASCII.
 *
 * @throws {ValidationError} On the first offending entry
 */
export function validateMetadata(metadata: Metadata): void {
  const seen = new Set<string>();
  for (const [name, value] of Object.entries(metadata)) {
    if (!METADATA_NAME.test(name)) {
      throw new ValidationError({ message: `Invalid metadata name '${name}'`, field: 'metadata' });
    }
    const key = name.toLowerCase();
    if (seen.has(key)) {
      throw new ValidationError({ message: `Duplicate metadata name '${name}'`, field: 'metadata' });
    }
    seen.add(key);
    if (!METADATA_VALUE.test(value)) {
      throw new ValidationError({
        message: `Metadata value for '${name}' must be printable ASCII without line breaks`,
        field: 'metadata',
      });
    }
  }
}

/**
 * `x-ms-meta-*` headers for `metadata`, validated first.
 */
export function metadataHeaders(metadata: Metadata | undefined): Record<string, string> {
  if (!metadata) {
    return {};
  }
  validateMetadata(metadata);
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(metadata)) {
    headers[`x-ms-meta-${name}`] = value;
  }
  return headers;
}

/**
 * `x-ms-blob-*` headers for the stored HTTP properties.
 */
export function httpHeadersToRequest(httpHeaders: BlobHttpHeaders | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!httpHeaders) {
    return headers;
  }
  if (httpHeaders.contentType !== undefined) headers['x-ms-blob-content-type'] = httpHeaders.contentType;
  if (httpHeaders.contentEncoding !== undefined) headers['x-ms-blob-content-encoding'] = httpHeaders.contentEncoding;
  if (httpHeaders.contentLanguage !== undefined) headers['x-ms-blob-content-language'] = httpHeaders.contentLanguage;
  if (httpHeaders.contentMd5 !== undefined) headers['x-ms-blob-content-md5'] = httpHeaders.contentMd5;
  if (httpHeaders.cacheControl !== undefined) headers['x-ms-blob-cache-control'] = httpHeaders.cacheControl;
  if (httpHeaders.contentDisposition !== undefined) {
    headers['x-ms-blob-content-disposition'] = httpHeaders.contentDisposition;
  }
  return headers;
}

/**
 * Conditional headers. With `prefix` set to `x-ms-source-` the same
 * conditions apply to a copy source.
 */
export function conditionHeaders(conditions: AccessConditions | undefined, prefix = ''): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!conditions) {
    return headers;
  }
  if (conditions.ifMatch) headers[`${prefix}if-match`] = conditions.ifMatch;
  if (conditions.ifNoneMatch) headers[`${prefix}if-none-match`] = conditions.ifNoneMatch;
  if (conditions.ifModifiedSince) headers[`${prefix}if-modified-since`] = conditions.ifModifiedSince.toUTCString();
  if (conditions.ifUnmodifiedSince) {
    headers[`${prefix}if-unmodified-since`] = conditions.ifUnmodifiedSince.toUTCString();
  }
  if (conditions.leaseId && prefix === '') headers['x-ms-lease-id'] = conditions.leaseId;
  return headers;
}

/**
 * `bytes=<start>-<end>` value for a range header, or `undefined` for the
 * whole blob.
 *
 * @throws {ValidationError} If the offset is negative or the length not positive
 */
export function formatRange(range: ByteRange | undefined): string | undefined {
  if (!range) {
    return undefined;
  }
  if (!Number.isInteger(range.offset) || range.offset < 0) {
    throw new ValidationError({ message: `Invalid range offset ${range.offset}`, field: 'range' });
  }
  if (range.length === undefined) {
    return range.offset === 0 ? undefined : `bytes=${range.offset}-`;
  }
  if (!Number.isInteger(range.length) || range.length <= 0) {
    throw new ValidationError({ message: `Invalid range length ${range.length}`, field: 'range' });
  }
  return formatByteRange(range.offset, range.length);
}

/** Inclusive `bytes=<start>-<end>` value covering `length` bytes from `offset` */
export function formatByteRange(offset: number, length: number): string {
  return `bytes=${offset}-${offset + length - 1}`;
}

/**
 * Check a page range against the 512-byte page size.
 *
 * @throws {ValidationError} If offset or length is unaligned, or length is not positive
 */
export function assertPageAligned(offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset % PAGE_SIZE !== 0) {
    throw new ValidationError({ message: `Page offset ${offset} must be a multiple of ${PAGE_SIZE}`, field: 'offset' });
  }
  if (!Number.isInteger(length) || length <= 0 || length % PAGE_SIZE !== 0) {
    throw new ValidationError({
      message: `Page range length ${length} must be a positive multiple of ${PAGE_SIZE}`,
      field: 'length',
    });
  }
}

/**
 * Check a page blob size.
 *
 * @throws {ValidationError} If the size is negative or unaligned
 */
export function assertPageBlobSize(size: number): void {
  if (!Number.isInteger(size) || size < 0 || size % PAGE_SIZE !== 0) {
    throw new ValidationError({ message: `Page blob size ${size} must be a multiple of ${PAGE_SIZE}`, field: 'size' });
  }
}

/**
 * Normalize upload data to a request body and its length.
 *
 * @throws {ValidationError} If a stream's length is unknown
 */
export function toRequestBody(
  data: Uint8Array | string | BodyStream,
  contentLength?: number
): { body: Uint8Array | BodyStream; length: number } {
  if (typeof data === 'string') {
    const bytes = new TextEncoder().encode(data);
    return { body: bytes, length: bytes.length };
  }
  if (data instanceof Uint8Array) {
    return { body: data, length: data.length };
  }
  const length = contentLength ?? data.length;
  if (length === undefined) {
    throw new ValidationError({ message: 'Content length is required for streams of unknown size', field: 'contentLength' });
  }
  return { body: data, length };
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Check a block id: non-empty base64 of at most 64 bytes.
 *
 * @throws {ValidationError} If the id is invalid
 */
export function assertBlockId(blockId: string): void {
  if (!BASE64.test(blockId) || blockId.length % 4 !== 0 || Buffer.from(blockId, 'base64').length > 64) {
    throw new ValidationError({ message: `Invalid block id '${blockId}'`, field: 'blockId' });
  }
}
