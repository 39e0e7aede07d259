/**
 * Result shaping from response headers.
 *
 * Every lookup goes through `ReadonlyHeaders`, so header name case on the
 * wire does not matter.
 *
 * @module blobs/deserialize
 */

import { StorageError } from '../errors/index.js';
import type { ReadonlyHeaders } from '../http/headers.js';
import type {
  AccessTier,
  BlobAppendInfo,
  BlobContentInfo,
  BlobCopyInfo,
  BlobHttpHeaders,
  BlobInfo,
  BlobProperties,
  BlobSnapshotInfo,
  BlobType,
  BlockInfo,
  ContentRange,
  CopyState,
  CopyStatus,
  LeaseState,
  LeaseStatus,
  Metadata,
  PageInfo,
  ResponseInfo,
} from './models.js';

const METADATA_PREFIX = 'x-ms-meta-';

const BLOB_TYPES: readonly BlobType[] = ['BlockBlob', 'AppendBlob', 'PageBlob'];
const COPY_STATUSES: readonly CopyStatus[] = ['pending', 'success', 'aborted', 'failed'];
const LEASE_STATUSES: readonly LeaseStatus[] = ['locked', 'unlocked'];
const LEASE_STATES: readonly LeaseState[] = ['available', 'leased', 'expired', 'breaking', 'broken'];
const ACCESS_TIERS: readonly AccessTier[] = [
  'Hot', 'Cool', 'Cold', 'Archive',
  'P4', 'P6', 'P10', 'P15', 'P20', 'P30', 'P40', 'P50', 'P60', 'P70', 'P80',
];

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function invalidResponse(message: string): StorageError {
  return new StorageError({ message, code: 'InvalidResponse' });
}

/**
 * Parse an HTTP date. Invalid or missing values yield `undefined`.
 */
export function parseHttpDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

function requireHeader(headers: ReadonlyHeaders, name: string): string {
  const value = headers.get(name);
  if (value === undefined) {
    throw invalidResponse(`Response is missing the ${name} header`);
  }
  return value;
}

function requireDate(headers: ReadonlyHeaders, name: string): Date {
  const date = parseHttpDate(requireHeader(headers, name));
  if (!date) {
    throw invalidResponse(`Response has an invalid ${name} header`);
  }
  return date;
}

function requireInteger(headers: ReadonlyHeaders, name: string): number {
  const value = parseInteger(requireHeader(headers, name));
  if (value === undefined) {
    throw invalidResponse(`Response has an invalid ${name} header`);
  }
  return value;
}

/** Request ids, service version and date */
export function parseResponseInfo(headers: ReadonlyHeaders): ResponseInfo {
  return {
    requestId: headers.get('x-ms-request-id'),
    clientRequestId: headers.get('x-ms-client-request-id'),
    version: headers.get('x-ms-version'),
    date: parseHttpDate(headers.get('date')),
  };
}

/**
 * Collect `x-ms-meta-*` headers. Names keep the case they arrived with,
 * minus the prefix.
 */
export function parseMetadata(headers: ReadonlyHeaders): Metadata {
  const entries: Array<[string, string]> = [];
  for (const { name, value } of headers) {
    if (name.length > METADATA_PREFIX.length && name.toLowerCase().startsWith(METADATA_PREFIX)) {
      entries.push([name.slice(METADATA_PREFIX.length), value]);
    }
  }
  // fromEntries defines own properties, so a `__proto__` key stays a key
  return Object.fromEntries(entries);
}

/** Stored HTTP properties as returned on GET and HEAD */
export function parseHttpHeaders(headers: ReadonlyHeaders): BlobHttpHeaders {
  return {
    contentType: headers.get('content-type'),
    contentEncoding: headers.get('content-encoding'),
    contentLanguage: headers.get('content-language'),
    contentMd5: headers.get('x-ms-blob-content-md5') ?? headers.get('content-md5'),
    cacheControl: headers.get('cache-control'),
    contentDisposition: headers.get('content-disposition'),
  };
}

/** Copy state, when the blob was the target of a copy */
export function parseCopyState(headers: ReadonlyHeaders): CopyState | undefined {
  const copyId = headers.get('x-ms-copy-id');
  const status = oneOf(COPY_STATUSES, headers.get('x-ms-copy-status'));
  if (!copyId || !status) {
    return undefined;
  }
  return {
    copyId,
    status,
    source: headers.get('x-ms-copy-source'),
    progress: headers.get('x-ms-copy-progress'),
    completedOn: parseHttpDate(headers.get('x-ms-copy-completion-time')),
    statusDescription: headers.get('x-ms-copy-status-description'),
  };
}

/**
 * Blob type from `x-ms-blob-type`.
 *
 * @throws {StorageError} If the header is missing or unknown
 */
export function parseBlobType(headers: ReadonlyHeaders): BlobType {
  const value = headers.get('x-ms-blob-type');
  const blobType = oneOf(BLOB_TYPES, value);
  if (!blobType) {
    throw invalidResponse(`Unknown blob type '${value ?? ''}'`);
  }
  return blobType;
}

/**
 * Parse `Content-Range: bytes <start>-<end>/<total>`. `*` totals are
 * reported as unknown.
 */
export function parseContentRange(value: string | undefined): ContentRange | undefined {
  if (!value) {
    return undefined;
  }
  const match = /^bytes (\d+)-(\d+)\/(\d+|\*)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const start = Number.parseInt(match[1], 10);
  const end = Number.parseInt(match[2], 10);
  return {
    offset: start,
    length: end - start + 1,
    totalSize: match[3] === '*' ? undefined : Number.parseInt(match[3], 10),
  };
}

/** Properties from a HEAD or GET response */
export function parseBlobProperties(headers: ReadonlyHeaders): BlobProperties {
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    creationTime: parseHttpDate(headers.get('x-ms-creation-time')),
    contentLength: parseInteger(headers.get('content-length')) ?? 0,
    blobType: parseBlobType(headers),
    httpHeaders: parseHttpHeaders(headers),
    metadata: parseMetadata(headers),
    accessTier: oneOf(ACCESS_TIERS, headers.get('x-ms-access-tier')),
    accessTierInferred: parseBoolean(headers.get('x-ms-access-tier-inferred')),
    leaseStatus: oneOf(LEASE_STATUSES, headers.get('x-ms-lease-status')),
    leaseState: oneOf(LEASE_STATES, headers.get('x-ms-lease-state')),
    serverEncrypted: parseBoolean(headers.get('x-ms-server-encrypted')),
    sequenceNumber: parseInteger(headers.get('x-ms-blob-sequence-number')),
    committedBlockCount: parseInteger(headers.get('x-ms-blob-committed-block-count')),
    versionId: headers.get('x-ms-version-id'),
    copy: parseCopyState(headers),
  };
}

export function parseBlobInfo(headers: ReadonlyHeaders): BlobInfo {
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    sequenceNumber: parseInteger(headers.get('x-ms-blob-sequence-number')),
  };
}

export function parseContentInfo(headers: ReadonlyHeaders): BlobContentInfo {
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    versionId: headers.get('x-ms-version-id'),
    serverEncrypted: parseBoolean(headers.get('x-ms-request-server-encrypted')),
    contentMd5: headers.get('content-md5'),
    sequenceNumber: parseInteger(headers.get('x-ms-blob-sequence-number')),
  };
}

export function parseCopyInfo(headers: ReadonlyHeaders): BlobCopyInfo {
  const copyStatus = oneOf(COPY_STATUSES, headers.get('x-ms-copy-status'));
  if (!copyStatus) {
    throw invalidResponse(`Unknown copy status '${headers.get('x-ms-copy-status') ?? ''}'`);
  }
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    copyId: requireHeader(headers, 'x-ms-copy-id'),
    copyStatus,
    versionId: headers.get('x-ms-version-id'),
  };
}

export function parseSnapshotInfo(headers: ReadonlyHeaders): BlobSnapshotInfo {
  return {
    ...parseResponseInfo(headers),
    snapshot: requireHeader(headers, 'x-ms-snapshot'),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    versionId: headers.get('x-ms-version-id'),
  };
}

export function parseBlockInfo(headers: ReadonlyHeaders): BlockInfo {
  return {
    ...parseResponseInfo(headers),
    contentMd5: headers.get('content-md5'),
    serverEncrypted: parseBoolean(headers.get('x-ms-request-server-encrypted')),
  };
}

export function parseAppendInfo(headers: ReadonlyHeaders): BlobAppendInfo {
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    appendOffset: requireInteger(headers, 'x-ms-blob-append-offset'),
    committedBlockCount: requireInteger(headers, 'x-ms-blob-committed-block-count'),
    serverEncrypted: parseBoolean(headers.get('x-ms-request-server-encrypted')),
  };
}

export function parsePageInfo(headers: ReadonlyHeaders): PageInfo {
  return {
    ...parseResponseInfo(headers),
    etag: requireHeader(headers, 'etag'),
    lastModified: requireDate(headers, 'last-modified'),
    sequenceNumber: parseInteger(headers.get('x-ms-blob-sequence-number')) ?? 0,
    contentMd5: headers.get('content-md5'),
    serverEncrypted: parseBoolean(headers.get('x-ms-request-server-encrypted')),
  };
}
