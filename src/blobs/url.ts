/**
 * Blob URL helpers.
 *
 * @module blobs/url
 */

import { ConfigurationError } from '../errors/index.js';

/** Maximum blob name length */
export const MAX_BLOB_NAME_LENGTH = 1024;

/**
 * Encode a blob name for use in a URL path. `/` separators are kept.
 */
export function encodeBlobName(blobName: string): string {
  return blobName.split('/').map(encodeURIComponent).join('/');
}

/**
 * Build the URL of a blob under an account endpoint.
 *
 * @param sasToken - Appended as the query string, with or without a leading `?`
 * @throws {ConfigurationError} If the endpoint is not an absolute http(s) URL or a name is invalid
 */
export function buildBlobUrl(endpoint: string, containerName: string, blobName: string, sasToken?: string): string {
  if (!containerName) {
    throw new ConfigurationError({ message: 'Container name is required' });
  }
  if (!blobName) {
    throw new ConfigurationError({ message: 'Blob name is required' });
  }
  if (blobName.length > MAX_BLOB_NAME_LENGTH) {
    throw new ConfigurationError({ message: `Blob name exceeds ${MAX_BLOB_NAME_LENGTH} characters` });
  }

  const base = parseAbsoluteUrl(endpoint);
  const path = base.pathname.replace(/\/+$/, '');
  base.pathname = `${path}/${encodeURIComponent(containerName)}/${encodeBlobName(blobName)}`;
  if (sasToken) {
    base.search = sasToken.startsWith('?') ? sasToken : `?${sasToken}`;
  }
  return base.toString();
}

/**
 * Parse and check an absolute http(s) URL.
 *
 * @throws {ConfigurationError} If the URL is invalid
 */
export function parseAbsoluteUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid URL: ${url}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ConfigurationError({ message: `Unsupported URL scheme: ${parsed.protocol}` });
  }
  return parsed;
}

/**
 * Return `url` with a query parameter set, or removed when `value` is
 * `undefined` or empty.
 */
export function setQueryParameter(url: string, name: string, value: string | undefined): string {
  const parsed = new URL(url);
  if (value) {
    parsed.searchParams.set(name, value);
  } else {
    parsed.searchParams.delete(name);
  }
  return parsed.toString();
}

/**
 * Return `url` with extra query parameters appended. Existing parameters,
 * such as a SAS, are kept.
 */
export function appendQuery(url: string, query: Record<string, string | undefined>): string {
  const entries = Object.entries(query).filter((entry): entry is [string, string] => entry[1] !== undefined);
  if (entries.length === 0) {
    return url;
  }
  const parsed = new URL(url);
  for (const [name, value] of entries) {
    parsed.searchParams.set(name, value);
  }
  return parsed.toString();
}

/** Parts of a blob URL */
export interface BlobUrlParts {
  accountName?: string;
  containerName: string;
  blobName: string;
  snapshot?: string;
}

/**
 * Split a blob URL into container and blob name.
 *
 * The account name is taken from a `<account>.blob.<suffix>` host, or from
 * the first path segment when the host is an IP address or `localhost`
 * (emulator-style `http://127.0.0.1:10000/<account>/...` URLs).
 *
 * @throws {ConfigurationError} If the URL has no container and blob
 */
export function parseBlobUrl(url: string): BlobUrlParts {
  const parsed = parseAbsoluteUrl(url);
  const segments = parsed.pathname.split('/').filter((segment) => segment !== '');

  let accountName: string | undefined;
  const hostMatch = /^([a-z0-9]+)\.blob\./i.exec(parsed.hostname);
  if (hostMatch) {
    accountName = hostMatch[1];
  } else if (isPathStyleHost(parsed.hostname) && segments.length >= 3) {
    accountName = decodeURIComponent(segments.shift() ?? '');
  }

  if (segments.length < 2) {
    throw new ConfigurationError({ message: `URL does not name a blob: ${url}` });
  }

  const [container, ...blob] = segments;
  return {
    accountName,
    containerName: decodeURIComponent(container),
    blobName: blob.map(decodeURIComponent).join('/'),
    snapshot: parsed.searchParams.get('snapshot') ?? undefined,
  };
}

function isPathStyleHost(hostname: string): boolean {
  return hostname === 'localhost' || /^\d{1,3}(\.\d{1,3}){3}$/.test(hostname) || hostname.startsWith('[');
}
