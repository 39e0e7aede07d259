/**
 * Storage connection strings.
 *
 * @module blobs/connection-string
 */

import { ConfigurationError } from '../errors/index.js';
import { readEnvironment, type BlobClientOptions } from '../client/config.js';
import { buildBlobUrl } from './url.js';

/** Settings needed to reach the blob endpoint */
export interface ConnectionStringSettings {
  blobEndpoint: string;
  accountName?: string;
  /** SAS query string without the leading `?` */
  sasToken?: string;
}

const DEFAULT_PROTOCOL = 'https';
const DEFAULT_ENDPOINT_SUFFIX = 'core.windows.net';

/**
 * Split `Key=Value;Key=Value` pairs. Values may contain `=`; keys are
 * matched case-insensitively.
 */
function parsePairs(connectionString: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const part of connectionString.split(';')) {
    const trimmed = part.trim();
    if (!trimmed) {
      continue;
    }
    const eq = trimmed.indexOf('=');
    if (eq <= 0) {
      throw new ConfigurationError({ message: `Malformed connection string segment '${trimmed.split('=')[0]}'` });
    }
    pairs.set(trimmed.slice(0, eq).toLowerCase(), trimmed.slice(eq + 1));
  }
  return pairs;
}

/**
 * Parse a connection string into the blob endpoint and optional SAS.
 *
 * `BlobEndpoint` wins over an endpoint derived from `AccountName`,
 * `DefaultEndpointsProtocol` and `EndpointSuffix`.
 *
 * @throws {ConfigurationError} If no endpoint can be derived, or the string
 * carries an account key without a SAS
 */
export function parseConnectionString(connectionString: string): ConnectionStringSettings {
  const pairs = parsePairs(connectionString);

  const accountName = pairs.get('accountname');
  const sas = pairs.get('sharedaccesssignature');
  const sasToken = sas ? sas.replace(/^\?/, '') : undefined;

  if (!sasToken && pairs.has('accountkey')) {
    throw new ConfigurationError({
      message: 'Account key credentials are not supported; provide a SharedAccessSignature',
    });
  }

  let blobEndpoint = pairs.get('blobendpoint');
  if (!blobEndpoint) {
    if (!accountName) {
      throw new ConfigurationError({ message: 'Connection string must contain BlobEndpoint or AccountName' });
    }
    const protocol = pairs.get('defaultendpointsprotocol') ?? DEFAULT_PROTOCOL;
    const suffix = pairs.get('endpointsuffix') ?? DEFAULT_ENDPOINT_SUFFIX;
    blobEndpoint = `${protocol}://${accountName}.blob.${suffix}`;
  }

  return {
    blobEndpoint: blobEndpoint.replace(/\/+$/, ''),
    accountName,
    sasToken,
  };
}

/**
 * Blob URL for `containerName/blobName` under the connection string's endpoint,
 * carrying its SAS.
 */
export function blobUrlFromConnectionString(connectionString: string, containerName: string, blobName: string): string {
  const settings = parseConnectionString(connectionString);
  return buildBlobUrl(settings.blobEndpoint, containerName, blobName, settings.sasToken);
}

/**
 * Blob URL and options from `AZURE_STORAGE_CONNECTION_STRING` and
 * `AZURE_STORAGE_LOG_LEVEL`. An explicit `logLevel` in `options` wins.
 */
export function settingsFromEnvironment(
  containerName: string,
  blobName: string,
  options: BlobClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): { url: string; options: BlobClientOptions } {
  const settings = readEnvironment(env);
  return {
    url: blobUrlFromConnectionString(settings.connectionString, containerName, blobName),
    options: { ...options, logLevel: options.logLevel ?? settings.logLevel },
  };
}
