/**
 * Append blob operations.
 *
 * @module blobs/append-blob-client
 */

import type { BlobClientOptions } from '../client/config.js';
import { ValidationError } from '../errors/index.js';
import { BlobClientBase } from './blob-base.js';
import { deriveClientContext, type ClientContext } from './client-context.js';
import { blobUrlFromConnectionString, settingsFromEnvironment } from './connection-string.js';
import { parseAppendInfo, parseContentInfo } from './deserialize.js';
import type { AppendBlockOptions, BlobAppendInfo, BlobContentInfo, CreateAppendBlobOptions } from './models.js';
import { conditionHeaders, httpHeadersToRequest, metadataHeaders, toRequestBody } from './serialize.js';
import { setQueryParameter } from './url.js';

/** Largest block accepted by a single append (4 MB) */
export const MAX_APPEND_BLOCK_SIZE = 4 * 1024 * 1024;

export class AppendBlobClient extends BlobClientBase {
  constructor(urlOrContext: string | ClientContext, options?: BlobClientOptions) {
    super(urlOrContext, options);
  }

  static fromConnectionString(
    connectionString: string,
    containerName: string,
    blobName: string,
    options?: BlobClientOptions
  ): AppendBlobClient {
    return new AppendBlobClient(blobUrlFromConnectionString(connectionString, containerName, blobName), options);
  }

  static fromEnv(containerName: string, blobName: string, options?: BlobClientOptions): AppendBlobClient {
    const settings = settingsFromEnvironment(containerName, blobName, options);
    return new AppendBlobClient(settings.url, settings.options);
  }

  withSnapshot(snapshot: string): AppendBlobClient {
    return new AppendBlobClient(deriveClientContext(this.context, setQueryParameter(this.url, 'snapshot', snapshot)));
  }

  /**
   * Create an empty append blob, replacing any existing blob.
   */
  async create(options: CreateAppendBlobOptions = {}): Promise<BlobContentInfo> {
    const result = await this.execute('create', {
      method: 'PUT',
      headers: {
        'x-ms-blob-type': 'AppendBlob',
        'content-length': '0',
        ...httpHeadersToRequest(options.httpHeaders),
        ...metadataHeaders(options.metadata),
        ...conditionHeaders(options.conditions),
      },
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseContentInfo(result.headers);
  }

  /**
   * Append a block to the end of the blob.
   */
  async appendBlock(data: Uint8Array | string, options: AppendBlockOptions = {}): Promise<BlobAppendInfo> {
    const { body, length } = toRequestBody(data);
    if (length > MAX_APPEND_BLOCK_SIZE) {
      throw new ValidationError({
        message: `Append block of ${length} bytes exceeds ${MAX_APPEND_BLOCK_SIZE} bytes`,
        field: 'data',
      });
    }
    const headers: Record<string, string> = {
      'content-length': String(length),
      ...conditionHeaders(options.conditions),
    };
    if (options.maxSize !== undefined) headers['x-ms-blob-condition-maxsize'] = String(options.maxSize);
    if (options.appendPosition !== undefined) headers['x-ms-blob-condition-appendpos'] = String(options.appendPosition);
    if (options.transactionalContentMd5) headers['content-md5'] = options.transactionalContentMd5;

    const result = await this.execute('appendBlock', {
      method: 'PUT',
      query: { comp: 'appendblock' },
      headers,
      body,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseAppendInfo(result.headers);
  }
}
