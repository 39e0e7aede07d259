/**
 * Block blob operations.
 *
 * @module blobs/block-blob-client
 */

import type { BlobClientOptions } from '../client/config.js';
import type { BodyStream } from '../http/body-stream.js';
import { BlobClientBase } from './blob-base.js';
import { deriveClientContext, type ClientContext } from './client-context.js';
import { blobUrlFromConnectionString, settingsFromEnvironment } from './connection-string.js';
import { parseBlockInfo, parseContentInfo, parseHttpDate, parseResponseInfo } from './deserialize.js';
import type {
  BlobContentInfo,
  BlockInfo,
  BlockListEntry,
  BlockListInfo,
  BlockListType,
  CommitBlockListOptions,
  GetBlockListOptions,
  StageBlockOptions,
  UploadBlockBlobOptions,
} from './models.js';
import {
  assertBlockId,
  conditionHeaders,
  httpHeadersToRequest,
  metadataHeaders,
  toRequestBody,
} from './serialize.js';
import { setQueryParameter } from './url.js';
import { buildBlockList, parseBlockList } from './xml.js';

/**
 * Client for block blobs: single-shot uploads and staged block uploads.
 *
 * @example
 * ```typescript
 * const client = BlockBlobClient.fromConnectionString(connectionString, 'photos', 'cat.jpg');
 * await client.stageBlock('YmxvY2stMQ==', part1);
 * await client.stageBlock('YmxvY2stMg==', part2);
 * await client.commitBlockList(['YmxvY2stMQ==', 'YmxvY2stMg==']);
 * ```
 */
export class BlockBlobClient extends BlobClientBase {
  constructor(urlOrContext: string | ClientContext, options?: BlobClientOptions) {
    super(urlOrContext, options);
  }

  static fromConnectionString(
    connectionString: string,
    containerName: string,
    blobName: string,
    options?: BlobClientOptions
  ): BlockBlobClient {
    return new BlockBlobClient(blobUrlFromConnectionString(connectionString, containerName, blobName), options);
  }

  static fromEnv(containerName: string, blobName: string, options?: BlobClientOptions): BlockBlobClient {
    const settings = settingsFromEnvironment(containerName, blobName, options);
    return new BlockBlobClient(settings.url, settings.options);
  }

  /** Same blob at `snapshot`; an empty string addresses the base blob. */
  withSnapshot(snapshot: string): BlockBlobClient {
    return new BlockBlobClient(deriveClientContext(this.context, setQueryParameter(this.url, 'snapshot', snapshot)));
  }

  /**
   * Create or overwrite the blob with `data` in one request.
   */
  async upload(data: Uint8Array | string | BodyStream, options: UploadBlockBlobOptions = {}): Promise<BlobContentInfo> {
    const { body, length } = toRequestBody(data, options.contentLength);
    const headers: Record<string, string> = {
      'x-ms-blob-type': 'BlockBlob',
      'content-length': String(length),
      ...httpHeadersToRequest(options.httpHeaders),
      ...metadataHeaders(options.metadata),
      ...conditionHeaders(options.conditions),
    };
    if (options.tier) headers['x-ms-access-tier'] = options.tier;

    const result = await this.execute('upload', {
      method: 'PUT',
      headers,
      body,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseContentInfo(result.headers);
  }

  /**
   * Upload a block to be committed later with `commitBlockList`.
   */
  async stageBlock(blockId: string, data: Uint8Array | string | BodyStream, options: StageBlockOptions = {}): Promise<BlockInfo> {
    assertBlockId(blockId);
    const { body, length } = toRequestBody(data);
    const headers: Record<string, string> = { 'content-length': String(length) };
    if (options.leaseId) headers['x-ms-lease-id'] = options.leaseId;
    if (options.transactionalContentMd5) headers['content-md5'] = options.transactionalContentMd5;

    const result = await this.execute('stageBlock', {
      method: 'PUT',
      query: { comp: 'block', blockid: blockId },
      headers,
      body,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseBlockInfo(result.headers);
  }

  /**
   * Write the blob from a list of blocks. Plain ids are looked up in the
   * latest list (uncommitted first).
   */
  async commitBlockList(
    blocks: readonly (string | BlockListEntry)[],
    options: CommitBlockListOptions = {}
  ): Promise<BlobContentInfo> {
    const entries = blocks.map((block): BlockListEntry => (typeof block === 'string' ? { id: block, list: 'latest' } : block));
    for (const entry of entries) {
      assertBlockId(entry.id);
    }
    const body = new TextEncoder().encode(buildBlockList(entries));
    const headers: Record<string, string> = {
      'content-type': 'application/xml; charset=utf-8',
      'content-length': String(body.length),
      ...httpHeadersToRequest(options.httpHeaders),
      ...metadataHeaders(options.metadata),
      ...conditionHeaders(options.conditions),
    };
    if (options.tier) headers['x-ms-access-tier'] = options.tier;

    const result = await this.execute('commitBlockList', {
      method: 'PUT',
      query: { comp: 'blocklist' },
      headers,
      body,
      signal: options.signal,
      expectedStatus: [201],
    });
    this.logger.debug('Block list committed', { blocks: entries.length });
    return parseContentInfo(result.headers);
  }

  /**
   * List committed and/or uncommitted blocks.
   */
  async getBlockList(listType: BlockListType = 'all', options: GetBlockListOptions = {}): Promise<BlockListInfo> {
    const headers: Record<string, string> = {};
    if (options.leaseId) headers['x-ms-lease-id'] = options.leaseId;

    const result = await this.execute('getBlockList', {
      method: 'GET',
      query: { comp: 'blocklist', blocklisttype: listType },
      headers,
      signal: options.signal,
      expectedStatus: [200],
    });
    const lists = parseBlockList(new TextDecoder().decode(result.body));
    const contentLength = result.headers.get('x-ms-blob-content-length');
    return {
      ...parseResponseInfo(result.headers),
      etag: result.headers.get('etag'),
      lastModified: parseHttpDate(result.headers.get('last-modified')),
      contentLength: contentLength !== undefined ? Number.parseInt(contentLength, 10) : undefined,
      ...lists,
    };
  }
}
