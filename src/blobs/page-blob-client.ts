/**
 * Page blob operations.
 *
 * @module blobs/page-blob-client
 */

import type { BlobClientOptions } from '../client/config.js';
import { ValidationError } from '../errors/index.js';
import { BlobClientBase } from './blob-base.js';
import { deriveClientContext, type ClientContext } from './client-context.js';
import { blobUrlFromConnectionString, settingsFromEnvironment } from './connection-string.js';
import { parseContentInfo, parseCopyInfo, parsePageInfo, parseResponseInfo } from './deserialize.js';
import type {
  BlobContentInfo,
  BlobCopyInfo,
  ClearPagesOptions,
  CreatePageBlobOptions,
  GetPageRangesOptions,
  IncrementalCopyOptions,
  PageBlobInfo,
  PageInfo,
  PageRangesInfo,
  ResizePageBlobOptions,
  UploadPagesFromUriOptions,
  UploadPagesOptions,
} from './models.js';
import {
  assertPageAligned,
  assertPageBlobSize,
  conditionHeaders,
  formatByteRange,
  formatRange,
  httpHeadersToRequest,
  metadataHeaders,
  toRequestBody,
} from './serialize.js';
import { parseBlobUrl, setQueryParameter } from './url.js';
import { parsePageList } from './xml.js';

/**
 * Client for page blobs: random-access blobs written in 512-byte pages.
 */
export class PageBlobClient extends BlobClientBase {
  constructor(urlOrContext: string | ClientContext, options?: BlobClientOptions) {
    super(urlOrContext, options);
  }

  static fromConnectionString(
    connectionString: string,
    containerName: string,
    blobName: string,
    options?: BlobClientOptions
  ): PageBlobClient {
    return new PageBlobClient(blobUrlFromConnectionString(connectionString, containerName, blobName), options);
  }

  static fromEnv(containerName: string, blobName: string, options?: BlobClientOptions): PageBlobClient {
    const settings = settingsFromEnvironment(containerName, blobName, options);
    return new PageBlobClient(settings.url, settings.options);
  }

  /** Same blob at `snapshot`; an empty string addresses the base blob. */
  withSnapshot(snapshot: string): PageBlobClient {
    return new PageBlobClient(deriveClientContext(this.context, setQueryParameter(this.url, 'snapshot', snapshot)));
  }

  /**
   * Create a zero-filled page blob of `size` bytes, replacing any existing blob.
   *
   * @throws {ValidationError} If `size` is not a multiple of 512
   */
  async create(size: number, options: CreatePageBlobOptions = {}): Promise<BlobContentInfo> {
    assertPageBlobSize(size);
    const headers: Record<string, string> = {
      'x-ms-blob-type': 'PageBlob',
      'x-ms-blob-content-length': String(size),
      'content-length': '0',
      ...httpHeadersToRequest(options.httpHeaders),
      ...metadataHeaders(options.metadata),
      ...conditionHeaders(options.conditions),
    };
    if (options.tier) headers['x-ms-access-tier'] = options.tier;
    if (options.sequenceNumber !== undefined) headers['x-ms-blob-sequence-number'] = String(options.sequenceNumber);

    const result = await this.execute('create', {
      method: 'PUT',
      headers,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseContentInfo(result.headers);
  }

  /**
   * Write `data` at `offset`. Both the offset and the data length must be
   * page aligned.
   */
  async uploadPages(data: Uint8Array, offset: number, options: UploadPagesOptions = {}): Promise<PageInfo> {
    const { body, length } = toRequestBody(data);
    assertPageAligned(offset, length);
    const headers: Record<string, string> = {
      'x-ms-page-write': 'update',
      'x-ms-range': formatByteRange(offset, length),
      'content-length': String(length),
      ...conditionHeaders(options.conditions),
    };
    if (options.transactionalContentMd5) headers['content-md5'] = options.transactionalContentMd5;

    const result = await this.execute('uploadPages', {
      method: 'PUT',
      query: { comp: 'page' },
      headers,
      body,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parsePageInfo(result.headers);
  }

  /**
   * Write pages read by the service from `sourceUri`.
   */
  async uploadPagesFromUri(
    sourceUri: string,
    sourceOffset: number,
    length: number,
    destinationOffset: number,
    options: UploadPagesFromUriOptions = {}
  ): Promise<PageInfo> {
    assertPageAligned(sourceOffset, length);
    assertPageAligned(destinationOffset, length);
    const headers: Record<string, string> = {
      'x-ms-page-write': 'update',
      'x-ms-copy-source': sourceUri,
      'x-ms-source-range': formatByteRange(sourceOffset, length),
      'x-ms-range': formatByteRange(destinationOffset, length),
      'content-length': '0',
      ...conditionHeaders(options.conditions),
    };
    if (options.sourceContentMd5) headers['x-ms-source-content-md5'] = options.sourceContentMd5;

    const result = await this.execute('uploadPagesFromUri', {
      method: 'PUT',
      query: { comp: 'page' },
      headers,
      signal: options.signal,
      expectedStatus: [201],
    });
    return parsePageInfo(result.headers);
  }

  /**
   * Release the pages in `[offset, offset + length)`; they read back as zeros.
   */
  async clearPages(offset: number, length: number, options: ClearPagesOptions = {}): Promise<PageInfo> {
    assertPageAligned(offset, length);
    const result = await this.execute('clearPages', {
      method: 'PUT',
      query: { comp: 'page' },
      headers: {
        'x-ms-page-write': 'clear',
        'x-ms-range': formatByteRange(offset, length),
        'content-length': '0',
        ...conditionHeaders(options.conditions),
      },
      signal: options.signal,
      expectedStatus: [201],
    });
    return parsePageInfo(result.headers);
  }

  /**
   * Grow or shrink the blob. Pages past a smaller size are discarded.
   */
  async resize(size: number, options: ResizePageBlobOptions = {}): Promise<PageBlobInfo> {
    assertPageBlobSize(size);
    const result = await this.execute('resize', {
      method: 'PUT',
      query: { comp: 'properties' },
      headers: { 'x-ms-blob-content-length': String(size), ...conditionHeaders(options.conditions) },
      signal: options.signal,
      expectedStatus: [200],
    });
    const info = parsePageInfo(result.headers);
    return { ...parseResponseInfo(result.headers), etag: info.etag, lastModified: info.lastModified, sequenceNumber: info.sequenceNumber };
  }

  /**
   * List valid page ranges, optionally within a range or as a diff against
   * an earlier snapshot.
   */
  async getPageRanges(options: GetPageRangesOptions = {}): Promise<PageRangesInfo> {
    const headers = conditionHeaders(options.conditions);
    const range = formatRange(options.range);
    if (range) headers['x-ms-range'] = range;

    const result = await this.execute('getPageRanges', {
      method: 'GET',
      query: { comp: 'pagelist', prevsnapshot: options.previousSnapshot },
      headers,
      signal: options.signal,
      expectedStatus: [200],
    });
    const info = parsePageInfo(result.headers);
    const size = result.headers.get('x-ms-blob-content-length');
    return {
      ...parseResponseInfo(result.headers),
      etag: info.etag,
      lastModified: info.lastModified,
      blobContentLength: size !== undefined ? Number.parseInt(size, 10) : 0,
      ...parsePageList(new TextDecoder().decode(result.body)),
    };
  }

  /**
   * Start an incremental copy from a snapshot of another page blob.
   * `sourceUri` must address a snapshot.
   */
  async startCopyIncremental(sourceUri: string, options: IncrementalCopyOptions = {}): Promise<BlobCopyInfo> {
    if (!parseBlobUrl(sourceUri).snapshot) {
      throw new ValidationError({ message: 'Incremental copy source must address a snapshot', field: 'sourceUri' });
    }
    const result = await this.execute('startCopyIncremental', {
      method: 'PUT',
      query: { comp: 'incrementalcopy' },
      headers: { 'x-ms-copy-source': sourceUri, ...conditionHeaders(options.conditions) },
      signal: options.signal,
      expectedStatus: [202],
    });
    return parseCopyInfo(result.headers);
  }
}
