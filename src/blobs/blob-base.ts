/**
 * Operations shared by every blob kind.
 *
 * @module blobs/blob-base
 */

import { open, rm } from 'node:fs/promises';
import {
  StorageError,
  ValidationError,
  createErrorFromResponse,
  throwIfCancelled,
} from '../errors/index.js';
import { MemoryBodyStream, type BodyStream } from '../http/body-stream.js';
import type { ReadonlyHeaders } from '../http/headers.js';
import { redactUrl } from '../http/policies.js';
import type { HttpResponse } from '../http/response.js';
import type { HttpMethod } from '../http/types.js';
import type { Logger } from '../observability/logger.js';
import type { BlobClientOptions } from '../client/config.js';
import { runWithConcurrency, splitRange } from '../utils/concurrency.js';
import { resolveClientContext, type ClientContext } from './client-context.js';
import {
  parseBlobInfo,
  parseBlobProperties,
  parseContentRange,
  parseCopyInfo,
  parseResponseInfo,
  parseSnapshotInfo,
} from './deserialize.js';
import type {
  AbortCopyFromUriOptions,
  AccessTier,
  BlobCopyInfo,
  BlobDownloadInfo,
  BlobDownloadResponse,
  BlobDownloadToBufferResponse,
  BlobHttpHeaders,
  BlobInfo,
  BlobProperties,
  BlobSnapshotInfo,
  CreateSnapshotOptions,
  DeleteBlobOptions,
  DownloadOptions,
  DownloadToBufferOptions,
  GetPropertiesOptions,
  Metadata,
  ResponseInfo,
  SetAccessTierOptions,
  SetHttpHeadersOptions,
  SetMetadataOptions,
  StartCopyFromUriOptions,
  UndeleteBlobOptions,
} from './models.js';
import { conditionHeaders, formatRange, httpHeadersToRequest, metadataHeaders } from './serialize.js';
import { appendQuery } from './url.js';
import { parseErrorBody } from './xml.js';

/** A single service call */
export interface OperationRequest {
  method: HttpMethod;
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
  body?: Uint8Array | BodyStream;
  signal?: AbortSignal;
  /** Status codes that mean success */
  expectedStatus: readonly number[];
}

/** Drained response of a service call */
export interface OperationResult {
  statusCode: number;
  headers: ReadonlyHeaders;
  body: Uint8Array;
}

/** Receives downloaded ranges, positioned relative to the start of the requested range */
interface RangeSink {
  begin(totalLength: number): Promise<void>;
  write(data: Uint8Array, position: number): Promise<void>;
}

/**
 * Base class for `BlobClient` and the three blob kind clients.
 */
export abstract class BlobClientBase {
  protected readonly context: ClientContext;

  protected constructor(urlOrContext: string | ClientContext, options?: BlobClientOptions) {
    this.context = resolveClientContext(urlOrContext, options);
  }

  /** Full blob URL, including any SAS and snapshot */
  get url(): string {
    return this.context.url;
  }

  get accountName(): string | undefined {
    return this.context.parts.accountName;
  }

  get containerName(): string {
    return this.context.parts.containerName;
  }

  get blobName(): string {
    return this.context.parts.blobName;
  }

  /** Snapshot this client addresses, if any */
  get snapshot(): string | undefined {
    return this.context.parts.snapshot;
  }

  protected get logger(): Logger {
    return this.context.logger;
  }

  /**
   * Close the transport. Clients derived from this one share it.
   */
  close(): Promise<void> {
    return this.context.pipeline.close();
  }

  /**
   * Send a request and return the response with its body still streaming.
   *
   * @throws {StorageError} Mapped from the service error when the status is unexpected
   */
  protected async send(operation: string, request: OperationRequest): Promise<HttpResponse> {
    throwIfCancelled(request.signal, operation);
    const url = appendQuery(this.context.url, request.query ?? {});
    const response = await this.context.pipeline.send({
      method: request.method,
      url,
      headers: { ...request.headers },
      body: request.body,
      signal: request.signal,
    });

    if (request.expectedStatus.includes(response.statusCode)) {
      return response;
    }

    const text = await response.readBodyAsText(request.signal);
    const error = createErrorFromResponse(
      response.statusCode,
      parseErrorBody(text),
      response.headers.toRecord(),
      redactUrl(url)
    );
    this.logger.warn('Blob operation failed', {
      operation,
      status: response.statusCode,
      code: error.code,
      requestId: error.requestId,
    });
    throw error;
  }

  /**
   * Send a request and drain the response body.
   */
  protected async execute(operation: string, request: OperationRequest): Promise<OperationResult> {
    const response = await this.send(operation, request);
    const body = await response.readBody(request.signal);
    return { statusCode: response.statusCode, headers: response.headers, body };
  }

  /**
   * Get blob properties and metadata.
   */
  async getProperties(options: GetPropertiesOptions = {}): Promise<BlobProperties> {
    const result = await this.execute('getProperties', {
      method: 'HEAD',
      headers: conditionHeaders(options.conditions),
      signal: options.signal,
      expectedStatus: [200],
    });
    return parseBlobProperties(result.headers);
  }

  /**
   * Replace the stored HTTP properties. Properties left out are cleared.
   */
  async setHttpHeaders(httpHeaders: BlobHttpHeaders, options: SetHttpHeadersOptions = {}): Promise<BlobInfo> {
    const result = await this.execute('setHttpHeaders', {
      method: 'PUT',
      query: { comp: 'properties' },
      headers: { ...httpHeadersToRequest(httpHeaders), ...conditionHeaders(options.conditions) },
      signal: options.signal,
      expectedStatus: [200],
    });
    return parseBlobInfo(result.headers);
  }

  /**
   * Replace all metadata.
   *
   * @throws {ValidationError} If a name or value is invalid; nothing is sent
   */
  async setMetadata(metadata: Metadata, options: SetMetadataOptions = {}): Promise<BlobInfo> {
    const headers = { ...metadataHeaders(metadata), ...conditionHeaders(options.conditions) };
    const result = await this.execute('setMetadata', {
      method: 'PUT',
      query: { comp: 'metadata' },
      headers,
      signal: options.signal,
      expectedStatus: [200],
    });
    return parseBlobInfo(result.headers);
  }

  /**
   * Change the access tier. Moving out of Archive starts a rehydration and
   * answers 202.
   */
  async setAccessTier(tier: AccessTier, options: SetAccessTierOptions = {}): Promise<ResponseInfo> {
    const headers: Record<string, string> = { 'x-ms-access-tier': tier };
    if (options.rehydratePriority) headers['x-ms-rehydrate-priority'] = options.rehydratePriority;
    if (options.leaseId) headers['x-ms-lease-id'] = options.leaseId;

    const result = await this.execute('setAccessTier', {
      method: 'PUT',
      query: { comp: 'tier' },
      headers,
      signal: options.signal,
      expectedStatus: [200, 202],
    });
    return parseResponseInfo(result.headers);
  }

  /**
   * Start an asynchronous copy from `sourceUri` onto this blob.
   *
   * Poll `getProperties().copy` for progress.
   */
  async startCopyFromUri(sourceUri: string, options: StartCopyFromUriOptions = {}): Promise<BlobCopyInfo> {
    const headers: Record<string, string> = {
      'x-ms-copy-source': sourceUri,
      ...metadataHeaders(options.metadata),
      ...conditionHeaders(options.conditions),
      ...conditionHeaders(options.sourceConditions, 'x-ms-source-'),
    };
    if (options.tier) headers['x-ms-access-tier'] = options.tier;
    if (options.rehydratePriority) headers['x-ms-rehydrate-priority'] = options.rehydratePriority;

    const result = await this.execute('startCopyFromUri', {
      method: 'PUT',
      headers,
      signal: options.signal,
      expectedStatus: [202],
    });
    this.logger.info('Copy started', { copyId: result.headers.get('x-ms-copy-id'), source: redactUrl(sourceUri) });
    return parseCopyInfo(result.headers);
  }

  /**
   * Abort a pending copy, leaving a zero-length destination blob.
   */
  async abortCopyFromUri(copyId: string, options: AbortCopyFromUriOptions = {}): Promise<ResponseInfo> {
    if (!copyId) {
      throw new ValidationError({ message: 'Copy id is required', field: 'copyId' });
    }
    const headers: Record<string, string> = { 'x-ms-copy-action': 'abort' };
    if (options.leaseId) headers['x-ms-lease-id'] = options.leaseId;

    const result = await this.execute('abortCopyFromUri', {
      method: 'PUT',
      query: { comp: 'copy', copyid: copyId },
      headers,
      signal: options.signal,
      expectedStatus: [204],
    });
    return parseResponseInfo(result.headers);
  }

  /**
   * Download the blob, or a range of it.
   *
   * The returned body is owned by the caller, who must drain or release it.
   */
  async download(options: DownloadOptions = {}): Promise<BlobDownloadResponse> {
    const headers = conditionHeaders(options.conditions);
    const range = formatRange(options.range);
    if (range) {
      headers['x-ms-range'] = range;
      if (options.rangeGetContentMd5) headers['x-ms-range-get-content-md5'] = 'true';
    }

    const response = await this.send('download', {
      method: 'GET',
      headers,
      signal: options.signal,
      expectedStatus: [200, 206],
    });

    const body = response.takeBodyStream() ?? new MemoryBodyStream(new Uint8Array(0));
    try {
      const properties = parseBlobProperties(response.headers);
      return {
        ...properties,
        body,
        contentRange: parseContentRange(response.headers.get('content-range')),
        rangeContentMd5: range && options.rangeGetContentMd5 ? response.headers.get('content-md5') : undefined,
      };
    } catch (error) {
      body.release();
      throw error;
    }
  }

  /**
   * Download into memory with parallel ranged requests.
   *
   * The first range tells the blob size; the rest are fetched with at most
   * `concurrency` requests in flight, each pinned to the first response's ETag.
   */
  async downloadToBuffer(options: DownloadToBufferOptions = {}): Promise<BlobDownloadToBufferResponse> {
    let content = new Uint8Array(0);
    const info = await this.transfer(options, {
      begin: async (totalLength) => {
        content = new Uint8Array(totalLength);
      },
      write: async (data, position) => {
        content.set(data, position);
      },
    });
    return { ...info, content };
  }

  /**
   * Download into a file, created or truncated. A partial file is removed
   * when the download fails.
   */
  async downloadToFile(filePath: string, options: DownloadToBufferOptions = {}): Promise<BlobDownloadInfo> {
    const handle = await open(filePath, 'w');
    try {
      const info = await this.transfer(options, {
        begin: (totalLength) => handle.truncate(totalLength),
        write: async (data, position) => {
          let written = 0;
          while (written < data.length) {
            const { bytesWritten } = await handle.write(data, written, data.length - written, position + written);
            written += bytesWritten;
          }
        },
      });
      await handle.close();
      return info;
    } catch (error) {
      await handle.close();
      await rm(filePath, { force: true });
      throw error;
    }
  }

  /**
   * Create a read-only snapshot of the blob.
   */
  async createSnapshot(options: CreateSnapshotOptions = {}): Promise<BlobSnapshotInfo> {
    const result = await this.execute('createSnapshot', {
      method: 'PUT',
      query: { comp: 'snapshot' },
      headers: { ...metadataHeaders(options.metadata), ...conditionHeaders(options.conditions) },
      signal: options.signal,
      expectedStatus: [201],
    });
    return parseSnapshotInfo(result.headers);
  }

  /**
   * Delete the blob. A blob with snapshots needs `deleteSnapshots`.
   */
  async delete(options: DeleteBlobOptions = {}): Promise<ResponseInfo> {
    const headers = conditionHeaders(options.conditions);
    if (options.deleteSnapshots) headers['x-ms-delete-snapshots'] = options.deleteSnapshots;

    const result = await this.execute('delete', {
      method: 'DELETE',
      headers,
      signal: options.signal,
      expectedStatus: [202],
    });
    this.logger.info('Blob deleted');
    return parseResponseInfo(result.headers);
  }

  /**
   * Restore a soft-deleted blob and its snapshots.
   */
  async undelete(options: UndeleteBlobOptions = {}): Promise<ResponseInfo> {
    const result = await this.execute('undelete', {
      method: 'PUT',
      query: { comp: 'undelete' },
      signal: options.signal,
      expectedStatus: [200],
    });
    return parseResponseInfo(result.headers);
  }

  private async transfer(options: DownloadToBufferOptions, sink: RangeSink): Promise<BlobDownloadInfo> {
    const chunkSize = options.chunkSize ?? this.context.options.chunkSize;
    const concurrency = options.concurrency ?? this.context.options.maxConcurrency;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError({ message: `Invalid chunk size ${chunkSize}`, field: 'chunkSize' });
    }
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new ValidationError({ message: `Invalid concurrency ${concurrency}`, field: 'concurrency' });
    }

    const offset = options.range?.offset ?? 0;
    const requested = options.range?.length;
    const firstLength = requested === undefined ? chunkSize : Math.min(requested, chunkSize);

    const first = await this.downloadFirstRange(offset, firstLength, options);
    let firstData: Uint8Array;
    try {
      firstData = await first.body.readToEnd(options.signal);
    } finally {
      first.body.release();
    }

    const blobSize = first.contentRange?.totalSize ?? (first.contentRange ? undefined : firstData.length);
    if (blobSize === undefined) {
      throw new StorageError({ message: 'Service did not report the blob size', code: 'InvalidResponse' });
    }

    const end = requested === undefined ? blobSize : Math.min(offset + requested, blobSize);
    const totalLength = Math.max(0, end - offset);
    await sink.begin(totalLength);
    await sink.write(firstData.subarray(0, totalLength), 0);

    const remainingStart = offset + Math.min(firstData.length, totalLength);
    const ranges = splitRange(remainingStart, end - remainingStart, chunkSize);
    if (ranges.length > 0) {
      this.logger.debug('Downloading remaining ranges', { ranges: ranges.length, concurrency, blobSize });
    }

    await runWithConcurrency(
      ranges.length,
      concurrency,
      async (index, signal) => {
        const range = ranges[index];
        const part = await this.download({
          range,
          signal,
          conditions: { ...options.conditions, ifMatch: first.etag },
        });
        let data: Uint8Array;
        try {
          data = await part.body.readToEnd(signal);
        } finally {
          part.body.release();
        }
        if (data.length !== range.length) {
          throw new StorageError({
            message: `Expected ${range.length} bytes at offset ${range.offset}, received ${data.length}`,
            code: 'InvalidResponse',
          });
        }
        await sink.write(data, range.offset - offset);
      },
      options.signal
    );

    return {
      blobType: first.blobType,
      blobSize,
      contentRange: { offset, length: totalLength, totalSize: blobSize },
      etag: first.etag,
      lastModified: first.lastModified,
      httpHeaders: first.httpHeaders,
      metadata: first.metadata,
    };
  }

  /**
   * Ranged GET for the first chunk. An empty blob rejects any range with 416,
   * so that case falls back to a plain GET.
   */
  private async downloadFirstRange(
    offset: number,
    length: number,
    options: DownloadToBufferOptions
  ): Promise<BlobDownloadResponse> {
    try {
      return await this.download({ range: { offset, length }, conditions: options.conditions, signal: options.signal });
    } catch (error) {
      if (error instanceof StorageError && error.statusCode === 416 && offset === 0) {
        return this.download({ conditions: options.conditions, signal: options.signal });
      }
      throw error;
    }
  }
}
