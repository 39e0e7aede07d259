/**
 * Blob Models
 *
 * Option and result types for blob operations.
 */

import type { BodyStream } from '../http/body-stream.js';

/** Supported blob types */
export type BlobType = 'BlockBlob' | 'AppendBlob' | 'PageBlob';

/** Access tier for blob storage */
export type AccessTier =
  | 'Hot'
  | 'Cool'
  | 'Cold'
  | 'Archive'
  | 'P4'
  | 'P6'
  | 'P10'
  | 'P15'
  | 'P20'
  | 'P30'
  | 'P40'
  | 'P50'
  | 'P60'
  | 'P70'
  | 'P80';

/** Rehydrate priority for archived blobs */
export type RehydratePriority = 'High' | 'Standard';

/** Lease status of a blob */
export type LeaseStatus = 'locked' | 'unlocked';

/** Lease state of a blob */
export type LeaseState = 'available' | 'leased' | 'expired' | 'breaking' | 'broken';

/** Copy status for async copy operations */
export type CopyStatus = 'pending' | 'success' | 'aborted' | 'failed';

/** Delete snapshots option */
export type DeleteSnapshotsOption = 'include' | 'only';

/** Custom metadata, sent as `x-ms-meta-*` headers */
export type Metadata = Record<string, string>;

/** Conditional request headers */
export interface AccessConditions {
  ifMatch?: string;
  ifNoneMatch?: string;
  ifModifiedSince?: Date;
  ifUnmodifiedSince?: Date;
  leaseId?: string;
}

/** Base request options */
export interface RequestOptions {
  /** Abort signal for cancellation */
  signal?: AbortSignal;
  /** Conditions the blob must satisfy */
  conditions?: AccessConditions;
}

/** Standard HTTP properties stored with a blob */
export interface BlobHttpHeaders {
  contentType?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  /** Base64-encoded MD5 of the whole blob */
  contentMd5?: string;
  cacheControl?: string;
  contentDisposition?: string;
}

/** Fields present on every service response */
export interface ResponseInfo {
  requestId?: string;
  clientRequestId?: string;
  version?: string;
  date?: Date;
}

/** State of the last copy operation targeting the blob */
export interface CopyState {
  copyId: string;
  status: CopyStatus;
  source?: string;
  progress?: string;
  completedOn?: Date;
  statusDescription?: string;
}

/** Blob properties */
export interface BlobProperties extends ResponseInfo {
  etag: string;
  lastModified: Date;
  creationTime?: Date;
  contentLength: number;
  blobType: BlobType;
  httpHeaders: BlobHttpHeaders;
  metadata: Metadata;
  accessTier?: AccessTier;
  accessTierInferred?: boolean;
  leaseStatus?: LeaseStatus;
  leaseState?: LeaseState;
  serverEncrypted?: boolean;
  /** Page blobs only */
  sequenceNumber?: number;
  /** Append blobs only */
  committedBlockCount?: number;
  versionId?: string;
  copy?: CopyState;
}

/** Result of operations that change properties or metadata */
export interface BlobInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  /** Page blobs only */
  sequenceNumber?: number;
}

/** Result of operations that write content */
export interface BlobContentInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  versionId?: string;
  serverEncrypted?: boolean;
  contentMd5?: string;
  /** Page blobs only */
  sequenceNumber?: number;
}

/** Result of copy operations */
export interface BlobCopyInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  copyId: string;
  copyStatus: CopyStatus;
  versionId?: string;
}

/** Result of `createSnapshot` */
export interface BlobSnapshotInfo extends ResponseInfo {
  snapshot: string;
  etag: string;
  lastModified: Date;
  versionId?: string;
}

/** Byte range within a blob */
export interface ByteRange {
  offset: number;
  /** Omit to read to the end of the blob */
  length?: number;
}

/** Parsed `Content-Range` header */
export interface ContentRange {
  offset: number;
  length: number;
  /** Total blob size, when the service reports it */
  totalSize?: number;
}

export interface SetHttpHeadersOptions extends RequestOptions {}

export interface SetMetadataOptions extends RequestOptions {}

export interface SetAccessTierOptions extends Omit<RequestOptions, 'conditions'> {
  rehydratePriority?: RehydratePriority;
  leaseId?: string;
}

export interface StartCopyFromUriOptions extends RequestOptions {
  metadata?: Metadata;
  tier?: AccessTier;
  rehydratePriority?: RehydratePriority;
  /** Conditions on the copy source */
  sourceConditions?: Omit<AccessConditions, 'leaseId'>;
}

export interface AbortCopyFromUriOptions extends Omit<RequestOptions, 'conditions'> {
  leaseId?: string;
}

export interface DownloadOptions extends RequestOptions {
  range?: ByteRange;
  /** Ask for the MD5 of the range; the range must be at most 4 MB */
  rangeGetContentMd5?: boolean;
}

/**
 * Result of `download`.
 *
 * The caller owns `body` and must drain or release it.
 */
export interface BlobDownloadResponse extends BlobProperties {
  body: BodyStream;
  contentRange?: ContentRange;
  /** MD5 of the returned range, when requested */
  rangeContentMd5?: string;
}

export interface DownloadToBufferOptions extends RequestOptions {
  range?: ByteRange;
  /** Size of each ranged request (default: client `chunkSize`) */
  chunkSize?: number;
  /** Parallel ranged requests (default: client `maxConcurrency`) */
  concurrency?: number;
}

/** Result of `downloadToBuffer` and `downloadToFile` */
export interface BlobDownloadInfo {
  blobType: BlobType;
  /** Total size of the blob */
  blobSize: number;
  /** Range actually downloaded */
  contentRange: ContentRange;
  etag: string;
  lastModified: Date;
  httpHeaders: BlobHttpHeaders;
  metadata: Metadata;
}

export interface BlobDownloadToBufferResponse extends BlobDownloadInfo {
  content: Uint8Array;
}

export interface CreateSnapshotOptions extends RequestOptions {
  metadata?: Metadata;
}

export interface DeleteBlobOptions extends RequestOptions {
  deleteSnapshots?: DeleteSnapshotsOption;
}

export interface UndeleteBlobOptions {
  signal?: AbortSignal;
}

export interface GetPropertiesOptions extends RequestOptions {}

// Block blobs

export interface UploadBlockBlobOptions extends RequestOptions {
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  tier?: AccessTier;
  /** Required when `data` is a stream of unknown length */
  contentLength?: number;
}

export interface StageBlockOptions extends Omit<RequestOptions, 'conditions'> {
  leaseId?: string;
  /** Base64-encoded MD5 of the block, checked by the service */
  transactionalContentMd5?: string;
}

/** Result of `stageBlock` */
export interface BlockInfo extends ResponseInfo {
  contentMd5?: string;
  serverEncrypted?: boolean;
}

/** Which list a block id is looked up in when committing */
export type BlockListSource = 'committed' | 'uncommitted' | 'latest';

export interface BlockListEntry {
  /** Base64 block id */
  id: string;
  list: BlockListSource;
}

export interface CommitBlockListOptions extends RequestOptions {
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  tier?: AccessTier;
}

/** Which blocks `getBlockList` returns */
export type BlockListType = 'committed' | 'uncommitted' | 'all';

export interface GetBlockListOptions extends Omit<RequestOptions, 'conditions'> {
  leaseId?: string;
}

/** A committed or uncommitted block */
export interface BlockItem {
  /** Base64 block id */
  name: string;
  size: number;
}

export interface BlockListInfo extends ResponseInfo {
  etag?: string;
  lastModified?: Date;
  /** Size of the committed blob */
  contentLength?: number;
  committedBlocks: BlockItem[];
  uncommittedBlocks: BlockItem[];
}

// Append blobs

export interface CreateAppendBlobOptions extends RequestOptions {
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
}

export interface AppendBlockOptions extends RequestOptions {
  /** Fail unless the blob is at most this long before the append */
  maxSize?: number;
  /** Fail unless the append would start at this offset */
  appendPosition?: number;
  transactionalContentMd5?: string;
}

export interface BlobAppendInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  /** Offset at which the block was appended */
  appendOffset: number;
  committedBlockCount: number;
  serverEncrypted?: boolean;
}

// Page blobs

export interface CreatePageBlobOptions extends RequestOptions {
  httpHeaders?: BlobHttpHeaders;
  metadata?: Metadata;
  tier?: AccessTier;
  sequenceNumber?: number;
}

export interface UploadPagesOptions extends RequestOptions {
  transactionalContentMd5?: string;
}

export interface UploadPagesFromUriOptions extends RequestOptions {
  /** Base64-encoded MD5 of the source range */
  sourceContentMd5?: string;
}

export interface ClearPagesOptions extends RequestOptions {}

export interface ResizePageBlobOptions extends RequestOptions {}

export interface GetPageRangesOptions extends RequestOptions {
  range?: ByteRange;
  /** Return only the ranges changed since this snapshot */
  previousSnapshot?: string;
}

export interface IncrementalCopyOptions extends RequestOptions {}

/** Result of page writes */
export interface PageInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  sequenceNumber: number;
  contentMd5?: string;
  serverEncrypted?: boolean;
}

/** Result of `resize` */
export interface PageBlobInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  sequenceNumber: number;
}

/** A valid or cleared run of pages; `length` is in bytes */
export interface PageRange {
  offset: number;
  length: number;
}

export interface PageRangesInfo extends ResponseInfo {
  etag: string;
  lastModified: Date;
  /** Current size of the page blob */
  blobContentLength: number;
  pageRanges: PageRange[];
  clearRanges: PageRange[];
}
