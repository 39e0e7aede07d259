/**
 * Blob client exports
 */

export { BlobClient } from './blob-client.js';
export { BlobClientBase } from './blob-base.js';
export type { OperationRequest, OperationResult } from './blob-base.js';
export { BlockBlobClient } from './block-blob-client.js';
export { AppendBlobClient, MAX_APPEND_BLOCK_SIZE } from './append-blob-client.js';
export { PageBlobClient } from './page-blob-client.js';
export { isClientContext } from './client-context.js';
export type { ClientContext } from './client-context.js';
export { parseConnectionString, blobUrlFromConnectionString } from './connection-string.js';
export type { ConnectionStringSettings } from './connection-string.js';
export { buildBlobUrl, parseBlobUrl, encodeBlobName } from './url.js';
export type { BlobUrlParts } from './url.js';
export { validateMetadata, PAGE_SIZE } from './serialize.js';
export * from './models.js';
