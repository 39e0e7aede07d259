/**
 * Generic blob client.
 *
 * @module blobs/blob-client
 */

import type { BlobClientOptions } from '../client/config.js';
import { AppendBlobClient } from './append-blob-client.js';
import { BlobClientBase } from './blob-base.js';
import { BlockBlobClient } from './block-blob-client.js';
import { deriveClientContext, type ClientContext } from './client-context.js';
import { blobUrlFromConnectionString, settingsFromEnvironment } from './connection-string.js';
import { PageBlobClient } from './page-blob-client.js';
import { setQueryParameter } from './url.js';

/**
 * Client for operations common to every blob kind.
 *
 * @example
 * ```typescript
 * const client = new BlobClient('https://account.blob.core.windows.net/logs/app.log?sv=...');
 * const properties = await client.getProperties();
 * if (properties.blobType === 'AppendBlob') {
 *   await client.getAppendBlobClient().appendBlock('line\n');
 * }
 * ```
 */
export class BlobClient extends BlobClientBase {
  constructor(urlOrContext: string | ClientContext, options?: BlobClientOptions) {
    super(urlOrContext, options);
  }

  static fromConnectionString(
    connectionString: string,
    containerName: string,
    blobName: string,
    options?: BlobClientOptions
  ): BlobClient {
    return new BlobClient(blobUrlFromConnectionString(connectionString, containerName, blobName), options);
  }

  static fromEnv(containerName: string, blobName: string, options?: BlobClientOptions): BlobClient {
    const settings = settingsFromEnvironment(containerName, blobName, options);
    return new BlobClient(settings.url, settings.options);
  }

  /** Same blob at `snapshot`; an empty string addresses the base blob. */
  withSnapshot(snapshot: string): BlobClient {
    return new BlobClient(deriveClientContext(this.context, setQueryParameter(this.url, 'snapshot', snapshot)));
  }

  /** Block blob client for the same URL, sharing this client's pipeline */
  getBlockBlobClient(): BlockBlobClient {
    return new BlockBlobClient(deriveClientContext(this.context, this.url));
  }

  /** Append blob client for the same URL, sharing this client's pipeline */
  getAppendBlobClient(): AppendBlobClient {
    return new AppendBlobClient(deriveClientContext(this.context, this.url));
  }

  /** Page blob client for the same URL, sharing this client's pipeline */
  getPageBlobClient(): PageBlobClient {
    return new PageBlobClient(deriveClientContext(this.context, this.url));
  }
}
