/**
 * Shared state behind every blob client.
 *
 * A `ClientContext` can only be created here. Subtype clients built from an
 * existing client reuse its pipeline; the constructors reject look-alike
 * objects that did not come from this module.
 *
 * @module blobs/client-context
 */

import { ConfigurationError } from '../errors/index.js';
import { HttpPipeline } from '../http/pipeline.js';
import { loggingPolicy, redactUrl, requestIdPolicy, serviceVersionPolicy, telemetryPolicy } from '../http/policies.js';
import { UndiciTransport } from '../http/undici-transport.js';
import type { Logger } from '../observability/logger.js';
import { normalizeOptions, type BlobClientOptions, type NormalizedBlobClientOptions } from '../client/config.js';
import { parseAbsoluteUrl, parseBlobUrl, type BlobUrlParts } from './url.js';

export interface ClientContext {
  /** Full blob URL, including any SAS and snapshot */
  readonly url: string;
  readonly parts: BlobUrlParts;
  readonly pipeline: HttpPipeline;
  readonly options: NormalizedBlobClientOptions;
  readonly logger: Logger;
}

const minted = new WeakSet<object>();

function mint(
  url: string,
  pipeline: HttpPipeline,
  options: NormalizedBlobClientOptions,
  rootLogger: Logger
): ClientContext {
  const parts = parseBlobUrl(url);
  const context: ClientContext = Object.freeze({
    url,
    parts,
    pipeline,
    options,
    logger: rootLogger.child({ container: parts.containerName, blob: parts.blobName }),
  });
  minted.add(context);
  return context;
}

/**
 * Build the default pipeline: telemetry, service version and request id
 * first, then caller policies, with logging closest to the transport so it
 * sees the final headers.
 */
export function createPipeline(options: NormalizedBlobClientOptions): HttpPipeline {
  const transport = options.transport ?? new UndiciTransport({ timeout: options.timeout });
  return new HttpPipeline(transport, [
    telemetryPolicy(options.userAgentPrefix),
    serviceVersionPolicy(options.serviceVersion),
    requestIdPolicy(),
    ...options.policies,
    loggingPolicy(options.logger),
  ]);
}

/**
 * Create a context for a blob URL with a new pipeline.
 *
 * @throws {ConfigurationError} If the URL or options are invalid
 */
export function createClientContext(url: string, options?: BlobClientOptions): ClientContext {
  parseAbsoluteUrl(url);
  const normalized = normalizeOptions(options);
  const context = mint(url, createPipeline(normalized), normalized, normalized.logger);
  normalized.logger.debug('Blob client created', { url: redactUrl(url) });
  return context;
}

/**
 * Derive a context for another URL that shares the pipeline.
 */
export function deriveClientContext(context: ClientContext, url: string): ClientContext {
  return mint(url, context.pipeline, context.options, context.options.logger);
}

export function isClientContext(value: unknown): value is ClientContext {
  return typeof value === 'object' && value !== null && minted.has(value);
}

/**
 * Accept either a URL (building a new context) or a context minted here.
 *
 * @throws {ConfigurationError} For any other object
 */
export function resolveClientContext(urlOrContext: string | ClientContext, options?: BlobClientOptions): ClientContext {
  if (typeof urlOrContext === 'string') {
    return createClientContext(urlOrContext, options);
  }
  if (!isClientContext(urlOrContext)) {
    throw new ConfigurationError({ message: 'Blob clients must be created from a URL or an existing client' });
  }
  return urlOrContext;
}
