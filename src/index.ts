/**
 * Blob storage client with a streaming HTTP core.
 *
 * @example
 * ```typescript
 * import { BlockBlobClient } from 'blobstream';
 *
 * const client = BlockBlobClient.fromEnv('reports', '2024/q1.csv');
 * await client.upload('id,total\n1,42\n', { httpHeaders: { contentType: 'text/csv' } });
 *
 * const download = await client.download();
 * for await (const chunk of download.body) {
 *   process.stdout.write(chunk);
 * }
 * ```
 */

export * from './errors/index.js';
export * from './http/index.js';
export * from './blobs/index.js';

export {
  normalizeOptions,
  parseLogLevel,
  readEnvironment,
  DEFAULT_CONFIG,
  DEFAULT_SERVICE_VERSION,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
} from './client/config.js';
export type { BlobClientOptions, NormalizedBlobClientOptions, EnvironmentSettings } from './client/config.js';

export { ConsoleLogger, NoopLogger, InMemoryLogger, sanitizeContext, LOG_LEVELS } from './observability/logger.js';
export type { Logger, LogLevel, LogRecord, LogSink } from './observability/logger.js';
