/**
 * Blob Client Configuration
 *
 * Options accepted by every blob client, normalized against defaults and
 * validated before a client is built.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { HttpTransport } from '../http/types.js';
import type { PipelinePolicy } from '../http/pipeline.js';
import { ConsoleLogger, LOG_LEVELS, NoopLogger, type Logger, type LogLevel } from '../observability/logger.js';

/** Storage REST API version sent in `x-ms-version` */
export const DEFAULT_SERVICE_VERSION = '2021-12-02';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  serviceVersion: DEFAULT_SERVICE_VERSION,
  timeout: 300000, // 5 minutes
  chunkSize: 4 * 1024 * 1024, // 4 MB
  maxConcurrency: 8,
} as const;

/** Minimum download range size (64 KB) */
export const MIN_CHUNK_SIZE = 64 * 1024;

/** Maximum download range size (4000 MB) */
export const MAX_CHUNK_SIZE = 4000 * 1024 * 1024;

/** Blob client options */
export interface BlobClientOptions {
  /** REST API version (default: 2021-12-02) */
  serviceVersion?: string;
  /** Prepended to the User-Agent header */
  userAgentPrefix?: string;
  /** Request timeout in milliseconds (default: 300000 = 5 min) */
  timeout?: number;
  /** Range size for parallel downloads in bytes (default: 4MB) */
  chunkSize?: number;
  /** Maximum concurrent range requests (default: 8) */
  maxConcurrency?: number;
  /** Level for the built-in console logger; ignored when `logger` is set */
  logLevel?: LogLevel;
  /** Custom logger (default: no logging unless `logLevel` is set) */
  logger?: Logger;
  /** Custom transport (default: undici) */
  transport?: HttpTransport;
  /** Extra policies, run after the built-in ones */
  policies?: PipelinePolicy[];
}

/** Normalized options with all defaults applied */
export interface NormalizedBlobClientOptions {
  serviceVersion: string;
  userAgentPrefix?: string;
  timeout: number;
  chunkSize: number;
  maxConcurrency: number;
  logger: Logger;
  transport?: HttpTransport;
  policies: PipelinePolicy[];
}

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

/**
 * Zod schema for the scalar options.
 */
const optionsSchema = z.object({
  serviceVersion: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  userAgentPrefix: z
    .string()
    .min(1)
    .regex(/^[\x21-\x7e][\x20-\x7e]*$/, 'expected printable ASCII')
    .optional(),
  timeout: z.number().int().positive(),
  chunkSize: z.number().int().min(MIN_CHUNK_SIZE).max(MAX_CHUNK_SIZE),
  maxConcurrency: z.number().int().min(1).max(64),
  logLevel: logLevelSchema.optional(),
});

/**
 * Normalize options with defaults
 *
 * @throws {ConfigurationError} If any option is out of range
 */
export function normalizeOptions(options: BlobClientOptions = {}): NormalizedBlobClientOptions {
  const scalars = {
    serviceVersion: options.serviceVersion ?? DEFAULT_CONFIG.serviceVersion,
    userAgentPrefix: options.userAgentPrefix,
    timeout: options.timeout ?? DEFAULT_CONFIG.timeout,
    chunkSize: options.chunkSize ?? DEFAULT_CONFIG.chunkSize,
    maxConcurrency: options.maxConcurrency ?? DEFAULT_CONFIG.maxConcurrency,
    logLevel: options.logLevel,
  };

  const result = optionsSchema.safeParse(scalars);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError({ message: `Invalid configuration: ${issues.join(', ')}` });
  }

  const logger = options.logger ?? (scalars.logLevel ? new ConsoleLogger(scalars.logLevel) : new NoopLogger());

  return {
    serviceVersion: result.data.serviceVersion,
    userAgentPrefix: result.data.userAgentPrefix,
    timeout: result.data.timeout,
    chunkSize: result.data.chunkSize,
    maxConcurrency: result.data.maxConcurrency,
    logger,
    transport: options.transport,
    policies: [...(options.policies ?? [])],
  };
}

/**
 * Parse a log level name
 *
 * @throws {ConfigurationError} If the name is not a known level
 */
export function parseLogLevel(value: string): LogLevel {
  const result = logLevelSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new ConfigurationError({
      message: `Invalid log level '${value}'; expected one of ${LOG_LEVELS.join(', ')}`,
    });
  }
  return result.data;
}

/** Settings read from the environment */
export interface EnvironmentSettings {
  connectionString: string;
  logLevel?: LogLevel;
}

/**
 * Read `AZURE_STORAGE_CONNECTION_STRING` and `AZURE_STORAGE_LOG_LEVEL`.
 *
 * @throws {ConfigurationError} If the connection string is missing
 */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  const connectionString = env['AZURE_STORAGE_CONNECTION_STRING'];
  if (!connectionString) {
    throw new ConfigurationError({ message: 'AZURE_STORAGE_CONNECTION_STRING is not set' });
  }

  const level = env['AZURE_STORAGE_LOG_LEVEL'];
  return {
    connectionString,
    logLevel: level ? parseLogLevel(level) : undefined,
  };
}
