/**
 * Tests for client configuration
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, normalizeOptions, parseLogLevel, readEnvironment } from '../config.js';
import { ConfigurationError } from '../../errors/index.js';
import { ConsoleLogger, InMemoryLogger, NoopLogger } from '../../observability/logger.js';

describe('normalizeOptions', () => {
  it('should apply defaults', () => {
    const options = normalizeOptions();

    expect(options.serviceVersion).toBe(DEFAULT_CONFIG.serviceVersion);
    expect(options.timeout).toBe(300000);
    expect(options.chunkSize).toBe(4 * 1024 * 1024);
    expect(options.maxConcurrency).toBe(8);
    expect(options.logger).toBeInstanceOf(NoopLogger);
    expect(options.policies).toEqual([]);
    expect(options.transport).toBeUndefined();
  });

  it('should build a console logger from a level', () => {
    expect(normalizeOptions({ logLevel: 'debug' }).logger).toBeInstanceOf(ConsoleLogger);
  });

  it('should prefer an explicit logger over a level', () => {
    const logger = new InMemoryLogger();
    expect(normalizeOptions({ logger, logLevel: 'debug' }).logger).toBe(logger);
  });

  it('should reject out-of-range values', () => {
    expect(() => normalizeOptions({ chunkSize: 1000 })).toThrow(ConfigurationError);
    expect(() => normalizeOptions({ chunkSize: 1000 })).toThrow(/chunkSize/);
    expect(() => normalizeOptions({ maxConcurrency: 0 })).toThrow(/maxConcurrency/);
    expect(() => normalizeOptions({ timeout: -1 })).toThrow(/timeout/);
    expect(() => normalizeOptions({ serviceVersion: 'latest' })).toThrow(/serviceVersion: expected YYYY-MM-DD/);
    expect(() => normalizeOptions({ userAgentPrefix: 'bad\nprefix' })).toThrow(/userAgentPrefix/);
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn');
  });

  it('should reject unknown levels', () => {
    expect(() => parseLogLevel('verbose')).toThrow(
      "Invalid log level 'verbose'; expected one of error, warn, info, debug, trace"
    );
  });
});

describe('readEnvironment', () => {
  it('should read the connection string and level', () => {
    expect(
      readEnvironment({
        AZURE_STORAGE_CONNECTION_STRING: 'BlobEndpoint=https://acct.blob.core.windows.net;SharedAccessSignature=sig=test-secret',
        AZURE_STORAGE_LOG_LEVEL: 'info',
      })
    ).toEqual({
      connectionString: 'BlobEndpoint=https://acct.blob.core.windows.net;SharedAccessSignature=sig=test-secret',
      logLevel: 'info',
    });
  });

  it('should leave the level unset when absent', () => {
    expect(readEnvironment({ AZURE_STORAGE_CONNECTION_STRING: 'x' }).logLevel).toBeUndefined();
  });

  it('should fail without a connection string', () => {
    expect(() => readEnvironment({})).toThrow('AZURE_STORAGE_CONNECTION_STRING is not set');
  });
});
