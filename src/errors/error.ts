/**
 * Blob Storage Error Types
 *
 * Typed errors raised by the HTTP core and the blob clients.
 */

/** Base error options */
export interface StorageErrorOptions {
  message: string;
  statusCode?: number;
  code?: string;
  requestId?: string;
  url?: string;
  retryable?: boolean;
  retryAfterMs?: number;
  cause?: Error;
}

/** Options accepted by the fixed-code subclasses */
export type FixedCodeErrorOptions = Omit<StorageErrorOptions, 'retryable' | 'code'>;

/**
 * Base class for all storage errors
 */
export class StorageError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly requestId?: string;
  public readonly url?: string;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public override readonly cause?: Error;

  constructor(options: StorageErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.requestId = options.requestId;
    this.url = options.url;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Check if error is retryable */
  isRetryable(): boolean {
    return this.retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      requestId: this.requestId,
      url: this.url,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * Blob not found error (404)
 */
export class BlobNotFoundError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'BlobNotFound' });
  }
}

/**
 * Container not found error (404)
 */
export class ContainerNotFoundError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'ContainerNotFound' });
  }
}

/**
 * Blob already exists error (409)
 */
export class BlobAlreadyExistsError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'BlobAlreadyExists' });
  }
}

/**
 * Authentication error (401)
 */
export class AuthenticationError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'AuthenticationFailed' });
  }
}

/**
 * Authorization error (403)
 */
export class AuthorizationError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'AuthorizationFailure' });
  }
}

/**
 * Precondition failed (412)
 */
export class ConditionNotMetError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'ConditionNotMet' });
  }
}

/**
 * Server busy error (503) - retryable
 */
export class ServerBusyError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: true, code: 'ServerBusy' });
  }
}

/**
 * Service unavailable error (503) - retryable
 */
export class ServiceUnavailableError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: true, code: 'ServiceUnavailable' });
  }
}

/**
 * Timeout error - retryable
 */
export class TimeoutError extends StorageError {
  public readonly operation: string;

  constructor(options: FixedCodeErrorOptions & { operation: string }) {
    super({ ...options, retryable: true, code: 'Timeout' });
    this.operation = options.operation;
  }
}

/**
 * Network error - retryable
 */
export class NetworkError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: true, code: 'NetworkError' });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends StorageError {
  constructor(options: FixedCodeErrorOptions) {
    super({ ...options, retryable: false, code: 'ConfigurationError' });
  }
}

/**
 * Validation error for invalid requests
 */
export class ValidationError extends StorageError {
  public readonly field?: string;

  constructor(options: FixedCodeErrorOptions & { field?: string }) {
    super({ ...options, retryable: false, code: 'ValidationError' });
    this.field = options.field;
  }
}

/**
 * Raised when an abort signal fires before an operation completes.
 * Never merged with I/O failures.
 */
export class OperationCancelledError extends StorageError {
  public readonly operation: string;

  constructor(options: Omit<FixedCodeErrorOptions, 'message'> & { operation: string; message?: string }) {
    super({
      ...options,
      message: options.message ?? `Operation '${options.operation}' was cancelled`,
      retryable: false,
      code: 'OperationCancelled',
    });
    this.operation = options.operation;
  }
}

/** Misuse of a body stream's single-owner contract */
export type BodyStreamErrorReason = 'TAKEN' | 'RELEASED' | 'CONCURRENT_READ';

/**
 * Body stream misuse error
 */
export class BodyStreamError extends StorageError {
  public readonly reason: BodyStreamErrorReason;

  constructor(options: FixedCodeErrorOptions & { reason: BodyStreamErrorReason }) {
    super({ ...options, retryable: false, code: 'BodyStreamError' });
    this.reason = options.reason;
  }
}

/** Error detail extracted from a service response */
export interface ServiceErrorDetail {
  code?: string;
  message?: string;
}

/**
 * Create error from HTTP response
 *
 * `headers` must already be keyed by lower-case names.
 */
export function createErrorFromResponse(
  statusCode: number,
  detail: ServiceErrorDetail,
  headers: Record<string, string> = {},
  url?: string
): StorageError {
  const requestId = headers['x-ms-request-id'];
  const retryAfter = headers['retry-after'];
  const retryAfterSeconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
  const retryAfterMs = Number.isNaN(retryAfterSeconds) ? undefined : retryAfterSeconds * 1000;

  const code = headers['x-ms-error-code'] ?? detail.code;
  const message = detail.message ?? `Request failed with status ${statusCode}${code ? ` (${code})` : ''}`;

  const baseOptions = { message, statusCode, requestId, url, retryAfterMs };

  switch (statusCode) {
    case 401:
      return new AuthenticationError(baseOptions);
    case 403:
      return new AuthorizationError(baseOptions);
    case 404:
      if (code === 'ContainerNotFound') {
        return new ContainerNotFoundError(baseOptions);
      }
      if (code === undefined || code === 'BlobNotFound') {
        return new BlobNotFoundError(baseOptions);
      }
      break;
    case 409:
      if (code === undefined || code === 'BlobAlreadyExists') {
        return new BlobAlreadyExistsError(baseOptions);
      }
      break;
    case 412:
      return new ConditionNotMetError(baseOptions);
    case 503:
      if (code === 'ServerBusy') {
        return new ServerBusyError(baseOptions);
      }
      return new ServiceUnavailableError(baseOptions);
  }

  return new StorageError({
    ...baseOptions,
    code,
    retryable: isRetryableStatus(statusCode),
  });
}

/**
 * Check if status code is retryable
 */
export function isRetryableStatus(statusCode: number): boolean {
  return (
    statusCode === 408 || // Request Timeout
    statusCode === 429 || // Too Many Requests
    statusCode === 500 || // Internal Server Error
    statusCode === 502 || // Bad Gateway
    statusCode === 503 || // Service Unavailable
    statusCode === 504    // Gateway Timeout
  );
}

/**
 * Throw an OperationCancelledError if the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError({ operation });
  }
}
