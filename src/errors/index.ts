/**
 * Storage Errors
 *
 * Re-exports all error types.
 */

export {
  StorageError,
  BlobNotFoundError,
  ContainerNotFoundError,
  BlobAlreadyExistsError,
  AuthenticationError,
  AuthorizationError,
  ConditionNotMetError,
  ServerBusyError,
  ServiceUnavailableError,
  TimeoutError,
  NetworkError,
  ConfigurationError,
  ValidationError,
  OperationCancelledError,
  BodyStreamError,
  createErrorFromResponse,
  isRetryableStatus,
  throwIfCancelled,
} from './error.js';

export type {
  StorageErrorOptions,
  FixedCodeErrorOptions,
  BodyStreamErrorReason,
  ServiceErrorDetail,
} from './error.js';
