/**
 * Error types for the MongoDB JSON store.
 *
 * Facade errors (`MalformedPayloadError`, `StoreOperationFailedError`,
 * `CursorIterationError`, `NotFoundError`, `ConnectionFailedError`) are what
 * callers branch on. The remaining classes describe the underlying driver
 * failure and are carried as the `cause` of a facade error.
 */

/**
 * Error codes for store errors.
 */
export enum MongoDBErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  InvalidConnectionString = 'INVALID_CONNECTION_STRING',

  // Facade errors
  ConnectionFailed = 'CONNECTION_FAILED',
  MalformedPayload = 'MALFORMED_PAYLOAD',
  StoreOperationFailed = 'STORE_OPERATION_FAILED',
  CursorIteration = 'CURSOR_ITERATION',
  NotFound = 'NOT_FOUND',

  // Driver causes
  AuthenticationError = 'AUTHENTICATION_ERROR',
  ConnectionTimeout = 'CONNECTION_TIMEOUT',
  NetworkError = 'NETWORK_ERROR',
  TimeoutError = 'TIMEOUT_ERROR',
  OperationAborted = 'OPERATION_ABORTED',
  ServerSelectionFailed = 'SERVER_SELECTION_FAILED',
  WriteError = 'WRITE_ERROR',
  DuplicateKeyError = 'DUPLICATE_KEY_ERROR',
  CursorNotFound = 'CURSOR_NOT_FOUND',
  NotPrimary = 'NOT_PRIMARY',
  ServerError = 'SERVER_ERROR',
}

/**
 * Base error class for the store.
 */
export class MongoDBError extends Error {
  /** Error code */
  readonly code: MongoDBErrorCode;
  /** Whether a caller may reasonably retry the operation */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: MongoDBErrorCode;
    message: string;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MongoDBError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
      cause: this.cause instanceof MongoDBError ? this.cause.toJSON() : undefined,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends MongoDBError {
  constructor(message: string) {
    super({
      code: MongoDBErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Connection string rejected by the driver.
 */
export class InvalidConnectionStringError extends MongoDBError {
  constructor(message: string, cause?: Error) {
    super({
      code: MongoDBErrorCode.InvalidConnectionString,
      message: `Invalid connection string: ${message}`,
      cause,
    });
    this.name = 'InvalidConnectionStringError';
  }
}

// ============================================================================
// Facade Errors
// ============================================================================

/**
 * Dialing or pinging the server failed, or the store is not connected.
 */
export class ConnectionFailedError extends MongoDBError {
  constructor(message: string, cause?: unknown) {
    super({
      code: MongoDBErrorCode.ConnectionFailed,
      message: `Connection failed: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'ConnectionFailedError';
  }
}

/**
 * A caller-supplied payload was not a JSON object.
 * Raised before any driver call is made.
 */
export class MalformedPayloadError extends MongoDBError {
  constructor(message: string, cause?: unknown) {
    super({
      code: MongoDBErrorCode.MalformedPayload,
      message: `Malformed payload: ${message}`,
      cause,
    });
    this.name = 'MalformedPayloadError';
  }
}

/**
 * The driver call behind an operation failed.
 * The classified driver error is available as `cause`.
 */
export class StoreOperationFailedError extends MongoDBError {
  readonly operation: string;
  declare readonly cause: MongoDBError;

  constructor(operation: string, cause: MongoDBError) {
    super({
      code: MongoDBErrorCode.StoreOperationFailed,
      message: `${operation} failed: ${cause.message}`,
      retryable: cause.retryable,
      details: { operation, causeCode: cause.code },
      cause,
    });
    this.name = 'StoreOperationFailedError';
    this.operation = operation;
  }
}

/**
 * A multi-document read failed after the first batch.
 * Documents read before the failure are discarded.
 */
export class CursorIterationError extends MongoDBError {
  constructor(position: number, message: string, cause?: MongoDBError) {
    super({
      code: MongoDBErrorCode.CursorIteration,
      message: `Cursor iteration failed at document ${position}: ${message}`,
      retryable: cause?.retryable ?? false,
      details: { position },
      cause,
    });
    this.name = 'CursorIterationError';
  }
}

/**
 * A single-document lookup matched nothing.
 */
export class NotFoundError extends MongoDBError {
  constructor(operation: string, details?: Record<string, unknown>) {
    super({
      code: MongoDBErrorCode.NotFound,
      message: `${operation}: no document matched`,
      details: { operation, ...details },
    });
    this.name = 'NotFoundError';
  }
}

// ============================================================================
// Driver Causes
// ============================================================================

/**
 * Authentication failed.
 */
export class AuthenticationError extends MongoDBError {
  constructor(message: string = 'Authentication failed', cause?: Error) {
    super({
      code: MongoDBErrorCode.AuthenticationError,
      message,
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Dial and ping did not finish in time.
 */
export class ConnectionTimeoutError extends MongoDBError {
  constructor(timeoutMs: number) {
    super({
      code: MongoDBErrorCode.ConnectionTimeout,
      message: `Connection timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
    this.name = 'ConnectionTimeoutError';
  }
}

/**
 * Network error.
 */
export class NetworkError extends MongoDBError {
  constructor(message: string, cause?: Error) {
    super({
      code: MongoDBErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * The operation deadline passed.
 */
export class TimeoutError extends MongoDBError {
  constructor(timeoutMs: number) {
    super({
      code: MongoDBErrorCode.TimeoutError,
      message: `Operation timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * The caller aborted the operation through its signal.
 */
export class OperationAbortedError extends MongoDBError {
  constructor(reason?: unknown) {
    super({
      code: MongoDBErrorCode.OperationAborted,
      message: reason instanceof Error
        ? `Operation aborted: ${reason.message}`
        : 'Operation aborted',
      cause: reason,
    });
    this.name = 'OperationAbortedError';
  }
}

/**
 * Server selection failed.
 */
export class ServerSelectionFailedError extends MongoDBError {
  constructor(message: string, cause?: Error) {
    super({
      code: MongoDBErrorCode.ServerSelectionFailed,
      message: `Server selection failed: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'ServerSelectionFailedError';
  }
}

/**
 * Write rejected by the server.
 */
export class WriteError extends MongoDBError {
  constructor(message: string, errorCode?: number, cause?: Error) {
    super({
      code: MongoDBErrorCode.WriteError,
      message: `Write error: ${message}`,
      details: { errorCode },
      cause,
    });
    this.name = 'WriteError';
  }
}

/**
 * Duplicate key error.
 */
export class DuplicateKeyError extends MongoDBError {
  constructor(key: string, value: unknown, cause?: Error) {
    super({
      code: MongoDBErrorCode.DuplicateKeyError,
      message: `Duplicate key error: ${key}`,
      details: { key, value },
      cause,
    });
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Server-side cursor expired or was killed.
 */
export class CursorNotFoundError extends MongoDBError {
  constructor(cursorId: string) {
    super({
      code: MongoDBErrorCode.CursorNotFound,
      message: `Cursor not found: ${cursorId}`,
      details: { cursorId },
    });
    this.name = 'CursorNotFoundError';
  }
}

/**
 * Not primary (replica set).
 */
export class NotPrimaryError extends MongoDBError {
  constructor(message: string = 'Not connected to primary node') {
    super({
      code: MongoDBErrorCode.NotPrimary,
      message,
      retryable: true,
    });
    this.name = 'NotPrimaryError';
  }
}

/**
 * Any other server or driver failure.
 */
export class ServerError extends MongoDBError {
  constructor(message: string = 'MongoDB server error', errorCode?: number, cause?: Error) {
    super({
      code: MongoDBErrorCode.ServerError,
      message,
      retryable: errorCode !== undefined && errorCode >= 10000,
      details: { errorCode },
      cause,
    });
    this.name = 'ServerError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Server error codes the classifier recognises.
 * See: https://github.com/mongodb/mongo/blob/master/src/mongo/base/error_codes.yml
 */
const MONGODB_ERROR_CODES = {
  HOST_UNREACHABLE: 6,
  HOST_NOT_FOUND: 7,
  AUTHENTICATION_FAILED: 18,
  CURSOR_NOT_FOUND: 43,
  NETWORK_TIMEOUT: 89,
  SOCKET_EXCEPTION: 9001,
  NOT_PRIMARY: 10107,
  DUPLICATE_KEY: 11000,
  NOT_PRIMARY_NO_SECONDARY_OK: 13435,
  NOT_PRIMARY_OR_SECONDARY: 13436,
} as const;

function readProperty(error: Error, key: string): unknown {
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * Maps a driver error (or anything thrown) onto the store's error types.
 */
export function parseMongoDBError(error: unknown): MongoDBError {
  if (error instanceof MongoDBError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new ServerError(String(error));
  }

  const message = error.message;
  const code = readProperty(error, 'code');

  if (typeof code === 'number') {
    switch (code) {
      case MONGODB_ERROR_CODES.AUTHENTICATION_FAILED:
        return new AuthenticationError(message, error);

      case MONGODB_ERROR_CODES.DUPLICATE_KEY: {
        const keyMatch = message.match(/dup key: { ([^:]+):/);
        return new DuplicateKeyError(keyMatch?.[1] ?? 'unknown', readProperty(error, 'keyValue'), error);
      }

      case MONGODB_ERROR_CODES.NOT_PRIMARY:
      case MONGODB_ERROR_CODES.NOT_PRIMARY_NO_SECONDARY_OK:
      case MONGODB_ERROR_CODES.NOT_PRIMARY_OR_SECONDARY:
        return new NotPrimaryError(message);

      case MONGODB_ERROR_CODES.CURSOR_NOT_FOUND:
        return new CursorNotFoundError(String(readProperty(error, 'cursorId') ?? 'unknown'));

      case MONGODB_ERROR_CODES.NETWORK_TIMEOUT:
        return new NetworkError(message, error);

      case MONGODB_ERROR_CODES.HOST_UNREACHABLE:
      case MONGODB_ERROR_CODES.HOST_NOT_FOUND:
      case MONGODB_ERROR_CODES.SOCKET_EXCEPTION:
        return new NetworkError(message, error);

      default:
        break;
    }
  }

  const errorName = error.name;
  const numericCode = typeof code === 'number' ? code : undefined;

  if (errorName.includes('MongoServerSelectionError')) {
    return new ServerSelectionFailedError(message, error);
  }

  if (errorName.includes('MongoNetworkTimeoutError') || errorName.includes('MongoNetworkError')) {
    return new NetworkError(message, error);
  }

  if (errorName.includes('MongoWriteConcernError') || errorName.includes('MongoBulkWriteError')) {
    return new WriteError(message, numericCode, error);
  }

  if (errorName.includes('MongoParseError')) {
    return new InvalidConnectionStringError(message, error);
  }

  if (errorName.includes('MongoAuthenticationError') || errorName.includes('MongoCredentialsError')) {
    return new AuthenticationError(message, error);
  }

  const lowered = message.toLowerCase();
  if (
    lowered.includes('econnrefused') ||
    lowered.includes('etimedout') ||
    lowered.includes('enotfound') ||
    lowered.includes('network')
  ) {
    return new NetworkError(message, error);
  }

  return new ServerError(message, numericCode, error);
}

/**
 * Checks if an error is a store error.
 */
export function isMongoDBError(error: unknown): error is MongoDBError {
  return error instanceof MongoDBError;
}

/**
 * Checks if an error is worth retrying by the caller.
 * The store itself never retries.
 */
export function isRetryableError(error: unknown): boolean {
  return isMongoDBError(error) && error.retryable;
}
