/**
 * Storage error taxonomy
 *
 * Every failure leaving the client is one of these classes; callers branch
 * on `kind` (or `instanceof`) to tell a local file problem from a backend
 * rejection or a broken connection.
 */

import { S3ServiceException } from '@aws-sdk/client-s3';

export type StorageErrorKind =
  | 'configuration'
  | 'not_found'
  | 'conflict'
  | 'rejected'
  | 'transport'
  | 'local_io';

export interface StorageErrorContext {
  operation?: string;
  bucket?: string;
  key?: string;
}

export interface StorageErrorOptions extends StorageErrorContext {
  statusCode?: number;
  code?: string;
  requestId?: string;
  path?: string;
  cause?: unknown;
}

export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  readonly operation?: string;
  readonly bucket?: string;
  readonly key?: string;
  readonly statusCode?: number;
  readonly code?: string;
  readonly requestId?: string;

  constructor(kind: StorageErrorKind, message: string, options: StorageErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.kind = kind;
    this.operation = options.operation;
    this.bucket = options.bucket;
    this.key = options.key;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.requestId = options.requestId;
  }
}

/** Bad endpoint URL or credential; raised before any request is sent. */
export class ConfigurationError extends StorageError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends StorageError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super('not_found', message, options);
    this.name = 'NotFoundError';
  }
}

/** Bucket already exists, bucket not empty */
export class ConflictError extends StorageError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super('conflict', message, options);
    this.name = 'ConflictError';
  }
}

/** Any other response the backend answered with an error status (403, 400, 5xx) */
export class RequestRejectedError extends StorageError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super('rejected', message, options);
    this.name = 'RequestRejectedError';
  }
}

/** Network failure, timeout, abort or unreadable response */
export class TransportError extends StorageError {
  readonly aborted: boolean;

  constructor(message: string, options: StorageErrorOptions & { aborted?: boolean } = {}) {
    super('transport', message, options);
    this.name = 'TransportError';
    this.aborted = options.aborted ?? false;
  }
}

/** Reading the local source or writing the local sink failed */
export class LocalIoError extends StorageError {
  readonly path?: string;

  constructor(message: string, options: StorageErrorOptions = {}) {
    super('local_io', message, options);
    this.name = 'LocalIoError';
    this.path = options.path;
  }
}

const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NoSuchBucket', 'NotFound', 'NoSuchUpload']);
const CONFLICT_CODES = new Set([
  'BucketAlreadyExists',
  'BucketAlreadyOwnedByYou',
  'BucketNotEmpty',
  'OperationAborted',
]);

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

function describe(context: StorageErrorContext): string {
  return context.operation ? `Failed to ${context.operation}` : 'Storage request failed';
}

/**
 * Map an SDK or network failure onto the taxonomy.
 * Errors that are already classified pass through unchanged.
 */
export function classifyError(error: unknown, context: StorageErrorContext = {}): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  if (error instanceof S3ServiceException) {
    const statusCode = error.$metadata.httpStatusCode;
    const options: StorageErrorOptions = {
      ...context,
      statusCode,
      code: error.name,
      requestId: error.$metadata.requestId,
      cause: error,
    };
    const detail = statusCode ? `${error.name} (${statusCode})` : error.name;
    const message = `${describe(context)}: ${detail}`;

    if (statusCode === 404 || NOT_FOUND_CODES.has(error.name)) {
      return new NotFoundError(message, options);
    }
    if (statusCode === 409 || CONFLICT_CODES.has(error.name)) {
      return new ConflictError(message, options);
    }
    return new RequestRejectedError(message, options);
  }

  if (isAbortError(error)) {
    return new TransportError(`${describe(context)}: request aborted`, { ...context, cause: error, aborted: true });
  }

  return new TransportError(`${describe(context)}: ${errorMessage(error)}`, { ...context, cause: error });
}

/**
 * Wrap a Node fs failure (ENOENT, EACCES, ENOSPC, EISDIR...) as LocalIoError
 */
export function toLocalIoError(error: unknown, path: string, context: StorageErrorContext = {}): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return new LocalIoError(`${describe(context)}: local file ${path}: ${errorMessage(error)}`, {
    ...context,
    path,
    code,
    cause: error,
  });
}
