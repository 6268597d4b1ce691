/**
 * Adapter Errors
 * Thrown by the storage and database adapters; services catch them and
 * translate to Result failures.
 */

export type StorageErrorCode =
  | 'NOT_FOUND'
  | 'QUOTA_EXCEEDED'
  | 'CONFLICT'
  | 'INVALID_KEY';

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string) {
    super(message);
    this.name = 'StorageError';
    this.code = code;
  }
}

/**
 * Token uniqueness violation on insert
 */
export class ShareConflictError extends Error {
  constructor(message = 'Share token already exists') {
    super(message);
    this.name = 'ShareConflictError';
  }
}

export function isStorageError(
  error: unknown,
  code?: StorageErrorCode
): error is StorageError {
  return (
    error instanceof StorageError && (code === undefined || error.code === code)
  );
}
