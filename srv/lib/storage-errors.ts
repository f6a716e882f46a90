export type StorageErrorCode =
  | "INVALID_PATH"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "STORE_FAILURE"
  | "CONFIG";

/**
 * Base class for every failure raised by the storage layer.
 * Callers branch on `code` (or `instanceof`) rather than on message text.
 */
export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An absolute or scheme-qualified path was given where a relative one is required. */
export class InvalidPathError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_PATH", message, options);
  }
}

export class NotFoundError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, options);
  }
}

export class AlreadyExistsError extends StorageError {
  constructor(message: string) {
    super("ALREADY_EXISTS", message);
  }
}

/**
 * Transient store or network failure. Not retried here;
 * the original error is kept as `cause`.
 */
export class StoreFailureError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_FAILURE", message, options);
  }
}

export class StorageConfigError extends StorageError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
