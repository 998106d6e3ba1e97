/**
 * Error types for flatstore operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - I/O errors include the absolute target path in the message
 */

/**
 * Base class for all flatstore errors
 */
export abstract class FlatStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A single argument-shape problem reported by a ValidationError
 */
export interface ValidationIssue {
  /** Dotted path to the offending value ("" for the argument itself) */
  path: string;
  message: string;
}

/**
 * Thrown when an argument has the wrong shape (non-mapping record, bad id, bad option)
 */
export class ValidationError extends FlatStoreError {
  readonly code = "E_VALIDATION";

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a terminal operation is invoked on a query that already ran
 */
export class QueryStateError extends FlatStoreError {
  readonly code = "E_STATE";

  constructor(table: string, reason = "query already ran; select the table again") {
    super(`Invalid query state for table "${table}": ${reason}`);
  }
}

/**
 * Base class for missing tables and entries
 */
export abstract class NotFoundError extends FlatStoreError {
  readonly code = "E_NOT_FOUND";
}

/**
 * Thrown when a table has no metadata (nothing was ever inserted)
 */
export class TableNotFoundError extends NotFoundError {
  constructor(public readonly table: string, options?: ErrorOptions) {
    super(`Metadata for table "${table}" not found`, options);
  }
}

/**
 * Thrown when one or more entry ids do not exist in a table
 */
export class EntryNotFoundError extends NotFoundError {
  readonly ids: number[];

  constructor(public readonly table: string, ids: number | number[], options?: ErrorOptions) {
    const list = Array.isArray(ids) ? ids : [ids];
    super(
      list.length === 1
        ? `Could not find entry with id ${list[0]} in table "${table}"`
        : `Could not find entries with ids ${list.join(", ")} in table "${table}"`,
      options
    );
    this.ids = list;
  }
}

/**
 * Thrown when a record lacks a value for one of the table's index fields
 */
export class MissingIndexFieldError extends FlatStoreError {
  readonly code = "E_MISSING_INDEX_FIELD";

  constructor(
    public readonly table: string,
    public readonly field: string,
    public readonly entryId?: number
  ) {
    super(
      entryId === undefined
        ? `Table "${table}" has an index on "${field}", but the record has no such field`
        : `Table "${table}" has an index on "${field}", but entry ${entryId} has no such field`
    );
  }
}

/**
 * Thrown when find() or order() references a field that is not indexed
 */
export class NotIndexedError extends FlatStoreError {
  readonly code = "E_NOT_INDEXED";

  constructor(
    public readonly table: string,
    public readonly field: string
  ) {
    super(`The field "${field}" is not an index of table "${table}"`);
  }
}

/**
 * Thrown when where() was given a function instead of a value mapping
 */
export class UnsupportedPredicateError extends FlatStoreError {
  readonly code = "E_UNSUPPORTED_PREDICATE";

  constructor(public readonly table: string) {
    super(`Function predicates are not allowed in where() (table "${table}")`);
  }
}

/**
 * Base class for file system failures
 */
export abstract class IOError extends FlatStoreError {}

/**
 * Thrown when a file does not exist
 */
export class FileNotFoundError extends IOError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends IOError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends IOError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file removal operation fails
 */
export class FileRemoveError extends IOError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends IOError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends IOError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a stored file has a bad guard header or an undecodable payload
 */
export class CorruptFileError extends IOError {
  readonly code = "E_CORRUPT";

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt file ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when a table lock cannot be acquired in time
 */
export class LockTimeoutError extends IOError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(lockPath: string, timeoutMs: number) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `A crashed process may have left it behind; delete it manually if safe.`
    );
  }
}

/**
 * Read the errno-style code from an unknown thrown value
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
