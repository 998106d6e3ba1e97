/**
 * flatstore SDK
 *
 * A schemaless record store on plain files: one file per record, per-table
 * metadata with position-aligned indexes, and an on-disk result cache.
 */

// Re-export types
export type {
  Value,
  Fields,
  Entry,
  TableMeta,
  IndexStatus,
  OrderDirection,
  Order,
  Predicate,
  PredicateFn,
  WhereClause,
  QueryState,
  DatabaseOptions,
  ResolvedOptions,
} from "./types.js";

// Database handle and queries
export type { Database } from "./database.js";
export { openDatabase } from "./database.js";
export { Query } from "./builder.js";
export { resolveOptions, DEFAULT_DATABASE, DEFAULT_LOCK_TIMEOUT_MS } from "./config.js";

// Re-export cache types
export type { CacheStats, ResultCacheOptions } from "./cache.js";
export { queryFingerprint } from "./cache.js";

// Re-export utilities
export { stableStringify, valuesEqual, fingerprint } from "./format.js";
export { compareValues, orderIds, paginate, matchesPredicate, project } from "./query.js";
export { encodePayload, decodePayload, GUARD_HEADER, FORMAT_VERSION } from "./codec.js";
export { validateName } from "./validation.js";

// Observability
export { logger, Logger, levelFromEnv } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { TableMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  FlatStoreError,
  ValidationError,
  QueryStateError,
  NotFoundError,
  TableNotFoundError,
  EntryNotFoundError,
  MissingIndexFieldError,
  NotIndexedError,
  UnsupportedPredicateError,
  IOError,
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
  CorruptFileError,
  LockTimeoutError,
} from "./errors.js";
export type { ValidationIssue } from "./errors.js";
