/**
 * Core types for flatstore
 */

/**
 * A schemaless stored value: scalar, text, ordered sequence or nested mapping
 */
export type Value = null | boolean | number | string | Value[] | { [field: string]: Value };

/**
 * A record as supplied by the caller (no id required)
 */
export type Fields = { [field: string]: Value };

/**
 * A stored record; `id` is assigned on insert and never changes
 */
export interface Entry {
  id: number;
  [field: string]: Value;
}

/**
 * Per-table bookkeeping persisted in `<table>/meta`
 *
 * Every sequence in `indexes` (the mandatory `id` one included) has the same
 * length, and position i in each of them describes the same row.
 */
export type TableMeta = {
  /** Highest id ever assigned; never decreases */
  lastId: number;
  /** Number of live entries */
  count: number;
  /** Field name → values of that field, position-aligned with `indexes.id` */
  indexes: Record<string, Value[]>;
};

/**
 * Result of declaring indexes on a table
 */
export type IndexStatus = "created" | "unchanged" | "rebuilt";

export type OrderDirection = "asc" | "desc";

export interface Order {
  mode: OrderDirection;
  key: string;
}

/**
 * Equality/containment filter: field → expected value (or values, for array fields)
 */
export type Predicate = { [field: string]: Value };

/**
 * Function filters type-check but are rejected with UnsupportedPredicateError at execution
 */
export type PredicateFn = (entry: Entry) => boolean;

export type WhereClause = Predicate | PredicateFn;

/**
 * Snapshot of a pending query, handed to the executor by a terminal call
 */
export interface QueryState {
  table: string;
  select?: string[];
  where?: WhereClause;
  order: Order;
  /** 0 = unbounded */
  limit: number;
  offset: number;
}

/**
 * Options accepted by openDatabase()
 */
export interface DatabaseOptions {
  /** Root directory holding one directory per database */
  root: string;
  /** Logical database name (default: "default") */
  database?: string;
  /** Store and reuse query results on disk (default: true, or FLATSTORE_RESULT_CACHE) */
  resultCache?: boolean;
  /** Hold an advisory lock file around every mutation (default: false) */
  lockTables?: boolean;
  /** How long to wait for a held table lock (default: 30000) */
  lockTimeoutMs?: number;
}

export type ResolvedOptions = Required<DatabaseOptions>;
