/**
 * Database handle: owns the per-handle caches and hands out queries
 */

import { Query } from "./builder.js";
import type { CacheStats } from "./cache.js";
import { ResultCache } from "./cache.js";
import { resolveOptions } from "./config.js";
import { EntryStore } from "./entries.js";
import { QueryStateError } from "./errors.js";
import { QueryExecutor } from "./executor.js";
import { IndexManager } from "./indexes.js";
import { Journal } from "./journal.js";
import { StorageLayout } from "./layout.js";
import { MetadataStore } from "./meta.js";
import type { DatabaseOptions, ResolvedOptions } from "./types.js";

export interface Database {
  /** Logical database name */
  readonly name: string;
  /** Directory holding the database's tables */
  readonly directory: string;
  readonly options: Readonly<ResolvedOptions>;

  /**
   * Start a new query against a table
   * @throws ValidationError (on execution) if the table name is invalid
   */
  table(name: string): Query;

  /**
   * Hit/miss counters of the result cache for this handle
   */
  cacheStats(): CacheStats;

  /**
   * Drop cached metadata, index declarations and journal state.
   * Any later table() call throws QueryStateError.
   */
  close(): Promise<void>;
}

class FlatDatabase implements Database {
  #options: ResolvedOptions;
  #layout: StorageLayout;
  #meta: MetadataStore;
  #cache: ResultCache;
  #journal: Journal;
  #indexes: IndexManager;
  #executor: QueryExecutor;
  #closed = false;

  constructor(options: DatabaseOptions) {
    this.#options = resolveOptions(options);
    const { root, database, resultCache } = this.#options;

    this.#layout = new StorageLayout(root, database);
    const entries = new EntryStore(this.#layout);
    this.#meta = new MetadataStore(this.#layout);
    this.#cache = new ResultCache(this.#layout, { enabled: resultCache, database });
    this.#journal = new Journal(this.#layout, entries, this.#meta, this.#cache);
    this.#indexes = new IndexManager(entries, this.#meta, this.#journal, database);
    this.#executor = new QueryExecutor({
      options: this.#options,
      layout: this.#layout,
      entries,
      meta: this.#meta,
      indexes: this.#indexes,
      cache: this.#cache,
      journal: this.#journal,
    });
  }

  get name(): string {
    return this.#options.database;
  }

  get directory(): string {
    return this.#layout.databaseDir;
  }

  get options(): Readonly<ResolvedOptions> {
    return { ...this.#options };
  }

  table(name: string): Query {
    if (this.#closed) {
      throw new QueryStateError(name, "database handle is closed");
    }
    return new Query(name, this.#executor, this);
  }

  cacheStats(): CacheStats {
    return this.#cache.stats();
  }

  async close(): Promise<void> {
    this.#closed = true;
    this.#meta.forget();
    this.#indexes.clear();
    this.#journal.reset();
    this.#executor.reset();
  }
}

/**
 * Open a database handle
 *
 * Nothing is created on disk until the first insert into a table.
 *
 * @example
 * ```typescript
 * const db = openDatabase({ root: "./data", database: "shop" });
 * const hoodie = await db.table("products").insert({ name: "Hoodie", price: 48 });
 * ```
 * @throws ValidationError if the options or the database name are invalid
 */
export function openDatabase(options: DatabaseOptions): Database {
  return new FlatDatabase(options);
}
