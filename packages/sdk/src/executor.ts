/**
 * Query executor: runs terminal operations against metadata, entry files
 * and the result cache
 *
 * Every operation on a table runs under that table's mutex, after any
 * leftover commit journal has been replayed. Mutations additionally hold the
 * advisory lock file when `lockTables` is enabled.
 */

import type { ResultCache } from "./cache.js";
import { queryFingerprint } from "./cache.js";
import type { EntryStore } from "./entries.js";
import { EntryNotFoundError, NotIndexedError, UnsupportedPredicateError } from "./errors.js";
import type { IndexManager } from "./indexes.js";
import { indexValues } from "./indexes.js";
import type { Journal } from "./journal.js";
import type { StorageLayout } from "./layout.js";
import { FileLock, Mutex } from "./lock.js";
import type { MetadataStore } from "./meta.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { matchesPredicate, orderIds, paginate, project } from "./query.js";
import { FieldNameSchema, ValueSchema } from "./schemas.js";
import type { Entry, Fields, IndexStatus, Order, Predicate, QueryState, ResolvedOptions, TableMeta } from "./types.js";
import {
  parseWith,
  validateEntryId,
  validateName,
  validateOrder,
  validatePagination,
  validatePredicate,
  validateRecord,
  validateSelect,
} from "./validation.js";

export interface ExecutorContext {
  options: ResolvedOptions;
  layout: StorageLayout;
  entries: EntryStore;
  meta: MetadataStore;
  indexes: IndexManager;
  cache: ResultCache;
  journal: Journal;
}

/**
 * A query state whose read parameters passed validation
 */
interface CheckedQuery {
  table: string;
  select?: string[];
  where?: Predicate;
  order: Order;
  limit: number;
  offset: number;
}

export class QueryExecutor {
  #ctx: ExecutorContext;
  #mutexes = new Map<string, Mutex>();

  constructor(ctx: ExecutorContext) {
    this.#ctx = ctx;
  }

  /**
   * Add a record; its id is assigned from the table's counter
   */
  async insert(state: QueryState, record: unknown): Promise<Entry> {
    const fields = validateRecord(record);
    const { table } = state;

    return this.#run(table, true, async () => {
      const startTime = performance.now();
      const { meta, layout, indexes, journal } = this.#ctx;

      const current = await meta.tryLoad(table);
      const base = current ?? indexes.initialMeta(table);

      const entry: Entry = { ...fields, id: base.lastId + 1 };
      // Throws MissingIndexFieldError before any file is touched
      const next = indexes.applyInsert(table, base, entry);
      if (!current) {
        await layout.ensureTableDir(table);
      }
      await journal.commit(table, { op: "insert", entry, meta: next });

      this.#recordWrite(table, "table.insert", entry.id, startTime);
      return entry;
    });
  }

  /**
   * Replace a record (all fields); the id is kept
   */
  async update(state: QueryState, id: unknown, values: unknown): Promise<Entry> {
    const entryId = validateEntryId(id);
    const fields = validateRecord(values);
    const { table } = state;

    return this.#run(table, true, async () => {
      const startTime = performance.now();
      const { entries, meta, indexes, journal } = this.#ctx;

      const before = await entries.tryRead(table, entryId);
      if (!before) {
        throw new EntryNotFoundError(table, entryId);
      }

      const after: Entry = { ...fields, id: before.id };
      const next = indexes.applyUpdate(table, await meta.load(table), before, after);
      await journal.commit(table, { op: "update", entry: after, meta: next });

      this.#recordWrite(table, "table.update", entryId, startTime);
      return after;
    });
  }

  /**
   * Remove one id, or each id of a list as its own step
   *
   * For a list, missing ids do not stop the loop; they are reported together
   * once every other id has been removed.
   */
  async remove(state: QueryState, target: unknown): Promise<void> {
    const ids = Array.isArray(target) ? target.map((id) => validateEntryId(id)) : [validateEntryId(target)];
    const { table } = state;

    await this.#run(table, true, async () => {
      const missing: number[] = [];
      for (const id of ids) {
        try {
          await this.#removeOne(table, id);
        } catch (err) {
          if (!(err instanceof EntryNotFoundError)) {
            throw err;
          }
          missing.push(id);
        }
      }

      if (missing.length > 0) {
        throw new EntryNotFoundError(table, missing);
      }
    });
  }

  /**
   * Look an entry up by id, or by the first match in an indexed field
   * @returns The (projected) record, or null when nothing matches
   */
  async find(state: QueryState, value: unknown, field: unknown): Promise<Fields | null> {
    const key = parseWith(FieldNameSchema, field, "find() field");
    const select = state.select === undefined ? undefined : validateSelect(state.select);
    const { table } = state;

    return this.#run(table, false, async () => {
      const { entries, meta, indexes } = this.#ctx;

      let id: number | null;
      if (key === "id") {
        id = validateEntryId(value);
      } else {
        const expected = parseWith(ValueSchema, value, "find() value");
        id = indexes.findIdBy(table, await meta.load(table), key, expected);
      }

      if (id === null) {
        return null;
      }
      const entry = await entries.tryRead(table, id);
      return entry ? project(entry, select) : null;
    });
  }

  /**
   * Run the full query: cache → order → paginate → filter → project → cache
   */
  async all(state: QueryState): Promise<Fields[]> {
    const query = this.#check(state);
    return this.#run(query.table, false, () => this.#execute(query));
  }

  /**
   * Live row count, or the size of the full result when the query is narrowed
   */
  async count(state: QueryState): Promise<number> {
    if (state.limit !== 0 || state.offset !== 0 || state.where !== undefined) {
      return (await this.all(state)).length;
    }

    return this.#run(state.table, false, async () => (await this.#ctx.meta.load(state.table)).count);
  }

  /**
   * Snapshot of the table metadata
   */
  async meta(state: QueryState): Promise<TableMeta> {
    return this.#run(state.table, false, async () => structuredClone(await this.#ctx.meta.load(state.table)));
  }

  async indexes(state: QueryState, fields: unknown): Promise<IndexStatus> {
    return this.#run(state.table, true, () => this.#ctx.indexes.declare(state.table, fields));
  }

  /**
   * Drop the per-table mutexes (handle teardown)
   */
  reset(): void {
    this.#mutexes.clear();
  }

  async #removeOne(table: string, id: number): Promise<void> {
    const startTime = performance.now();
    const { entries, meta, indexes, journal } = this.#ctx;

    if (!(await entries.exists(table, id))) {
      throw new EntryNotFoundError(table, id);
    }

    const next = indexes.applyRemove(table, await meta.load(table), id);
    await journal.commit(table, { op: "remove", id, meta: next });

    this.#recordWrite(table, "table.remove", id, startTime);
  }

  async #execute(query: CheckedQuery): Promise<Fields[]> {
    const startTime = performance.now();
    const { table, order, limit, offset, where, select } = query;
    const { cache, meta, entries } = this.#ctx;

    const cacheKey = queryFingerprint(query);
    const cached = await cache.get(table, cacheKey);
    if (cached) {
      return cached;
    }

    const tableMeta = await meta.load(table);
    const ids = tableMeta.indexes.id ?? [];
    if (ids.length === 0) {
      return [];
    }

    const keys = indexValues(tableMeta, order.key);
    if (!keys) {
      throw new NotIndexedError(table, order.key);
    }

    const output: Fields[] = [];
    for (const id of paginate(orderIds(ids, keys, order.mode), limit, offset)) {
      const entry = await entries.read(table, id);
      if (where && !matchesPredicate(entry, where)) {
        continue;
      }
      output.push(project(entry, select));
    }

    await cache.set(table, cacheKey, output);

    const duration = performance.now() - startTime;
    metrics.recordQueryTime(this.#scope(table), duration);
    logger.debug("query.execute", {
      table,
      details: { rows: output.length, durationMs: duration.toFixed(2) },
    });
    return output;
  }

  /**
   * Validate everything a full execution reads from the query state
   */
  #check(state: QueryState): CheckedQuery {
    if (typeof state.where === "function") {
      throw new UnsupportedPredicateError(state.table);
    }

    return {
      table: state.table,
      select: state.select === undefined ? undefined : validateSelect(state.select),
      where: state.where === undefined ? undefined : validatePredicate(state.where),
      order: validateOrder(state.order),
      limit: validatePagination(state.limit, "limit"),
      offset: validatePagination(state.offset, "offset"),
    };
  }

  /**
   * Serialize work on a table and replay any interrupted commit first
   */
  async #run<T>(table: string, mutation: boolean, fn: () => Promise<T>): Promise<T> {
    validateName(table, "table");

    let mutex = this.#mutexes.get(table);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(table, mutex);
    }

    const { options, layout, journal } = this.#ctx;
    return mutex.withLock(async () => {
      if (mutation && options.lockTables) {
        const lock = new FileLock(layout.lockPath(table));
        return lock.withLock(async () => {
          await journal.recover(table);
          return fn();
        }, options.lockTimeoutMs);
      }

      await journal.recover(table);
      return fn();
    });
  }

  #recordWrite(table: string, event: string, id: number, startTime: number): void {
    const duration = performance.now() - startTime;
    metrics.recordWriteTime(this.#scope(table), duration);
    logger.debug(event, { table, details: { id, durationMs: duration.toFixed(2) } });
  }

  #scope(table: string): string {
    return `${this.#ctx.options.database}/${table}`;
  }
}
