/**
 * Query builder: a single-use description of one table operation
 *
 * Mutators (select, where, order, limit, offset) only record state and never
 * touch the disk. The first terminal call consumes the query; a second one
 * rejects with QueryStateError, even when the first call failed.
 *
 * @example
 * ```typescript
 * const db = openDatabase({ root: "./data" });
 *
 * await db.table("products").insert({ name: "Hoodie", price: 48 });
 * const cheap = await db.table("products").order("asc", "price").limit(2).all();
 * ```
 */

import type { Database } from "./database.js";
import { QueryStateError } from "./errors.js";
import type { QueryExecutor } from "./executor.js";
import type { Entry, Fields, IndexStatus, OrderDirection, QueryState, TableMeta, Value, WhereClause } from "./types.js";

export class Query {
  #state: QueryState;
  #executed = false;
  #executor: QueryExecutor;
  #database: Database;

  constructor(table: string, executor: QueryExecutor, database: Database) {
    this.#state = { table, order: { mode: "asc", key: "id" }, limit: 0, offset: 0 };
    this.#executor = executor;
    this.#database = database;
  }

  get table(): string {
    return this.#state.table;
  }

  /**
   * True once a terminal operation has been called
   */
  get executed(): boolean {
    return this.#executed;
  }

  /**
   * Restrict returned records to these fields (in this order)
   */
  select(fields: string[]): this {
    this.#state.select = fields;
    return this;
  }

  /**
   * Filter by field equality, or containment for array-valued fields.
   * Calling without an argument clears the filter.
   */
  where(predicate?: WhereClause): this {
    this.#state.where = predicate;
    return this;
  }

  /**
   * Sort by an indexed field (default: id)
   */
  order(direction: OrderDirection, field = "id"): this {
    this.#state.order = { mode: direction, key: field };
    return this;
  }

  /**
   * Maximum number of ids to read; 0 means no limit
   */
  limit(count: number): this {
    this.#state.limit = count;
    return this;
  }

  /**
   * Number of ordered ids to skip
   */
  offset(count: number): this {
    this.#state.offset = count;
    return this;
  }

  /**
   * Alias for offset()
   */
  skip(count: number): this {
    return this.offset(count);
  }

  /**
   * Store a new record
   * @returns The stored entry, including its assigned id
   */
  async insert(record: Fields): Promise<Entry> {
    return this.#executor.insert(this.#consume(), record);
  }

  /**
   * Replace every field of an existing record
   * @returns The stored entry
   */
  async update(id: number, values: Fields): Promise<Entry> {
    return this.#executor.update(this.#consume(), id, values);
  }

  /**
   * Remove one record or several
   * @returns The owning database, for chaining further table calls
   */
  async remove(ids: number | number[]): Promise<Database> {
    await this.#executor.remove(this.#consume(), ids);
    return this.#database;
  }

  /**
   * Look up one record by id, or by an indexed field
   */
  async find(value: Value, field = "id"): Promise<Fields | null> {
    return this.#executor.find(this.#consume(), value, field);
  }

  async all(): Promise<Fields[]> {
    return this.#executor.all(this.#consume());
  }

  /**
   * First record of the result, or null when it is empty
   */
  async first(): Promise<Fields | null> {
    const rows = await this.#executor.all(this.#consume());
    return rows[0] ?? null;
  }

  async count(): Promise<number> {
    return this.#executor.count(this.#consume());
  }

  async meta(): Promise<TableMeta> {
    return this.#executor.meta(this.#consume());
  }

  /**
   * Declare the indexed fields of the table (`id` is always included)
   */
  async indexes(fields: string[]): Promise<IndexStatus> {
    return this.#executor.indexes(this.#consume(), fields);
  }

  #consume(): QueryState {
    if (this.#executed) {
      throw new QueryStateError(this.#state.table);
    }
    this.#executed = true;

    const { select, order } = this.#state;
    return { ...this.#state, order: { ...order }, select: select?.slice() };
  }
}
