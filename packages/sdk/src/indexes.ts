/**
 * Index manager for position-aligned secondary indexes
 *
 * Indexes live inside the table metadata as parallel value sequences:
 *
 *   indexes: { id: [1, 2, 4], price: [48, 32, 23], name: ["Hoodie", ...] }
 *
 * Invariants:
 * - Every sequence has the same length as `indexes.id`
 * - Position i in every sequence describes the same row
 * - `indexes.id` stays in ascending id order (append on insert, splice on remove)
 * - The apply* methods are pure: they return new metadata and never write
 */

import type { EntryStore } from "./entries.js";
import { EntryNotFoundError, MissingIndexFieldError, NotIndexedError } from "./errors.js";
import { valuesEqual } from "./format.js";
import type { Journal } from "./journal.js";
import type { MetadataStore } from "./meta.js";
import { emptyMeta } from "./meta.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { fieldValue } from "./query.js";
import type { Entry, IndexStatus, TableMeta, Value } from "./types.js";
import { validateIndexFields } from "./validation.js";

/**
 * The id sequence of a table as numbers
 */
export function idsOf(meta: TableMeta): number[] {
  return (meta.indexes.id ?? []).filter((id): id is number => typeof id === "number");
}

/**
 * The value sequence of an indexed field, or undefined when the field is not
 * an index (own keys only, so "constructor" or "toString" never match)
 */
export function indexValues(meta: TableMeta, field: string): Value[] | undefined {
  return Object.hasOwn(meta.indexes, field) ? meta.indexes[field] : undefined;
}

function sameFieldSet(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((field) => b.includes(field));
}

export class IndexManager {
  #entries: EntryStore;
  #meta: MetadataStore;
  #journal: Journal;
  #database: string;
  #declarations = new Map<string, string[]>();

  constructor(entries: EntryStore, meta: MetadataStore, journal: Journal, database = "default") {
    this.#entries = entries;
    this.#meta = meta;
    this.#journal = journal;
    this.#database = database;
  }

  /**
   * Declare the indexed fields of a table
   *
   * - no metadata yet: remember the declaration for the first insert → "created"
   * - same field set as persisted: no I/O → "unchanged"
   * - otherwise: rebuild every declared sequence from the live entries → "rebuilt"
   * @throws ValidationError if fields is not an array of field names
   * @throws MissingIndexFieldError if a live entry lacks a declared field
   */
  async declare(table: string, fields: unknown): Promise<IndexStatus> {
    const declared = validateIndexFields(fields);
    const meta = await this.#meta.tryLoad(table);

    if (!meta) {
      this.#declarations.set(table, declared);
      return "created";
    }

    if (sameFieldSet(Object.keys(meta.indexes), declared)) {
      this.#declarations.set(table, declared);
      return "unchanged";
    }

    await this.#rebuild(table, meta, declared);
    this.#declarations.set(table, declared);
    return "rebuilt";
  }

  /**
   * Declared fields for a table, if declare() was called on this handle
   */
  declared(table: string): string[] | undefined {
    return this.#declarations.get(table);
  }

  /**
   * Metadata for a table's first insert (declared indexes, or id only)
   */
  initialMeta(table: string): TableMeta {
    return emptyMeta(this.#declarations.get(table));
  }

  /**
   * Append a new row to every index sequence
   * @throws MissingIndexFieldError before anything is written
   */
  applyInsert(table: string, meta: TableMeta, entry: Entry): TableMeta {
    const indexes: Record<string, Value[]> = {};
    for (const [field, values] of Object.entries(meta.indexes)) {
      const value = fieldValue(entry, field);
      if (value === undefined) {
        throw new MissingIndexFieldError(table, field);
      }
      indexes[field] = [...values, value];
    }

    return { lastId: entry.id, count: meta.count + 1, indexes };
  }

  /**
   * Rewrite a row's indexed values if any of them changed
   * @returns New metadata, or null when no indexed value changed
   */
  applyUpdate(table: string, meta: TableMeta, before: Entry, after: Entry): TableMeta | null {
    let changed = false;
    for (const field of Object.keys(meta.indexes)) {
      if (field === "id") continue;

      const next = fieldValue(after, field);
      if (next === undefined) {
        throw new MissingIndexFieldError(table, field, after.id);
      }
      if (!valuesEqual(fieldValue(before, field), next)) {
        changed = true;
      }
    }

    if (!changed) {
      return null;
    }

    const position = this.#positionOf(table, meta, before.id);
    const indexes: Record<string, Value[]> = {};
    for (const [field, values] of Object.entries(meta.indexes)) {
      const copy = values.slice();
      const next = fieldValue(after, field);
      if (field !== "id" && next !== undefined) {
        copy[position] = next;
      }
      indexes[field] = copy;
    }

    return { ...meta, indexes };
  }

  /**
   * Splice a row out of every index sequence and decrement the count
   */
  applyRemove(table: string, meta: TableMeta, id: number): TableMeta {
    const position = this.#positionOf(table, meta, id);
    const indexes: Record<string, Value[]> = {};
    for (const [field, values] of Object.entries(meta.indexes)) {
      indexes[field] = values.filter((_, i) => i !== position);
    }

    return { lastId: meta.lastId, count: meta.count - 1, indexes };
  }

  /**
   * First id whose indexed value equals `value`
   * @throws NotIndexedError if field is not indexed
   * @returns The id, or null when nothing matches
   */
  findIdBy(table: string, meta: TableMeta, field: string, value: Value): number | null {
    const values = indexValues(meta, field);
    if (!values) {
      throw new NotIndexedError(table, field);
    }

    const position = values.findIndex((candidate) => valuesEqual(candidate, value));
    if (position < 0) {
      return null;
    }
    const id = meta.indexes.id?.[position];
    return typeof id === "number" ? id : null;
  }

  /**
   * Forget all declarations (handle teardown)
   */
  clear(): void {
    this.#declarations.clear();
  }

  #positionOf(table: string, meta: TableMeta, id: number): number {
    const position = (meta.indexes.id ?? []).indexOf(id);
    if (position < 0) {
      throw new EntryNotFoundError(table, id);
    }
    return position;
  }

  async #rebuild(table: string, meta: TableMeta, fields: string[]): Promise<void> {
    const startTime = performance.now();
    logger.info("index.rebuild.start", { table, details: { fields } });

    const ids = idsOf(meta).sort((a, b) => a - b);
    const indexes: Record<string, Value[]> = Object.fromEntries(
      fields.map((field): [string, Value[]] => [field, []])
    );

    // Validate every entry before committing anything
    for (const id of ids) {
      const entry = await this.#entries.read(table, id);
      for (const field of fields) {
        const value = fieldValue(entry, field);
        if (value === undefined) {
          throw new MissingIndexFieldError(table, field, id);
        }
        indexes[field]?.push(value);
      }
    }

    await this.#journal.commit(table, {
      op: "reindex",
      meta: { lastId: meta.lastId, count: ids.length, indexes },
    });

    const duration = performance.now() - startTime;
    metrics.recordRebuildTime(`${this.#database}/${table}`, duration);
    logger.info("index.rebuild.end", {
      table,
      details: { durationMs: duration.toFixed(2), entries: ids.length, fields },
    });
  }
}
