/**
 * Metadata Store: loads and persists `<table>/meta`
 *
 * Invariants:
 * - Loaded metadata is cached per table for the lifetime of the owning handle
 * - Cached objects are never mutated; callers persist a new object instead
 * - persist() updates the cache only after the file write succeeded
 */

import { readValueFile, writeValueFile } from "./codec.js";
import { FileNotFoundError, TableNotFoundError } from "./errors.js";
import type { StorageLayout } from "./layout.js";
import { TableMetaSchema } from "./schemas.js";
import type { TableMeta, Value } from "./types.js";

/**
 * Fresh metadata for a table that has never been written
 */
export function emptyMeta(indexFields: string[] = ["id"]): TableMeta {
  return {
    lastId: 0,
    count: 0,
    indexes: Object.fromEntries(indexFields.map((field): [string, Value[]] => [field, []])),
  };
}

export class MetadataStore {
  #layout: StorageLayout;
  #cache = new Map<string, TableMeta>();

  constructor(layout: StorageLayout) {
    this.#layout = layout;
  }

  /**
   * @throws TableNotFoundError if the table was never initialized
   */
  async load(table: string): Promise<TableMeta> {
    const meta = await this.tryLoad(table);
    if (!meta) {
      throw new TableNotFoundError(table);
    }
    return meta;
  }

  async tryLoad(table: string): Promise<TableMeta | null> {
    const cached = this.#cache.get(table);
    if (cached) {
      return cached;
    }

    let meta: TableMeta;
    try {
      meta = await readValueFile(this.#layout.metaPath(table), TableMetaSchema);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        return null;
      }
      throw err;
    }

    this.#cache.set(table, meta);
    return meta;
  }

  async persist(table: string, meta: TableMeta): Promise<void> {
    await writeValueFile(this.#layout.metaPath(table), meta);
    this.#cache.set(table, meta);
  }

  /**
   * Drop cached metadata (one table, or all of them)
   */
  forget(table?: string): void {
    if (table) {
      this.#cache.delete(table);
    } else {
      this.#cache.clear();
    }
  }
}
