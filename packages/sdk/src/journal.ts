/**
 * Per-table commit journal
 *
 * A mutation touches up to three things: an entry file, the metadata file and
 * the table's cached results. The journal makes that sequence recoverable:
 *
 * 1. prepare: the complete intended state is written to `<table>/journal`
 * 2. apply:   entry write/removal → metadata persist → cache invalidation
 * 3. clear:   the journal file is deleted
 *
 * A crash between 1 and 3 leaves the journal behind; the next handle to touch
 * the table replays step 2 (every step is idempotent) before reading metadata.
 */

import { readValueFile, writeValueFile } from "./codec.js";
import type { EntryStore } from "./entries.js";
import { FileNotFoundError } from "./errors.js";
import { removeFile } from "./io.js";
import type { StorageLayout } from "./layout.js";
import type { MetadataStore } from "./meta.js";
import type { ResultCache } from "./cache.js";
import { logger } from "./observability/logs.js";
import { JournalRecordSchema } from "./schemas.js";
import type { Entry, TableMeta } from "./types.js";

export type JournalRecord =
  | { op: "insert"; entry: Entry; meta: TableMeta }
  | { op: "update"; entry: Entry; meta: TableMeta | null } // null: no indexed value changed
  | { op: "remove"; id: number; meta: TableMeta }
  | { op: "reindex"; meta: TableMeta };

export class Journal {
  #layout: StorageLayout;
  #entries: EntryStore;
  #meta: MetadataStore;
  #cache: ResultCache;
  #recovered = new Set<string>();

  constructor(layout: StorageLayout, entries: EntryStore, meta: MetadataStore, cache: ResultCache) {
    this.#layout = layout;
    this.#entries = entries;
    this.#meta = meta;
    this.#cache = cache;
  }

  /**
   * Durably record, apply and clear one mutation
   */
  async commit(table: string, record: JournalRecord): Promise<void> {
    const journalPath = this.#layout.journalPath(table);
    await writeValueFile(journalPath, record);
    await this.#apply(table, record);
    await removeFile(journalPath);
  }

  /**
   * Replay a leftover journal, once per table per handle
   * @returns true if a pending mutation was replayed
   */
  async recover(table: string): Promise<boolean> {
    if (this.#recovered.has(table)) {
      return false;
    }

    const journalPath = this.#layout.journalPath(table);
    let record: JournalRecord;
    try {
      record = await readValueFile(journalPath, JournalRecordSchema);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        this.#recovered.add(table);
        return false;
      }
      throw err;
    }

    logger.warn("journal.replay", { table, message: `replaying interrupted ${record.op}` });
    // The cached metadata may predate the interrupted write
    this.#meta.forget(table);
    await this.#apply(table, record);
    await removeFile(journalPath);
    this.#recovered.add(table);
    return true;
  }

  /**
   * Forget which tables were checked (handle teardown)
   */
  reset(): void {
    this.#recovered.clear();
  }

  async #apply(table: string, record: JournalRecord): Promise<void> {
    switch (record.op) {
      case "insert":
        await this.#entries.write(table, record.entry);
        await this.#meta.persist(table, record.meta);
        break;
      case "update":
        await this.#entries.write(table, record.entry);
        if (record.meta) {
          await this.#meta.persist(table, record.meta);
        }
        break;
      case "remove":
        await this.#entries.remove(table, record.id);
        await this.#meta.persist(table, record.meta);
        break;
      case "reindex":
        await this.#meta.persist(table, record.meta);
        break;
    }
    await this.#cache.invalidate(table);
  }
}
