/**
 * Entry Store: one record per `entry_<id>` file
 */

import { readValueFile, writeValueFile } from "./codec.js";
import { EntryNotFoundError, FileNotFoundError } from "./errors.js";
import { pathExists, removeFile } from "./io.js";
import type { StorageLayout } from "./layout.js";
import { EntrySchema } from "./schemas.js";
import type { Entry } from "./types.js";

export class EntryStore {
  #layout: StorageLayout;

  constructor(layout: StorageLayout) {
    this.#layout = layout;
  }

  /**
   * Read an entry
   * @throws EntryNotFoundError if there is no file for the id
   */
  async read(table: string, id: number): Promise<Entry> {
    const entry = await this.tryRead(table, id);
    if (!entry) {
      throw new EntryNotFoundError(table, id);
    }
    return entry;
  }

  /**
   * Read an entry, or null when its file does not exist
   */
  async tryRead(table: string, id: number): Promise<Entry | null> {
    try {
      return await readValueFile(this.#layout.entryPath(table, id), EntrySchema);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        return null;
      }
      throw err;
    }
  }

  async exists(table: string, id: number): Promise<boolean> {
    return pathExists(this.#layout.entryPath(table, id));
  }

  /**
   * Write (or fully replace) an entry file
   */
  async write(table: string, entry: Entry): Promise<void> {
    await writeValueFile(this.#layout.entryPath(table, entry.id), entry);
  }

  /**
   * Delete an entry file (no error if already gone)
   */
  async remove(table: string, id: number): Promise<void> {
    await removeFile(this.#layout.entryPath(table, id));
  }
}
