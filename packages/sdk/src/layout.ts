/**
 * On-disk layout of a database
 *
 *   <root>/<database>/index.html          marker
 *   <root>/<database>/<table>/index.html  marker
 *   <root>/<database>/<table>/entry_<id>
 *   <root>/<database>/<table>/meta
 *   <root>/<database>/<table>/cache_<fingerprint>
 *   <root>/<database>/<table>/journal
 *   <root>/<database>/<table>/lock
 */

import * as path from "node:path";
import { atomicWrite, ensureDirectory, pathExists } from "./io.js";

/** Empty index page so a web server pointed at the data never lists it */
export const MARKER_FILE = "index.html";

export const ENTRY_PREFIX = "entry_";
export const CACHE_PREFIX = "cache_";

export class StorageLayout {
  readonly databaseDir: string;
  #databaseReady: Promise<void> | null = null;

  constructor(root: string, database: string) {
    this.databaseDir = path.join(root, database);
  }

  tableDir(table: string): string {
    return path.join(this.databaseDir, table);
  }

  entryPath(table: string, id: number): string {
    return path.join(this.databaseDir, table, `${ENTRY_PREFIX}${id}`);
  }

  metaPath(table: string): string {
    return path.join(this.databaseDir, table, "meta");
  }

  cachePath(table: string, fingerprint: string): string {
    return path.join(this.databaseDir, table, `${CACHE_PREFIX}${fingerprint}`);
  }

  journalPath(table: string): string {
    return path.join(this.databaseDir, table, "journal");
  }

  lockPath(table: string): string {
    return path.join(this.databaseDir, table, "lock");
  }

  /**
   * Create the database directory and its marker (once per handle)
   */
  async ensureDatabaseDir(): Promise<void> {
    if (!this.#databaseReady) {
      this.#databaseReady = createWithMarker(this.databaseDir).catch((err: unknown) => {
        this.#databaseReady = null;
        throw err;
      });
    }
    await this.#databaseReady;
  }

  /**
   * Create a table directory and its marker
   */
  async ensureTableDir(table: string): Promise<void> {
    await this.ensureDatabaseDir();
    await createWithMarker(this.tableDir(table));
  }
}

async function createWithMarker(dir: string): Promise<void> {
  await ensureDirectory(dir);
  const marker = path.join(dir, MARKER_FILE);
  if (!(await pathExists(marker))) {
    await atomicWrite(marker, "");
  }
}
