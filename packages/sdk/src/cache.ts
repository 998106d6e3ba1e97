/**
 * On-disk result cache for full query executions
 *
 * Artifacts live beside the entries as `cache_<fingerprint>`, where the
 * fingerprint covers (table, order, limit, offset, where, select). Any
 * mutation of a table removes every artifact of that table before the
 * mutation resolves.
 */

import * as path from "node:path";
import { readValueFile, writeValueFile } from "./codec.js";
import { CorruptFileError, FileNotFoundError } from "./errors.js";
import { fingerprint } from "./format.js";
import { listFiles, removeFile } from "./io.js";
import { CACHE_PREFIX, type StorageLayout } from "./layout.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { ResultListSchema } from "./schemas.js";
import type { Fields, QueryState } from "./types.js";

/**
 * Configuration options for the result cache
 */
export interface ResultCacheOptions {
  /** When false, lookups always miss and nothing is stored (invalidation still runs) */
  enabled?: boolean;
  /** Database name, used to scope metrics */
  database?: string;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  hits: number;
  misses: number;
  /** Cache hit rate (hits / total lookups) */
  hitRate: number;
  /** Artifacts deleted by invalidation */
  invalidated: number;
}

/**
 * Fingerprint of the parts of a query that determine its output
 */
export function queryFingerprint(state: QueryState): string {
  return fingerprint({
    table: state.table,
    order: state.order,
    limit: state.limit,
    offset: state.offset,
    where: state.where ?? null,
    select: state.select ?? null,
  });
}

export class ResultCache {
  #layout: StorageLayout;
  #enabled: boolean;
  #database: string;
  #hits = 0;
  #misses = 0;
  #invalidated = 0;

  constructor(layout: StorageLayout, options: ResultCacheOptions = {}) {
    this.#layout = layout;
    this.#enabled = options.enabled ?? true;
    this.#database = options.database ?? "default";
  }

  get enabled(): boolean {
    return this.#enabled;
  }

  /**
   * Look up a cached result
   * @returns The stored rows, or null on a miss (or when disabled)
   */
  async get(table: string, key: string): Promise<Fields[] | null> {
    if (!this.#enabled) {
      return null;
    }

    const filePath = this.#layout.cachePath(table, key);
    try {
      const rows = await readValueFile(filePath, ResultListSchema);
      this.#hits++;
      metrics.recordCacheHit(this.#scope(table));
      logger.debug("cache.hit", { table, details: { key } });
      return rows;
    } catch (err) {
      if (err instanceof CorruptFileError) {
        // Recompute rather than fail the read; the artifact is derived data
        logger.warn("cache.corrupt", { table, message: err.message });
        await removeFile(filePath);
      } else if (!(err instanceof FileNotFoundError)) {
        throw err;
      }
    }

    this.#misses++;
    metrics.recordCacheMiss(this.#scope(table));
    return null;
  }

  async set(table: string, key: string, rows: Fields[]): Promise<void> {
    if (!this.#enabled) {
      return;
    }
    await writeValueFile(this.#layout.cachePath(table, key), rows);
  }

  /**
   * Delete every cached result of a table
   * @returns Number of artifacts removed
   */
  async invalidate(table: string): Promise<number> {
    const dir = this.#layout.tableDir(table);
    const files = await listFiles(dir, CACHE_PREFIX);
    for (const file of files) {
      await removeFile(path.join(dir, file));
    }
    this.#invalidated += files.length;
    return files.length;
  }

  stats(): CacheStats {
    const total = this.#hits + this.#misses;
    return {
      hits: this.#hits,
      misses: this.#misses,
      hitRate: total > 0 ? this.#hits / total : 0,
      invalidated: this.#invalidated,
    };
  }

  #scope(table: string): string {
    return `${this.#database}/${table}`;
  }
}
