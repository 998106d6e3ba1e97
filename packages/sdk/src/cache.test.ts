/**
 * Tests for ResultCache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ResultCache, queryFingerprint } from "./cache.js";
import { writeValueFile } from "./codec.js";
import { listFiles, pathExists } from "./io.js";
import { StorageLayout } from "./layout.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { QueryState } from "./types.js";

const baseState: QueryState = {
  table: "products",
  order: { mode: "asc", key: "id" },
  limit: 0,
  offset: 0,
};

describe("queryFingerprint", () => {
  it("should be equal for equal query states", () => {
    expect(queryFingerprint({ ...baseState })).toBe(queryFingerprint(baseState));
  });

  it("should not depend on predicate key order", () => {
    const a = queryFingerprint({ ...baseState, where: { name: "Hoodie", price: 48 } });
    const b = queryFingerprint({ ...baseState, where: { price: 48, name: "Hoodie" } });
    expect(a).toBe(b);
  });

  it("should differ when any result-shaping part differs", () => {
    const base = queryFingerprint(baseState);
    expect(queryFingerprint({ ...baseState, table: "orders" })).not.toBe(base);
    expect(queryFingerprint({ ...baseState, limit: 2 })).not.toBe(base);
    expect(queryFingerprint({ ...baseState, offset: 1 })).not.toBe(base);
    expect(queryFingerprint({ ...baseState, order: { mode: "desc", key: "id" } })).not.toBe(base);
    expect(queryFingerprint({ ...baseState, select: ["name"] })).not.toBe(base);
    expect(queryFingerprint({ ...baseState, where: { sizes: "M" } })).not.toBe(base);
  });
});

describe("ResultCache", () => {
  let testDir: string;
  let layout: StorageLayout;
  let cache: ResultCache;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "flatstore-cache-"));
    layout = new StorageLayout(testDir, "shop");
    await layout.ensureTableDir("products");
    cache = new ResultCache(layout, { database: "shop" });
    metrics.reset();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it("should miss when nothing is stored", async () => {
    expect(await cache.get("products", "abc")).toBeNull();
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, hitRate: 0, invalidated: 0 });
  });

  it("should return stored rows", async () => {
    const rows = [{ id: 1, name: "Hoodie" }];
    await cache.set("products", "abc", rows);

    expect(await cache.get("products", "abc")).toEqual(rows);
    expect(cache.stats().hits).toBe(1);
  });

  it("should store an empty result", async () => {
    await cache.set("products", "empty", []);
    expect(await cache.get("products", "empty")).toEqual([]);
  });

  it("should compute the hit rate", async () => {
    await cache.get("products", "abc");
    await cache.set("products", "abc", []);
    await cache.get("products", "abc");

    expect(cache.stats().hitRate).toBe(0.5);
  });

  it("should record hits and misses per database and table", async () => {
    await cache.get("products", "abc");
    await cache.set("products", "abc", []);
    await cache.get("products", "abc");

    const recorded = metrics.getMetrics("shop/products");
    expect(recorded?.cacheHits).toBe(1);
    expect(recorded?.cacheMisses).toBe(1);
    expect(metrics.getHitRate("shop/products")).toBe(0.5);
  });

  it("should remove only cache artifacts on invalidate", async () => {
    await writeValueFile(layout.entryPath("products", 1), { id: 1, name: "Hoodie" });
    await cache.set("products", "one", []);
    await cache.set("products", "two", []);

    expect(await cache.invalidate("products")).toBe(2);
    expect(await listFiles(layout.tableDir("products"))).toEqual(["entry_1", "index.html"]);
    expect(cache.stats().invalidated).toBe(2);
  });

  it("should invalidate a table that has no directory", async () => {
    expect(await cache.invalidate("orders")).toBe(0);
  });

  it("should discard a corrupt artifact and treat it as a miss", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    logger.setLevel("warn");
    const artifact = layout.cachePath("products", "broken");
    await writeFile(artifact, "not a cache file");

    expect(await cache.get("products", "broken")).toBeNull();
    expect(await pathExists(artifact)).toBe(false);
    expect(cache.stats().misses).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  describe("when disabled", () => {
    it("should never store or return rows", async () => {
      const disabled = new ResultCache(layout, { enabled: false });
      await disabled.set("products", "abc", [{ id: 1 }]);

      expect(disabled.enabled).toBe(false);
      expect(await disabled.get("products", "abc")).toBeNull();
      expect(await listFiles(layout.tableDir("products"), "cache_")).toEqual([]);
    });

    it("should still remove artifacts on invalidate", async () => {
      await cache.set("products", "abc", []);
      const disabled = new ResultCache(layout, { enabled: false });

      expect(await disabled.invalidate("products")).toBe(1);
      expect(await listFiles(layout.tableDir("products"), "cache_")).toEqual([]);
    });
  });
});
