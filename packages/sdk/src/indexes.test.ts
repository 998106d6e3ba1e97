import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ResultCache } from "./cache.js";
import { EntryStore } from "./entries.js";
import { EntryNotFoundError, MissingIndexFieldError, NotIndexedError } from "./errors.js";
import { IndexManager, idsOf, indexValues } from "./indexes.js";
import { Journal } from "./journal.js";
import { StorageLayout } from "./layout.js";
import { MetadataStore } from "./meta.js";
import type { Fields, TableMeta } from "./types.js";

const priced: TableMeta = {
  lastId: 4,
  count: 3,
  indexes: { id: [1, 2, 4], price: [48, 32, 23] },
};

describe("IndexManager", () => {
  let testDir: string;
  let layout: StorageLayout;
  let meta: MetadataStore;
  let journal: Journal;
  let manager: IndexManager;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "flatstore-indexes-"));
    layout = new StorageLayout(testDir, "shop");
    const entries = new EntryStore(layout);
    meta = new MetadataStore(layout);
    journal = new Journal(layout, entries, meta, new ResultCache(layout));
    manager = new IndexManager(entries, meta, journal, "shop");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function seed(table: string, rows: Fields[]): Promise<void> {
    await layout.ensureTableDir(table);
    let current = (await meta.tryLoad(table)) ?? manager.initialMeta(table);
    for (const row of rows) {
      const entry = { ...row, id: current.lastId + 1 };
      current = manager.applyInsert(table, current, entry);
      await journal.commit(table, { op: "insert", entry, meta: current });
    }
  }

  describe("idsOf", () => {
    it("should return the id sequence", () => {
      expect(idsOf(priced)).toEqual([1, 2, 4]);
    });
  });

  describe("indexValues", () => {
    it("should return the sequence of an indexed field", () => {
      expect(indexValues(priced, "price")).toEqual([48, 32, 23]);
    });

    it("should ignore keys inherited from Object.prototype", () => {
      expect(indexValues(priced, "constructor")).toBeUndefined();
      expect(indexValues(priced, "toString")).toBeUndefined();
    });
  });

  describe("applyInsert", () => {
    it("should append to every sequence and advance the counters", () => {
      const next = manager.applyInsert("products", priced, { id: 5, name: "Cap", price: 15 });
      expect(next).toEqual({ lastId: 5, count: 4, indexes: { id: [1, 2, 4, 5], price: [48, 32, 23, 15] } });
    });

    it("should not modify the metadata it was given", () => {
      manager.applyInsert("products", priced, { id: 5, price: 15 });
      expect(priced.indexes.id).toEqual([1, 2, 4]);
      expect(priced.count).toBe(3);
    });

    it("should index a stored null", () => {
      const next = manager.applyInsert("products", priced, { id: 5, price: null });
      expect(next.indexes.price).toEqual([48, 32, 23, null]);
    });

    it("should reject a record without an indexed field", () => {
      expect(() => manager.applyInsert("products", priced, { id: 5, name: "Cap" })).toThrow(
        'Table "products" has an index on "price", but the record has no such field'
      );
    });
  });

  describe("applyUpdate", () => {
    it("should return null when no indexed value changed", () => {
      const before = { id: 2, name: "T-Shirt", price: 32 };
      const after = { id: 2, name: "Tee", price: 32 };
      expect(manager.applyUpdate("products", priced, before, after)).toBeNull();
    });

    it("should rewrite the row's position in changed sequences", () => {
      const next = manager.applyUpdate("products", priced, { id: 2, price: 32 }, { id: 2, price: 30 });
      expect(next).toEqual({ lastId: 4, count: 3, indexes: { id: [1, 2, 4], price: [48, 30, 23] } });
    });

    it("should reject new values without an indexed field", () => {
      expect(() => manager.applyUpdate("products", priced, { id: 2, price: 32 }, { id: 2 })).toThrow(
        MissingIndexFieldError
      );
    });

    it("should reject an id that is not indexed", () => {
      expect(() => manager.applyUpdate("products", priced, { id: 3, price: 1 }, { id: 3, price: 2 })).toThrow(
        EntryNotFoundError
      );
    });
  });

  describe("applyRemove", () => {
    it("should splice the row out of every sequence and keep lastId", () => {
      const next = manager.applyRemove("products", priced, 2);
      expect(next).toEqual({ lastId: 4, count: 2, indexes: { id: [1, 4], price: [48, 23] } });
    });

    it("should reject an id that is not indexed", () => {
      expect(() => manager.applyRemove("products", priced, 3)).toThrow(
        'Could not find entry with id 3 in table "products"'
      );
    });
  });

  describe("findIdBy", () => {
    it("should return the id at the first matching position", () => {
      const table: TableMeta = { lastId: 3, count: 3, indexes: { id: [1, 2, 3], price: [10, 20, 20] } };
      expect(manager.findIdBy("products", table, "price", 20)).toBe(2);
    });

    it("should return null when nothing matches", () => {
      expect(manager.findIdBy("products", priced, "price", 99)).toBeNull();
    });

    it("should not coerce types", () => {
      expect(manager.findIdBy("products", priced, "price", "32")).toBeNull();
    });

    it("should reject a field that is not indexed", () => {
      expect(() => manager.findIdBy("products", priced, "name", "Hoodie")).toThrow(NotIndexedError);
    });

    it("should reject an inherited object key as a field", () => {
      expect(() => manager.findIdBy("products", priced, "hasOwnProperty", "x")).toThrow(NotIndexedError);
    });
  });

  describe("declare", () => {
    it("should remember a declaration for a table without metadata", async () => {
      expect(await manager.declare("products", ["price"])).toBe("created");
      expect(manager.declared("products")).toEqual(["id", "price"]);
      expect(manager.initialMeta("products")).toEqual({
        lastId: 0,
        count: 0,
        indexes: { id: [], price: [] },
      });
    });

    it("should start with the id index alone without a declaration", () => {
      expect(manager.initialMeta("products")).toEqual({ lastId: 0, count: 0, indexes: { id: [] } });
    });

    it("should report an unchanged field set regardless of order", async () => {
      await manager.declare("products", ["price", "name"]);
      await seed("products", [{ name: "Hoodie", price: 48 }]);

      expect(await manager.declare("products", ["name", "price", "id"])).toBe("unchanged");
    });

    it("should rebuild from the live entries when the field set changes", async () => {
      await manager.declare("products", ["price"]);
      await seed("products", [
        { name: "Hoodie", price: 48 },
        { name: "T-Shirt", price: 32 },
        { name: "Cap", price: 15 },
      ]);
      await journal.commit("products", {
        op: "remove",
        id: 2,
        meta: manager.applyRemove("products", await meta.load("products"), 2),
      });

      expect(await manager.declare("products", ["name"])).toBe("rebuilt");
      expect(await new MetadataStore(layout).load("products")).toEqual({
        lastId: 3,
        count: 2,
        indexes: { id: [1, 3], name: ["Hoodie", "Cap"] },
      });
    });

    it("should leave metadata alone when an entry lacks a new field", async () => {
      await seed("products", [{ name: "Hoodie" }, { price: 32 }]);

      await expect(manager.declare("products", ["name"])).rejects.toThrow(
        'Table "products" has an index on "name", but entry 2 has no such field'
      );
      expect(await new MetadataStore(layout).load("products")).toEqual({
        lastId: 2,
        count: 2,
        indexes: { id: [1, 2] },
      });
    });

    it("should forget declarations on clear", async () => {
      await manager.declare("products", ["price"]);
      manager.clear();
      expect(manager.declared("products")).toBeUndefined();
    });
  });
});
