import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors.js";
import {
  validateEntryId,
  validateIndexFields,
  validateName,
  validateOrder,
  validatePagination,
  validatePredicate,
  validateRecord,
  validateSelect,
} from "./validation.js";

describe("validateName", () => {
  it("should accept portable names", () => {
    expect(validateName("products", "table")).toBe("products");
    expect(validateName("shop_2024.v1", "database")).toBe("shop_2024.v1");
  });

  it("should reject empty and non-string names", () => {
    expect(() => validateName("", "table")).toThrow("table name must be a non-empty string");
    expect(() => validateName(42, "database")).toThrow("database name must be a non-empty string");
  });

  it("should reject path separators", () => {
    expect(() => validateName("../etc", "table")).toThrow("table name contains invalid characters");
    expect(() => validateName("a/b", "table")).toThrow(ValidationError);
  });

  it("should reject leading dots and dashes", () => {
    expect(() => validateName(".hidden", "table")).toThrow('table name cannot start with "." or "-"');
    expect(() => validateName("-flag", "table")).toThrow(ValidationError);
  });

  it("should reject double dots and trailing dots", () => {
    expect(() => validateName("a..b", "table")).toThrow('table name cannot contain ".."');
    expect(() => validateName("name.", "table")).toThrow('table name cannot end with "."');
  });

  it("should reject Windows device names", () => {
    expect(() => validateName("CON", "table")).toThrow("Windows reserved name");
    expect(() => validateName("lpt1.data", "table")).toThrow("Windows reserved name");
  });
});

describe("validateRecord", () => {
  it("should accept nested values", () => {
    const record = { name: "T-Shirt", sizes: ["S", "M"], stock: { warehouse: 3 }, note: null };
    expect(validateRecord(record)).toEqual(record);
  });

  it("should reject sequences and scalars", () => {
    expect(() => validateRecord(JSON.parse("[1,2]"))).toThrow(ValidationError);
    expect(() => validateRecord("Hoodie")).toThrow("Invalid record");
    expect(() => validateRecord(null)).toThrow(ValidationError);
  });

  it("should reject values that cannot be stored", () => {
    expect(() => validateRecord({ price: Number.NaN })).toThrow(ValidationError);
    expect(() => validateRecord({ run: () => 1 })).toThrow(ValidationError);
  });
});

describe("validateEntryId", () => {
  it("should accept positive integers", () => {
    expect(validateEntryId(7)).toBe(7);
  });

  it("should name the problem", () => {
    expect(() => validateEntryId("1")).toThrow("Invalid entry id: id must be a number");
    expect(() => validateEntryId(1.5)).toThrow("Invalid entry id: id must be an integer");
    expect(() => validateEntryId(0)).toThrow("Invalid entry id: id must be positive");
  });

  it("should report an issue for the argument itself", () => {
    try {
      validateEntryId(-3);
      expect.unreachable("validateEntryId should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.code).toBe("E_VALIDATION");
        expect(err.issues).toEqual([{ path: "", message: "id must be positive" }]);
      }
    }
  });
});

describe("validateIndexFields", () => {
  it("should put id first and drop duplicates", () => {
    expect(validateIndexFields(["price", "id", "price", "name"])).toEqual(["id", "price", "name"]);
  });

  it("should return id alone for an empty declaration", () => {
    expect(validateIndexFields([])).toEqual(["id"]);
  });

  it("should reject anything but a list of names", () => {
    expect(() => validateIndexFields(JSON.parse('"name"'))).toThrow(
      "Invalid index declaration: indexes must be an array of field names"
    );
    expect(() => validateIndexFields([""])).toThrow(ValidationError);
  });
});

describe("query part validators", () => {
  it("should validate select lists", () => {
    expect(validateSelect(["name", "price"])).toEqual(["name", "price"]);
    expect(() => validateSelect("name")).toThrow("select() expects an array of field names");
  });

  it("should validate predicates as value mappings", () => {
    expect(validatePredicate({ sizes: "M" })).toEqual({ sizes: "M" });
    expect(() => validatePredicate(JSON.parse("[1]"))).toThrow("Invalid where()");
  });

  it("should validate order direction and key", () => {
    expect(validateOrder({ mode: "desc", key: "price" })).toEqual({ mode: "desc", key: "price" });
    expect(() => validateOrder({ mode: "up", key: "price" })).toThrow('Invalid order() at "mode"');
    expect(() => validateOrder({ mode: "asc", key: "" })).toThrow('Invalid order() at "key"');
  });

  it("should validate limit and offset as non-negative integers", () => {
    expect(validatePagination(0, "limit")).toBe(0);
    expect(() => validatePagination(-1, "limit")).toThrow("Invalid limit()");
    expect(() => validatePagination(1.5, "offset")).toThrow("Invalid offset()");
  });
});
