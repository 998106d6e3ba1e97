/**
 * Validation utilities for database operations
 */

import type { z } from "zod";
import { ValidationError } from "./errors.js";
import {
  EntryIdSchema,
  FieldsSchema,
  IndexFieldsSchema,
  OrderSchema,
  PaginationSchema,
  SelectSchema,
} from "./schemas.js";
import type { Fields, Order, Predicate } from "./types.js";

/**
 * Valid characters for database and table names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con",
  "prn",
  "aux",
  "nul",
  ...Array.from({ length: 9 }, (_, i) => `com${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `lpt${i + 1}`),
]);

/**
 * Parse a value with a zod schema, converting failures into ValidationError
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const where = first?.path ? ` at "${first.path}"` : "";
  throw new ValidationError(`Invalid ${label}${where}: ${first?.message ?? "unknown problem"}`, issues);
}

/**
 * Validate a database or table name
 * @param value - Value to validate
 * @param label - Label for error messages
 * @throws ValidationError if the name could escape its directory or is not portable
 */
export function validateName(value: unknown, label: "table" | "database"): string {
  if (!value || typeof value !== "string") {
    throw new ValidationError(`${label} name must be a non-empty string`);
  }

  if (!VALID_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      `${label} name contains invalid characters: "${value}". ` +
        `Only alphanumeric, underscore, dash, and dot are allowed.`
    );
  }

  if (value.startsWith(".") || value.startsWith("-")) {
    throw new ValidationError(`${label} name cannot start with "." or "-": "${value}"`);
  }

  if (value.includes("..")) {
    throw new ValidationError(`${label} name cannot contain "..": "${value}"`);
  }

  // Windows: reject trailing dots
  if (value.endsWith(".")) {
    throw new ValidationError(`${label} name cannot end with ".": "${value}"`);
  }

  const baseName = (value.split(".")[0] ?? value).toLowerCase();
  if (WINDOWS_RESERVED_NAMES.has(baseName)) {
    throw new ValidationError(`${label} name cannot be a Windows reserved name: "${value}"`);
  }

  return value;
}

/**
 * Validate a record passed to insert() or update()
 */
export function validateRecord(value: unknown): Fields {
  return parseWith(FieldsSchema, value, "record");
}

/**
 * Validate an entry id
 */
export function validateEntryId(value: unknown): number {
  return parseWith(EntryIdSchema, value, "entry id");
}

/**
 * Validate and normalize an index declaration: `id` first, duplicates dropped
 */
export function validateIndexFields(value: unknown): string[] {
  const fields = parseWith(IndexFieldsSchema, value, "index declaration");
  return Array.from(new Set(["id", ...fields]));
}

export function validateSelect(value: unknown): string[] {
  return parseWith(SelectSchema, value, "select()");
}

export function validatePredicate(value: unknown): Predicate {
  return parseWith(FieldsSchema, value, "where()");
}

export function validateOrder(value: unknown): Order {
  return parseWith(OrderSchema, value, "order()");
}

export function validatePagination(value: unknown, label: "limit" | "offset"): number {
  return parseWith(PaginationSchema, value, `${label}()`);
}
