/**
 * Query evaluation helpers: ordering, pagination, filtering and projection
 */

import { stableStringify, valuesEqual } from "./format.js";
import type { Fields, Order, Predicate, Value } from "./types.js";

/**
 * Own field of a record (inherited properties such as "toString" never count)
 */
export function fieldValue(record: Fields, field: string): Value | undefined {
  return Object.hasOwn(record, field) ? record[field] : undefined;
}

// null < boolean < number < string < array < object
function rank(value: Value | undefined): number {
  if (value === undefined || value === null) return 0;
  if (Array.isArray(value)) return 4;
  switch (typeof value) {
    case "boolean":
      return 1;
    case "number":
      return 2;
    case "string":
      return 3;
    default:
      return 5;
  }
}

/**
 * Compare two values for sorting
 * Mixed kinds order by kind; arrays and objects compare by stable serialization
 * @returns negative, 0, or positive
 */
export function compareValues(a: Value | undefined, b: Value | undefined): number {
  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) {
    return rankA - rankB;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (rankA === 0) {
    return 0;
  }

  const textA = stableStringify(a);
  const textB = stableStringify(b);
  return textA < textB ? -1 : textA > textB ? 1 : 0;
}

/**
 * Order row ids by a position-aligned key sequence
 *
 * Ties between equal keys always go to the smaller id, in both directions.
 * @param ids - The table's id sequence
 * @param keys - The index sequence of the sort field (same length as ids)
 */
export function orderIds(ids: Value[], keys: Value[], mode: Order["mode"]): number[] {
  const direction = mode === "desc" ? -1 : 1;
  const rows: Array<{ id: number; key: Value | undefined }> = [];
  ids.forEach((id, position) => {
    if (typeof id === "number") {
      rows.push({ id, key: keys[position] });
    }
  });

  rows.sort((a, b) => direction * compareValues(a.key, b.key) || a.id - b.id);
  return rows.map((row) => row.id);
}

/**
 * Apply limit/offset to ordered ids
 * limit > 0 takes `limit` items from `offset`; otherwise offset alone skips items
 */
export function paginate<T>(items: T[], limit: number, offset: number): T[] {
  if (limit > 0) {
    return items.slice(offset, offset + limit);
  }
  if (offset > 0) {
    return items.slice(offset);
  }
  return items;
}

function contains(list: Value[], needle: Value): boolean {
  return list.some((item) => valuesEqual(item, needle));
}

/**
 * Test a record against an equality/containment predicate
 *
 * Array-valued fields: a scalar expectation must be a member, an array
 * expectation must have every element present. Anything else: structural equality.
 */
export function matchesPredicate(record: Fields, predicate: Predicate): boolean {
  for (const [field, expected] of Object.entries(predicate)) {
    const actual = fieldValue(record, field);

    if (Array.isArray(actual)) {
      if (Array.isArray(expected)) {
        if (!expected.every((item) => contains(actual, item))) return false;
      } else if (!contains(actual, expected)) {
        return false;
      }
      continue;
    }

    if (!valuesEqual(actual, expected)) {
      return false;
    }
  }
  return true;
}

/**
 * Keep only the listed fields, in listed order, skipping absent ones
 */
export function project(record: Fields, select?: string[]): Fields {
  if (!select) {
    return record;
  }

  const result: Fields = {};
  for (const field of select) {
    const value = fieldValue(record, field);
    if (value !== undefined) {
      result[field] = value;
    }
  }
  return result;
}
