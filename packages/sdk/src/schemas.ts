/**
 * Zod schemas for validating arguments and decoded files
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import type { Value } from "./types.js";

export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(ValueSchema),
    z.record(z.string(), ValueSchema),
  ])
);

// Arrays, dates, maps and class-less primitives are rejected by z.record
export const FieldsSchema = z.record(z.string(), ValueSchema);

export const EntryIdSchema = z
  .number({ invalid_type_error: "id must be a number" })
  .int("id must be an integer")
  .positive("id must be positive")
  .max(Number.MAX_SAFE_INTEGER, "id is too large");

export const EntrySchema = FieldsSchema.refine(
  (fields): fields is { id: number; [field: string]: Value } =>
    EntryIdSchema.safeParse(fields.id).success,
  { message: "entry must carry a positive integer id", path: ["id"] }
);

export const FieldNameSchema = z.string().min(1, "field name must be a non-empty string");

export const IndexFieldsSchema = z.array(FieldNameSchema, {
  invalid_type_error: "indexes must be an array of field names",
});

export const SelectSchema = z.array(FieldNameSchema, {
  invalid_type_error: "select() expects an array of field names",
});

export const OrderSchema = z.object({
  mode: z.enum(["asc", "desc"]),
  key: FieldNameSchema,
});

export const PaginationSchema = z.number().int().nonnegative();

// Table metadata - every index sequence must line up with the id sequence
export const TableMetaSchema = z
  .object({
    lastId: z.number().int().nonnegative(),
    count: z.number().int().nonnegative(),
    indexes: z.record(z.string(), z.array(ValueSchema)),
  })
  .superRefine((meta, ctx) => {
    const ids = meta.indexes.id;
    if (!ids) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["indexes", "id"],
        message: "metadata must include the id index",
      });
      return;
    }
    if (ids.length !== meta.count) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["count"],
        message: `count ${meta.count} does not match ${ids.length} indexed rows`,
      });
    }
    for (const [field, values] of Object.entries(meta.indexes)) {
      if (values.length !== ids.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["indexes", field],
          message: `index "${field}" has ${values.length} values for ${ids.length} rows`,
        });
      }
    }
  });

export const ResultListSchema = z.array(FieldsSchema);

export const JournalRecordSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("insert"), entry: EntrySchema, meta: TableMetaSchema }),
  z.object({ op: z.literal("update"), entry: EntrySchema, meta: TableMetaSchema.nullable() }),
  z.object({ op: z.literal("remove"), id: EntryIdSchema, meta: TableMetaSchema }),
  z.object({ op: z.literal("reindex"), meta: TableMetaSchema }),
]);
