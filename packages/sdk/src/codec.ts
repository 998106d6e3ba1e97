/**
 * File payload codec
 *
 * Every data file is a 16-byte guard header followed by UTF-8 JSON:
 *
 *   \0FLATSTORE\0v001\n{...payload...}
 *
 * The NUL bytes make browsers and static file servers treat the file as
 * binary rather than render it; the version tag lets future encodings coexist.
 */

import type { z } from "zod";
import { CorruptFileError } from "./errors.js";
import { atomicWrite, readFileBytes } from "./io.js";
import { ValueSchema } from "./schemas.js";
import type { Value } from "./types.js";

export const FORMAT_VERSION = 1;

const MAGIC = "\u0000FLATSTORE\u0000";

export const GUARD_HEADER = `${MAGIC}v${String(FORMAT_VERSION).padStart(3, "0")}\n`;

export const HEADER_BYTES = Buffer.byteLength(GUARD_HEADER, "latin1");

/**
 * Encode a value as guard header + JSON
 */
export function encodePayload(value: Value): Buffer {
  return Buffer.concat([Buffer.from(GUARD_HEADER, "latin1"), Buffer.from(JSON.stringify(value), "utf-8")]);
}

/**
 * Check the guard header and decode the JSON payload
 * @param bytes - Raw file contents
 * @param filePath - Path used in error messages
 * @throws CorruptFileError for a missing/unknown header or an undecodable payload
 */
export function decodePayload(bytes: Uint8Array, filePath: string): Value {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (buf.length < HEADER_BYTES || buf.toString("latin1", 0, MAGIC.length) !== MAGIC) {
    throw new CorruptFileError(filePath, "missing guard header");
  }

  const header = buf.toString("latin1", 0, HEADER_BYTES);
  if (header !== GUARD_HEADER) {
    throw new CorruptFileError(filePath, `unsupported format version "${header.slice(MAGIC.length).trim()}"`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(buf.toString("utf-8", HEADER_BYTES));
  } catch (err) {
    throw new CorruptFileError(filePath, "payload is not valid JSON", { cause: err });
  }

  const result = ValueSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptFileError(filePath, "payload is not a storable value", { cause: result.error });
  }
  return result.data;
}

/**
 * Persist a value atomically (Entry Store write)
 */
export async function writeValueFile(filePath: string, value: Value): Promise<void> {
  await atomicWrite(filePath, encodePayload(value));
}

/**
 * Read a value file and check it against a schema (Entry Store read)
 * @throws FileNotFoundError if the file is missing
 * @throws CorruptFileError if the payload does not match the schema
 */
export async function readValueFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
  const value = decodePayload(await readFileBytes(filePath), filePath);
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const reason = issue ? `${issue.path.join(".") || "payload"}: ${issue.message}` : "unexpected payload shape";
    throw new CorruptFileError(filePath, reason, { cause: result.error });
  }
  return result.data;
}
