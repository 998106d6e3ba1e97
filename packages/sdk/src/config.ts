/**
 * Database options: validation, defaults and environment overrides
 */

import * as path from "node:path";
import { z } from "zod";
import type { DatabaseOptions, ResolvedOptions } from "./types.js";
import { parseWith, validateName } from "./validation.js";

export const DEFAULT_DATABASE = "default";
export const DEFAULT_LOCK_TIMEOUT_MS = 30000;

const DatabaseOptionsSchema = z
  .object({
    root: z.string().min(1, "root must be a non-empty path"),
    database: z.string().optional(),
    resultCache: z.boolean().optional(),
    lockTables: z.boolean().optional(),
    lockTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

const DISABLED_VALUES = new Set(["0", "false", "off", "no"]);

/**
 * FLATSTORE_RESULT_CACHE=0 (or false/off/no) turns the result cache off
 */
function resultCacheFromEnv(env: NodeJS.ProcessEnv): boolean {
  const value = env.FLATSTORE_RESULT_CACHE?.trim().toLowerCase();
  return value === undefined || !DISABLED_VALUES.has(value);
}

/**
 * Validate options and fill in defaults; explicit options win over the environment
 * @throws ValidationError on unknown keys, wrong types or an invalid database name
 */
export function resolveOptions(options: DatabaseOptions, env: NodeJS.ProcessEnv = process.env): ResolvedOptions {
  const parsed = parseWith(DatabaseOptionsSchema, options, "database options");

  return {
    root: path.resolve(parsed.root),
    database: validateName(parsed.database ?? DEFAULT_DATABASE, "database"),
    resultCache: parsed.resultCache ?? resultCacheFromEnv(env),
    lockTables: parsed.lockTables ?? false,
    lockTimeoutMs: parsed.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
  };
}
