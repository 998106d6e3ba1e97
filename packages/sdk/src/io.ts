/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files throw FileNotFoundError
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
  errorCode,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Check whether a path exists (file or directory)
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path (its directory must exist)
 * @param content - Content to write
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content);

    // Sync file data to disk (prefer datasync for performance, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errorCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.cleanup.failed", { message: `close ${tmp}`, details: { error: String(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // The temp file is gone already when rename succeeded or open failed
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup.failed", { message: `unlink ${tmp}`, details: { error: String(unlinkErr) } });
      }
    });

    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR" && code !== "EPERM") {
      logger.debug("io.cleanup.failed", { message: `fsync ${dir}`, details: { error: String(err) } });
    }
  }
}

/**
 * Read a whole file
 * @throws FileNotFoundError if the file doesn't exist
 * @throws FileReadError for other read failures
 */
export async function readFileBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new FileNotFoundError(filePath, { cause: err });
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 * @throws FileRemoveError if removal fails for reasons other than file not found
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return;
    }
    throw new FileRemoveError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by name prefix
 * @param dirPath - Directory path to list
 * @param prefix - Optional file name prefix (e.g., "cache_")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, prefix?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    // Filter to files only, exclude symlinks
    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (prefix) {
      files = files.filter((name) => name.startsWith(prefix));
    }

    // Return sorted list for determinism
    return files.sort();
  } catch (err) {
    // Return empty array if directory doesn't exist (simplifies callers)
    if (errorCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}
