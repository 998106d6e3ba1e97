/**
 * Locks serializing table operations
 *
 * - Mutex: in-process, one per table per handle; orders every terminal operation
 * - FileLock: opt-in advisory lock file held around mutations, for cooperating processes
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError, errorCode } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Simple in-process mutex
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  get locked(): boolean {
    return this.#locked;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * File-based lock using exclusive create
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(lockPath: string) {
    this.#lockPath = lockPath;
  }

  /**
   * Acquire the lock, retrying until the timeout
   * @param timeoutMs - Maximum time to wait for the lock
   * @param retryIntervalMs - Time between attempts
   * @throws LockTimeoutError if the lock is still held after timeoutMs
   */
  async acquire(timeoutMs = 30000, retryIntervalMs = 50): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();
    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      let fd: fs.FileHandle;
      try {
        // Fails with EEXIST while another holder has the file
        fd = await fs.open(this.#lockPath, "wx");
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime >= timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      try {
        // PID and timestamp for whoever finds a stale lock
        await fd.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
      } catch (err) {
        await this.#discard(fd);
        throw err;
      }

      this.#fd = fd;
      this.#acquired = true;
      return;
    }
  }

  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already removed by hand is fine
      if (errorCode(err) !== "ENOENT") {
        logger.error("lock.release.failed", { message: this.#lockPath, details: { error: String(err) } });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Close and delete a lock file that was created but never fully written
   */
  async #discard(fd: fs.FileHandle): Promise<void> {
    try {
      try {
        await fd.close();
      } finally {
        await fs.unlink(this.#lockPath);
      }
    } catch (err) {
      logger.error("lock.discard.failed", { message: this.#lockPath, details: { error: String(err) } });
    }
  }
}
