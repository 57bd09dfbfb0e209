/**
 * File-based lock serializing commits across processes
 * Uses exclusive file open so only one writer holds the marker at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError, errnoCode, errorMessage } from "./errors.js";
import { logger } from "./observability/logs.js";

export interface LockOptions {
  /** Total attempts before giving up (default: 10) */
  maxAttempts?: number;
  /** Delay after the first failed attempt; doubles each retry (default: 50ms) */
  baseDelayMs?: number;
  /** Ceiling for a single backoff delay (default: 2000ms) */
  maxDelayMs?: number;
  /** Called before each backoff wait */
  onRetry?: (attempt: number, delayMs: number) => void;
}

export const DEFAULT_LOCK_OPTIONS = {
  maxAttempts: 10,
  baseDelayMs: 50,
  maxDelayMs: 2000,
} as const;

/**
 * Backoff delay after the given failed attempt (1-based)
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Lock marker path for a durable file
 */
export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

/**
 * Exclusive lock marker beside a durable file
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;
  #options: Required<Omit<LockOptions, "onRetry">>;
  #onRetry?: (attempt: number, delayMs: number) => void;

  constructor(lockPath: string, options: LockOptions = {}) {
    this.#lockPath = lockPath;
    this.#options = {
      maxAttempts: options.maxAttempts ?? DEFAULT_LOCK_OPTIONS.maxAttempts,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_LOCK_OPTIONS.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_LOCK_OPTIONS.maxDelayMs,
    };
    this.#onRetry = options.onRetry;
  }

  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, retrying with exponential backoff
   * @throws LockTimeoutError once every attempt has failed
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error(`Lock already acquired: ${this.#lockPath}`);
    }

    const { maxAttempts, baseDelayMs, maxDelayMs } = this.#options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        // Try to open file exclusively (fails if already exists)
        const fd = await fs.open(this.#lockPath, "wx");
        this.#fd = fd;
        this.#acquired = true;

        // Write PID and timestamp for debugging
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await fd.sync();

        return;
      } catch (err) {
        if (this.#acquired) {
          // Marker is ours but writing the info failed
          await this.release();
          throw err;
        }
        if (errnoCode(err) !== "EEXIST") {
          throw err;
        }
        lastError = err;
      }

      if (attempt < maxAttempts) {
        const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
        logger.debug("lock.retry", { path: this.#lockPath, details: { attempt, delayMs: delay } });
        this.#onRetry?.(attempt, delay);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw new LockTimeoutError(this.#lockPath, maxAttempts, { cause: lastError });
  }

  /**
   * Release the lock; a no-op unless this instance holds it
   */
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
      // Already cleaned up
      if (errnoCode(err) !== "ENOENT") {
        logger.error("lock.release", { path: this.#lockPath, message: errorMessage(err) });
        throw err;
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Check if lock is acquired
   */
  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   * Automatically acquires and releases the lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Force remove a stale lock marker
   * DANGEROUS - only use if you're sure the process that created it is dead
   */
  static async forceRemove(lockPath: string): Promise<void> {
    try {
      await fs.unlink(lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
    }
  }

  /**
   * True when a marker currently exists at the path
   */
  static async isHeld(lockPath: string): Promise<boolean> {
    try {
      await fs.access(path.resolve(lockPath));
      return true;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return false;
      }
      throw err;
    }
  }
}
