/**
 * Atomic file I/O for the durable workbook, its temp files and its backups
 *
 * Invariants:
 * - Replacement is atomic: readers observe the whole old file or the whole new one
 * - Temp files always reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Removes are idempotent
 *
 * Pattern: write temp → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  DirectoryError,
  DocumentReadError,
  DocumentWriteError,
  ListFilesError,
  NotFoundError,
  errnoCode,
  errorMessage,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(dirPath, {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Unique temp path beside the target; every call yields a new name
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

async function syncHandle(handle: fs.FileHandle): Promise<void> {
  // Prefer datasync, fall back to a full sync where it is unsupported
  try {
    await handle.datasync();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await handle.sync();
    } else {
      throw err;
    }
  }
}

async function syncDirectory(dir: string): Promise<void> {
  if (!ENABLE_DIR_FSYNC) return;

  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF: platform has no directory fsync
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dirsync", { path: dir, message: errorMessage(err) });
    }
  }
}

/**
 * Write bytes to a fresh temp file beside `filePath` and flush them to disk
 * @returns the temp file path; the caller owns it from here on
 */
export async function writeTempFile(filePath: string, content: Uint8Array): Promise<string> {
  const dir = dirname(filePath);
  await ensureDirectory(dir);

  const tmp = tempPathFor(filePath);
  let handle: fs.FileHandle | undefined;

  try {
    handle = await fs.open(tmp, "wx", 0o600);
    await handle.writeFile(content);
    await syncHandle(handle);
    await handle.close();
    handle = undefined;
    return tmp;
  } catch (err) {
    if (handle) {
      await handle.close().catch((closeErr: unknown) => {
        logger.debug("io.close", { path: tmp, message: errorMessage(closeErr) });
      });
    }
    await removeFile(tmp);
    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Atomically move `source` over `target`, then fsync the directory
 */
export async function replaceFile(source: string, target: string): Promise<void> {
  try {
    try {
      await fs.rename(source, target);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errnoCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(source, target);
      } else {
        throw err;
      }
    }
  } catch (err) {
    throw new DocumentWriteError(target, { cause: err });
  }

  await syncDirectory(dirname(target));
}

/**
 * Atomically write bytes to a file using the write-rename-sync pattern
 */
export async function atomicWrite(filePath: string, content: Uint8Array): Promise<void> {
  const tmp = await writeTempFile(filePath, content);
  try {
    await replaceFile(tmp, filePath);
  } catch (err) {
    await removeFile(tmp);
    throw err;
  }
}

/**
 * Atomically copy `source` to `target` through a temp file
 */
export async function copyFileAtomic(source: string, target: string): Promise<void> {
  const content = await readBytes(source);
  await atomicWrite(target, content);
}

/**
 * Read a file's bytes
 * @throws NotFoundError if the file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new NotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * True when a regular file exists at the path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return;
    }
    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * List regular files in a directory, optionally filtered
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(
  dirPath: string,
  predicate?: (name: string) => boolean
): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    const files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name)
      .filter((name) => (predicate ? predicate(name) : true));

    // Return sorted list for determinism
    return files.sort();
  } catch (err) {
    // Return empty array if directory doesn't exist (simplifies callers)
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}
