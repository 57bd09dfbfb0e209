/**
 * Timestamped backups of the durable file: `{base}_{yyyyMMdd_HHmmss_SSS}{ext}.bak`
 * beside it. Timestamps come from the injected clock, so names sort by age.
 * A second backup in the same millisecond gets a `_{n}` suffix after the stamp.
 */

import { basename, dirname, extname, join } from "node:path";
import { format } from "date-fns";
import type { Clock } from "./context.js";
import { copyFileAtomic, fileExists, listFiles, removeFile } from "./io.js";

export const BACKUP_EXTENSION = ".bak";
export const BACKUP_TIMESTAMP_FORMAT = "yyyyMMdd_HHmmss_SSS";

export interface BackupInfo {
  path: string;
  name: string;
  /** Timestamp part of the name */
  timestamp: string;
  /** Collision counter; 0 when the name has no suffix */
  sequence: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class BackupManager {
  readonly #filePath: string;
  readonly #clock: Clock;
  readonly #maxBackups: number;
  readonly #pattern: RegExp;

  constructor(filePath: string, clock: Clock, maxBackups: number) {
    this.#filePath = filePath;
    this.#clock = clock;
    this.#maxBackups = maxBackups;
    const ext = extname(filePath);
    const base = basename(filePath, ext);
    this.#pattern = new RegExp(
      `^${escapeRegExp(base)}_(\\d{8}_\\d{6}_\\d{3})(?:_(\\d+))?${escapeRegExp(ext)}${escapeRegExp(BACKUP_EXTENSION)}$`
    );
  }

  get maxBackups(): number {
    return this.#maxBackups;
  }

  /**
   * Backup path for a given instant
   */
  pathFor(instant: Date, sequence = 0): string {
    const ext = extname(this.#filePath);
    const base = basename(this.#filePath, ext);
    const stamp = format(instant, BACKUP_TIMESTAMP_FORMAT);
    const suffix = sequence > 0 ? `_${sequence}` : "";
    return join(dirname(this.#filePath), `${base}_${stamp}${suffix}${ext}${BACKUP_EXTENSION}`);
  }

  /**
   * Backups of this file, newest first
   */
  async list(): Promise<BackupInfo[]> {
    const dir = dirname(this.#filePath);
    const backups: BackupInfo[] = [];
    for (const name of await listFiles(dir)) {
      const match = this.#pattern.exec(name);
      if (match?.[1]) {
        backups.push({
          path: join(dir, name),
          name,
          timestamp: match[1],
          sequence: Number(match[2] ?? 0),
        });
      }
    }
    return backups.sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.sequence - a.sequence);
  }

  async latest(): Promise<BackupInfo | undefined> {
    const [newest] = await this.list();
    return newest;
  }

  /**
   * Copy the durable file to a backup stamped with the clock's current time
   * @returns the backup path
   */
  async create(): Promise<string> {
    const instant = this.#clock.now();
    let sequence = 0;
    let target = this.pathFor(instant);
    while (await fileExists(target)) {
      target = this.pathFor(instant, ++sequence);
    }
    await copyFileAtomic(this.#filePath, target);
    return target;
  }

  /**
   * Delete backups beyond the retention count, oldest first
   * @returns paths removed
   */
  async prune(): Promise<string[]> {
    const stale = (await this.list()).slice(this.#maxBackups);
    for (const backup of stale) {
      await removeFile(backup.path);
    }
    return stale.map((backup) => backup.path);
  }
}
