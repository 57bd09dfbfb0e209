/**
 * Durable repository backed by a single workbook file.
 *
 * Load: validate before touching memory → restore from the newest backup if
 * invalid → refuse unsupported versions → migrate → decode → normalize.
 *
 * Commit (saveChanges), under the in-process mutex and the cross-process
 * lock marker:
 *   1. encode records, lookups and fresh metadata into a unique temp file
 *   2. re-validate the temp file exactly as load would
 *   3. back up the existing durable file
 *   4. atomically rename the temp file over the durable file
 *   5. prune backups beyond the retention count
 * A failure before step 4 leaves the durable file byte-identical.
 */

import { dirname } from "node:path";
import { performance } from "node:perf_hooks";
import { BackupManager, type BackupInfo } from "./backups.js";
import { parseStoreSettings, type StoreSettings, type StoreSettingsInput } from "./config.js";
import { createContext, type DealContext } from "./context.js";
import type { IsoDate } from "./dates.js";
import { IntegrityError, UnsupportedVersionError, errorMessage } from "./errors.js";
import {
  atomicWrite,
  copyFileAtomic,
  ensureDirectory,
  fileExists,
  readBytes,
  removeFile,
  replaceFile,
  writeTempFile,
} from "./io.js";
import { FileLock, lockPathFor } from "./lock.js";
import { upsertInto } from "./memory-repository.js";
import { matchesFilter, type DealFilter } from "./model/filter.js";
import { LookupTables } from "./model/lookups.js";
import { cloneRecord, sameId, type DealRecord } from "./model/record.js";
import { Mutex } from "./mutex.js";
import { Normalizer } from "./normalize.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { RecordRepository } from "./repository.js";
import { encodeWorkbook } from "./workbook/codec.js";
import {
  decodeLookups,
  encodeLayout,
  hasLayout,
  readMetadata,
  unmanagedMetadata,
  type MetadataEntry,
} from "./workbook/layouts.js";
import { migrateWorkbook } from "./workbook/migrations.js";
import { decodeRecords, unknownHeaders } from "./workbook/records.js";
import { DEALS_SHEET, LOOKUPS_SHEET, METADATA_SHEET, findSheet, type Workbook } from "./workbook/table.js";
import { validateBytes, validateFile, type ValidationResult } from "./workbook/validate.js";

export interface ReplaceContext {
  filePath: string;
  tempPath: string;
  /** Backup taken in step 3; undefined on the first commit */
  backupPath?: string;
}

export interface StoreHooks {
  /** Runs after the backup and before the temp file replaces the durable file */
  beforeReplace?: (context: ReplaceContext) => void | Promise<void>;
}

export interface StoreOptions extends Omit<StoreSettingsInput, "filePath"> {
  filePath: string;
  context?: DealContext;
  lookups?: LookupTables;
  hooks?: StoreHooks;
}

interface LoadedState {
  records: DealRecord[];
  version: string;
  extraMetadata: MetadataEntry[];
  extraColumns: string[];
  dirty: boolean;
}

export class FileRepository implements RecordRepository {
  readonly #filePath: string;
  readonly #settings: StoreSettings;
  readonly #context: DealContext;
  readonly #hooks: StoreHooks;
  readonly #mutex = new Mutex();
  readonly #lock: FileLock;
  readonly #backups: BackupManager;
  #baseLookups: LookupTables;
  #lookups: LookupTables;
  #normalizer: Normalizer;

  #records: DealRecord[] = [];
  #extraMetadata: MetadataEntry[] = [];
  #extraColumns: string[] = [];
  #version: string | undefined;
  #loaded = false;
  #loading: Promise<void> | undefined;
  #dirty = false;
  #generation = 0;

  constructor(options: StoreOptions) {
    const { filePath, context, lookups, hooks, ...settings } = options;
    this.#filePath = filePath;
    this.#settings = parseStoreSettings(settings);
    this.#context = context ?? createContext();
    this.#hooks = hooks ?? {};
    this.#baseLookups = lookups ?? LookupTables.createDefault();
    this.#lookups = this.#baseLookups;
    this.#normalizer = new Normalizer(this.#context, this.#lookups);
    this.#lock = new FileLock(lockPathFor(filePath), {
      ...this.#settings.lock,
      onRetry: () => metrics.recordLockRetry(filePath),
    });
    this.#backups = new BackupManager(filePath, this.#context.clock, this.#settings.maxBackups);
  }

  get filePath(): string {
    return this.#filePath;
  }

  get settings(): StoreSettings {
    return this.#settings;
  }

  /** Schema version of the loaded state; the current version once migrated */
  get loadedSchemaVersion(): string | undefined {
    return this.#version;
  }

  get isDirty(): boolean {
    return this.#dirty;
  }

  get isLoaded(): boolean {
    return this.#loaded;
  }

  get lookups(): LookupTables {
    return this.#lookups;
  }

  // ---- repository contract ----

  async getAll(): Promise<DealRecord[]> {
    await this.load();
    return this.#records.map(cloneRecord);
  }

  async getById(id: string): Promise<DealRecord | undefined> {
    await this.load();
    const record = this.#records.find((candidate) => sameId(candidate.id, id));
    return record ? cloneRecord(record) : undefined;
  }

  async query(filter: DealFilter, referenceDate: IsoDate): Promise<DealRecord[]> {
    await this.load();
    return this.#records
      .filter((record) => matchesFilter(record, filter, referenceDate))
      .map(cloneRecord);
  }

  async upsert(record: DealRecord): Promise<void> {
    await this.load();
    upsertInto(this.#records, record);
    this.#markDirty();
  }

  async upsertMany(records: Iterable<DealRecord>): Promise<void> {
    await this.load();
    for (const record of records) {
      upsertInto(this.#records, record);
    }
    this.#markDirty();
  }

  async delete(id: string): Promise<void> {
    await this.load();
    const before = this.#records.length;
    this.#records = this.#records.filter((record) => !sameId(record.id, id));
    if (this.#records.length !== before) {
      this.#markDirty();
    }
  }

  /**
   * Persist in-memory state. No-op when nothing changed and the file exists.
   */
  async saveChanges(): Promise<void> {
    await this.load();
    await this.#mutex.withLock(async () => {
      if (!this.#dirty && (await fileExists(this.#filePath))) {
        return;
      }
      await ensureDirectory(dirname(this.#filePath));
      await this.#lock.withLock(() => this.#commit());
    });
  }

  // ---- store operations ----

  /**
   * Load the durable file if not already loaded. Concurrent callers share one load.
   */
  async load(): Promise<void> {
    if (this.#loaded) return;
    if (!this.#loading) {
      this.#loading = this.#load().finally(() => {
        this.#loading = undefined;
      });
    }
    await this.#loading;
  }

  /**
   * Discard in-memory state, including unsaved changes, and load again
   */
  async reload(): Promise<void> {
    await this.#mutex.withLock(async () => {
      this.#invalidate();
    });
    await this.load();
  }

  /**
   * Structural validation of the durable file as it is on disk now
   */
  async validate(): Promise<ValidationResult> {
    return validateFile(this.#filePath, this.#policy());
  }

  /**
   * Backups of the durable file, newest first
   */
  async listBackups(): Promise<BackupInfo[]> {
    return this.#backups.list();
  }

  /**
   * Copy the newest backup over the durable file and drop cached state
   * @returns the backup used, or undefined when none exists
   */
  async restoreFromBackup(): Promise<BackupInfo | undefined> {
    return this.#mutex.withLock(async () => {
      const restored = await this.#lock.withLock(() => this.#restoreLatest());
      if (restored) {
        this.#invalidate();
      }
      return restored;
    });
  }

  /**
   * Write the loaded records to `targetPath` in the layout of `version`
   */
  async exportTo(targetPath: string, version: string = this.#settings.currentVersion): Promise<void> {
    if (!this.#settings.supportedVersions.includes(version) || !hasLayout(version)) {
      throw new UnsupportedVersionError(targetPath, version, this.#settings.supportedVersions);
    }
    await this.load();
    const workbook = encodeLayout(version, {
      records: this.#records,
      lookups: this.#lookups,
      lastModified: this.#context.clock.now(),
      extraMetadata: this.#extraMetadata,
      extraColumns: this.#extraColumns,
    });
    await atomicWrite(targetPath, encodeWorkbook(workbook));
    logger.info("store.export", { path: targetPath, details: { version, records: this.#records.length } });
  }

  /**
   * Apply the durable file's Lookups table over the configured lookups.
   * Later normalization uses the result.
   */
  async importLookups(): Promise<LookupTables> {
    if (!(await fileExists(this.#filePath))) {
      return this.#lookups;
    }
    const { result, workbook } = validateBytes(await readBytes(this.#filePath), this.#policy());
    const sheet = workbook ? findSheet(workbook, LOOKUPS_SHEET) : undefined;
    if (!result.isValid || !sheet) {
      return this.#lookups;
    }
    this.#lookups = this.#baseLookups.withOverrides(decodeLookups(sheet));
    this.#normalizer = new Normalizer(this.#context, this.#lookups);
    return this.#lookups;
  }

  // ---- internals ----

  #policy(): { currentVersion: string; supportedVersions: readonly string[] } {
    return {
      currentVersion: this.#settings.currentVersion,
      supportedVersions: this.#settings.supportedVersions,
    };
  }

  #markDirty(): void {
    this.#dirty = true;
    this.#generation++;
  }

  #invalidate(): void {
    this.#records = [];
    this.#extraMetadata = [];
    this.#extraColumns = [];
    this.#version = undefined;
    this.#loaded = false;
    this.#dirty = false;
    this.#generation++;
  }

  async #load(): Promise<void> {
    const started = performance.now();
    const state = await this.#readState();

    // Assigned together, only after the whole file has been read
    this.#records = state.records;
    this.#version = state.version;
    this.#extraMetadata = state.extraMetadata;
    this.#extraColumns = state.extraColumns;
    this.#dirty = state.dirty;
    this.#loaded = true;
    this.#generation++;

    metrics.recordLoad(this.#filePath, performance.now() - started);
    logger.debug("store.load", {
      path: this.#filePath,
      details: { records: state.records.length, version: state.version, dirty: state.dirty },
    });
  }

  async #readState(): Promise<LoadedState> {
    const current = this.#settings.currentVersion;

    if (!(await fileExists(this.#filePath))) {
      return { records: [], version: current, extraMetadata: [], extraColumns: [], dirty: false };
    }

    let { result, workbook } = validateBytes(await readBytes(this.#filePath), this.#policy());
    if (!result.isValid || !workbook) {
      logger.warn("store.load", {
        path: this.#filePath,
        message: "validation failed, trying latest backup",
        details: { errors: result.errors },
      });
      const restored = await this.#mutex.withLock(() => this.#lock.withLock(() => this.#restoreLatest()));
      if (restored) {
        ({ result, workbook } = validateBytes(await readBytes(this.#filePath), this.#policy()));
      }
      if (!result.isValid || !workbook) {
        throw new IntegrityError(this.#filePath, result.errors);
      }
    }

    const version = result.schemaVersion ?? current;
    if (result.unsupportedVersion) {
      throw new UnsupportedVersionError(this.#filePath, version, this.#settings.supportedVersions);
    }

    let source: Workbook = workbook;
    if (result.requiresMigration) {
      const outcome = migrateWorkbook(workbook, version, current);
      source = outcome.workbook;
      metrics.recordMigration(this.#filePath);
      logger.info("store.migrate", {
        path: this.#filePath,
        details: { from: version, to: current, steps: outcome.applied },
      });
    }

    const deals = findSheet(source, DEALS_SHEET);
    if (!deals) {
      throw new IntegrityError(this.#filePath, [`Missing required sheet: ${DEALS_SHEET}`]);
    }

    let repaired = false;
    const records = decodeRecords(deals).map((raw) => {
      const { record, changes } = this.#normalizer.normalize(raw);
      if (changes.length > 0) repaired = true;
      return record;
    });

    const metadata = findSheet(source, METADATA_SHEET);
    return {
      records,
      version: current,
      extraMetadata: metadata ? unmanagedMetadata(readMetadata(metadata)) : [],
      extraColumns: unknownHeaders(deals),
      dirty: result.requiresMigration || repaired,
    };
  }

  async #restoreLatest(): Promise<BackupInfo | undefined> {
    const latest = await this.#backups.latest();
    if (!latest) return undefined;
    await copyFileAtomic(latest.path, this.#filePath);
    metrics.recordRestore(this.#filePath);
    logger.info("store.restore", { path: this.#filePath, details: { backup: latest.name } });
    return latest;
  }

  async #commit(): Promise<void> {
    const started = performance.now();
    const generation = this.#generation;
    const current = this.#settings.currentVersion;

    // Step 1: serialize to a temp file unique to this attempt
    const workbook = encodeLayout(current, {
      records: this.#records,
      lookups: this.#lookups,
      lastModified: this.#context.clock.now(),
      extraMetadata: this.#extraMetadata,
      extraColumns: this.#extraColumns,
    });
    const tempPath = await writeTempFile(this.#filePath, encodeWorkbook(workbook));

    let backupPath: string | undefined;
    try {
      // Step 2: the temp file must pass the same checks load applies
      const { result } = validateBytes(await readBytes(tempPath), this.#policy());
      if (!result.isValid || result.schemaVersion !== current) {
        throw new IntegrityError(
          tempPath,
          result.errors.length > 0
            ? result.errors
            : [`Expected schema ${current}, found ${String(result.schemaVersion)}`]
        );
      }

      // Step 3
      if (await fileExists(this.#filePath)) {
        backupPath = await this.#backups.create();
      }

      await this.#hooks.beforeReplace?.({ filePath: this.#filePath, tempPath, backupPath });

      // Step 4
      await replaceFile(tempPath, this.#filePath);
    } catch (err) {
      await removeFile(tempPath);
      metrics.recordAbort(this.#filePath);
      logger.error("store.commit.abort", { path: this.#filePath, message: errorMessage(err) });
      throw err;
    }

    // Mutations made while the commit ran stay pending
    if (this.#generation === generation) {
      this.#dirty = false;
    }
    this.#version = current;

    // Step 5: a failed prune does not undo a successful commit
    try {
      const removed = await this.#backups.prune();
      if (removed.length > 0) {
        logger.debug("backup.prune", { path: this.#filePath, details: { removed } });
      }
    } catch (err) {
      logger.warn("backup.prune", { path: this.#filePath, message: errorMessage(err) });
    }

    metrics.recordCommit(this.#filePath, performance.now() - started);
    logger.debug("store.commit", {
      path: this.#filePath,
      details: { records: this.#records.length, backup: backupPath ?? null },
    });
  }
}
