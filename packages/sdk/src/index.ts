/**
 * Dealbook SDK
 *
 * Durable, file-backed record store for a sales pipeline, with
 * normalization, patch validation and replayable time and ids
 */

// Records and lookups
export type { DealRecord } from "./model/record.js";
export { createRecord, cloneRecord, sameId, weightedAmount, hasPromoter } from "./model/record.js";
export type { Stage } from "./model/stage.js";
export {
  STAGES,
  DEFAULT_STAGE_PROBABILITIES,
  matchStage,
  parseStage,
  isStage,
} from "./model/stage.js";
export type { LookupOverrides } from "./model/lookups.js";
export { LookupTables, extractArea } from "./model/lookups.js";
export type { DealFilter } from "./model/filter.js";
export { matchesFilter } from "./model/filter.js";
export type { FieldSpec, FieldKey } from "./model/fields.js";
export { FIELDS, findField, formatField } from "./model/fields.js";
export { parseMoney, formatMoney, parseWholeNumber, parseBoolean, splitTags, joinTags } from "./model/values.js";

// Dates, time and ids
export type { IsoDate } from "./dates.js";
export { parseDate, toIsoDate, fromIsoDate, isIsoDate, daysBetween } from "./dates.js";
export type { Clock, IdGenerator, DealContext } from "./context.js";
export {
  SystemClock,
  FixedClock,
  RandomIdGenerator,
  SeededIdGenerator,
  SequentialIdGenerator,
  mulberry32,
  createContext,
  forTesting,
  forSyntheticData,
} from "./context.js";

// Engines
export type { NormalizationChange, NormalizationResult } from "./normalize.js";
export { Normalizer, buildMapLink, cleanTags } from "./normalize.js";
export type {
  AppliedField,
  RejectedField,
  RejectionCode,
  PatchResult,
  PatchStatus,
  PatchApplication,
} from "./patch.js";
export { applyPatch } from "./patch.js";

// Repositories
export type { RecordRepository } from "./repository.js";
export { InMemoryRepository } from "./memory-repository.js";
export type { StoreOptions, StoreHooks, ReplaceContext } from "./file-repository.js";
export { FileRepository } from "./file-repository.js";
export { RecordService } from "./service.js";
export type { BackupInfo } from "./backups.js";
export { BackupManager, BACKUP_EXTENSION, BACKUP_TIMESTAMP_FORMAT } from "./backups.js";
export type { LockOptions } from "./lock.js";
export { FileLock, lockPathFor, backoffDelay } from "./lock.js";

// Durable format
export type { ValidationResult, VersionPolicy } from "./workbook/validate.js";
export { validateFile, validateWorkbook } from "./workbook/validate.js";
export {
  CURRENT_SCHEMA_VERSION,
  SUPPORTED_SCHEMA_VERSIONS,
  LEGACY_SCHEMA_VERSION,
} from "./workbook/layouts.js";
export type { Migration } from "./workbook/migrations.js";
export { MIGRATIONS, migrationPath } from "./workbook/migrations.js";

// Configuration
export type { StoreSettings, StoreSettingsInput } from "./config.js";
export { DEFAULT_MAX_BACKUPS, StoreSettingsSchema, parseStoreSettings, loadConfigFile } from "./config.js";

// Errors
export {
  DealbookError,
  IntegrityError,
  UnsupportedVersionError,
  LockTimeoutError,
  NotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
  ListFilesError,
  ConfigError,
} from "./errors.js";

// Observability
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { logger } from "./observability/logs.js";
export type { StoreMetrics } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";
