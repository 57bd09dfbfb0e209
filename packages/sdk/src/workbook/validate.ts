/**
 * Structural validation of a workbook, run before any in-memory state is touched.
 *
 * Missing Deals sheet or required column: error. Missing Lookups or
 * Metadata: warning, and no Metadata means the legacy 1.0 layout.
 */

import { NotFoundError, errorMessage } from "../errors.js";
import { readBytes } from "../io.js";
import { decodeWorkbook } from "./codec.js";
import { LEGACY_SCHEMA_VERSION, REQUIRED_DEAL_COLUMNS, readVersion } from "./layouts.js";
import {
  DEALS_SHEET,
  LOOKUPS_SHEET,
  METADATA_SHEET,
  columnIndex,
  dataRows,
  findSheet,
  nameKey,
  type Workbook,
} from "./table.js";

export interface VersionPolicy {
  currentVersion: string;
  supportedVersions: readonly string[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  /** Version stamp found, or implied by a missing stamp */
  schemaVersion: string | null;
  /** Older supported version that must be migrated before use */
  requiresMigration: boolean;
  /** Stamp is present but outside the supported set */
  unsupportedVersion: boolean;
  recordCount: number;
  hasDealsSheet: boolean;
  hasLookupsSheet: boolean;
  hasMetadataSheet: boolean;
}

function emptyResult(): ValidationResult {
  return {
    isValid: false,
    errors: [],
    warnings: [],
    schemaVersion: null,
    requiresMigration: false,
    unsupportedVersion: false,
    recordCount: 0,
    hasDealsSheet: false,
    hasLookupsSheet: false,
    hasMetadataSheet: false,
  };
}

export function validateWorkbook(workbook: Workbook, policy: VersionPolicy): ValidationResult {
  const result = emptyResult();

  const deals = findSheet(workbook, DEALS_SHEET);
  result.hasDealsSheet = deals !== undefined;
  result.hasLookupsSheet = findSheet(workbook, LOOKUPS_SHEET) !== undefined;
  result.hasMetadataSheet = findSheet(workbook, METADATA_SHEET) !== undefined;

  if (!deals) {
    result.errors.push(`Missing required sheet: ${DEALS_SHEET}`);
  } else {
    const columns = columnIndex(deals);
    for (const required of REQUIRED_DEAL_COLUMNS) {
      if (!columns.has(nameKey(required))) {
        result.errors.push(`Missing required column: ${required}`);
      }
    }
    result.recordCount = dataRows(deals).length;
  }

  if (!result.hasLookupsSheet) {
    result.warnings.push(`Missing optional sheet: ${LOOKUPS_SHEET}`);
  }
  if (!result.hasMetadataSheet) {
    result.warnings.push(`Missing optional sheet: ${METADATA_SHEET}`);
  }

  const version = readVersion(workbook) ?? LEGACY_SCHEMA_VERSION;
  result.schemaVersion = version;
  if (!policy.supportedVersions.includes(version)) {
    result.unsupportedVersion = true;
  } else if (version !== policy.currentVersion) {
    result.requiresMigration = true;
  }

  result.isValid = result.errors.length === 0;
  return result;
}

/**
 * Validate the workbook file at `filePath` without loading it
 */
export async function validateFile(filePath: string, policy: VersionPolicy): Promise<ValidationResult> {
  let bytes: Buffer;
  try {
    bytes = await readBytes(filePath);
  } catch (err) {
    if (err instanceof NotFoundError) {
      const result = emptyResult();
      result.errors.push(`File does not exist: ${filePath}`);
      return result;
    }
    throw err;
  }
  return validateBytes(bytes, policy).result;
}

/**
 * Decode and validate workbook bytes
 * @returns the decoded workbook as well when it could be read
 */
export function validateBytes(
  bytes: Buffer,
  policy: VersionPolicy
): { result: ValidationResult; workbook?: Workbook } {
  let workbook: Workbook;
  try {
    workbook = decodeWorkbook(bytes);
  } catch (err) {
    const result = emptyResult();
    result.errors.push(`Failed to read workbook: ${errorMessage(err)}`);
    return { result };
  }
  return { result: validateWorkbook(workbook, policy), workbook };
}
