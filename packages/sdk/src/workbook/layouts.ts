/**
 * On-disk layouts by schema version, and the Lookups/Metadata sheet codecs.
 *
 * 1.0  Deals + Lookups, no Metadata
 * 1.1  Metadata: Version, LastModified
 * 1.2  Metadata: Version, LastModified, DealCount, GeneratedBy
 */

import { STAGES, type Stage } from "../model/stage.js";
import type { LookupOverrides, LookupTables } from "../model/lookups.js";
import { FIELDS } from "../model/fields.js";
import type { DealRecord } from "../model/record.js";
import { parseWholeNumber } from "../model/values.js";
import { encodeRecords } from "./records.js";
import {
  DEALS_SHEET,
  LOOKUPS_SHEET,
  METADATA_SHEET,
  columnIndex,
  dataRows,
  findSheet,
  nameKey,
  type Row,
  type Sheet,
  type Workbook,
} from "./table.js";

export const CURRENT_SCHEMA_VERSION = "1.2";
export const SUPPORTED_SCHEMA_VERSIONS: readonly string[] = ["1.0", "1.1", "1.2"];
/** Version implied by a file without a Version stamp */
export const LEGACY_SCHEMA_VERSION = "1.0";
export const GENERATED_BY = "dealbook";

export const METADATA_HEADER: Row = ["Property", "Value"];
export const LOOKUPS_HEADER: Row = ["PostcodeArea", "Region", "", "Stage", "DefaultProbability"];

export const REQUIRED_DEAL_COLUMNS = ["DealId", "AccountName", "DealName", "Stage"] as const;

export type MetadataEntry = [property: string, value: string];

/** Metadata properties written by the layouts themselves */
export const MANAGED_METADATA: readonly string[] = ["Version", "LastModified", "DealCount", "GeneratedBy"];

/**
 * Metadata rows no layout manages
 */
export function unmanagedMetadata(entries: readonly MetadataEntry[]): MetadataEntry[] {
  const managed = new Set(MANAGED_METADATA.map(nameKey));
  return entries.filter(([property]) => !managed.has(nameKey(property)));
}

export interface LayoutInput {
  records: readonly DealRecord[];
  lookups: LookupTables;
  /** Commit timestamp */
  lastModified: Date;
  /** Metadata rows this version does not manage, carried through as found */
  extraMetadata?: readonly MetadataEntry[];
  /** Unrecognised Deals columns to keep, even when empty */
  extraColumns?: readonly string[];
}

type LayoutEncoder = (input: LayoutInput) => Workbook;

export function encodeLookups(lookups: LookupTables): Row[] {
  const areas = lookups.areaRegionEntries();
  const stages = lookups.stageProbabilityEntries();
  const rows: Row[] = [[...LOOKUPS_HEADER]];
  for (let i = 0; i < Math.max(areas.length, stages.length); i++) {
    const area = areas[i];
    const stage = stages[i];
    rows.push([
      area ? area[0] : "",
      area ? area[1] : "",
      "",
      stage ? stage[0] : "",
      stage ? String(stage[1]) : "",
    ]);
  }
  return rows;
}

function isStageName(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

/**
 * Read overrides from a Lookups sheet; blank or malformed rows are skipped
 */
export function decodeLookups(sheet: Sheet): LookupOverrides {
  const columns = columnIndex(sheet);
  const areaCol = columns.get(nameKey("PostcodeArea"));
  const regionCol = columns.get(nameKey("Region"));
  const stageCol = columns.get(nameKey("Stage"));
  const probabilityCol = columns.get(nameKey("DefaultProbability"));

  const areaRegions: Array<[string, string]> = [];
  const stageProbabilities: Partial<Record<Stage, number>> = {};

  for (const row of dataRows(sheet)) {
    if (areaCol !== undefined && regionCol !== undefined) {
      const area = (row[areaCol] ?? "").trim().toUpperCase();
      const region = (row[regionCol] ?? "").trim();
      if (area && region) {
        areaRegions.push([area, region]);
      }
    }
    if (stageCol !== undefined && probabilityCol !== undefined) {
      const stage = (row[stageCol] ?? "").trim();
      const probability = parseWholeNumber(row[probabilityCol] ?? "");
      if (isStageName(stage) && probability !== undefined && probability >= 0 && probability <= 100) {
        stageProbabilities[stage] = probability;
      }
    }
  }

  return { areaRegions, stageProbabilities };
}

/**
 * Property/value rows of a Metadata sheet, in file order
 */
export function readMetadata(sheet: Sheet): MetadataEntry[] {
  return dataRows(sheet)
    .map((row): MetadataEntry => [(row[0] ?? "").trim(), (row[1] ?? "").trim()])
    .filter(([property]) => property.length > 0);
}

export function metadataValue(entries: readonly MetadataEntry[], property: string): string | undefined {
  const key = nameKey(property);
  return entries.find(([name]) => nameKey(name) === key)?.[1];
}

/**
 * Version stamp of a workbook; undefined when no Metadata sheet or no Version row exists
 */
export function readVersion(workbook: Workbook): string | undefined {
  const sheet = findSheet(workbook, METADATA_SHEET);
  if (!sheet) return undefined;
  const version = metadataValue(readMetadata(sheet), "Version");
  return version ? version : undefined;
}

/**
 * Set a metadata property, appending the row when absent
 */
export function setMetadataValue(sheet: Sheet, property: string, value: string): void {
  const key = nameKey(property);
  const row = sheet.rows.slice(1).find((candidate) => nameKey(candidate[0] ?? "") === key);
  if (row) {
    row[1] = value;
  } else {
    sheet.rows.push([property, value]);
  }
}

function metadataSheet(managed: readonly MetadataEntry[], extra: readonly MetadataEntry[] = []): Sheet {
  const managedKeys = new Set(managed.map(([property]) => nameKey(property)));
  const carried = extra.filter(([property]) => !managedKeys.has(nameKey(property)));
  return {
    name: METADATA_SHEET,
    rows: [[...METADATA_HEADER], ...[...managed, ...carried].map(([property, value]) => [property, value])],
  };
}

function baseSheets(input: LayoutInput): Sheet[] {
  return [
    { name: DEALS_SHEET, rows: encodeRecords(input.records, FIELDS, input.extraColumns) },
    { name: LOOKUPS_SHEET, rows: encodeLookups(input.lookups) },
  ];
}

const LAYOUTS: Readonly<Record<string, LayoutEncoder>> = {
  "1.0": (input) => ({ sheets: baseSheets(input) }),
  "1.1": (input) => ({
    sheets: [
      ...baseSheets(input),
      metadataSheet(
        [
          ["Version", "1.1"],
          ["LastModified", input.lastModified.toISOString()],
        ],
        input.extraMetadata
      ),
    ],
  }),
  "1.2": (input) => ({
    sheets: [
      ...baseSheets(input),
      metadataSheet(
        [
          ["Version", "1.2"],
          ["LastModified", input.lastModified.toISOString()],
          ["DealCount", String(input.records.length)],
          ["GeneratedBy", GENERATED_BY],
        ],
        input.extraMetadata
      ),
    ],
  }),
};

export function hasLayout(version: string): boolean {
  return Object.hasOwn(LAYOUTS, version);
}

export function layoutVersions(): string[] {
  return Object.keys(LAYOUTS);
}

/**
 * Build the workbook for `version`
 * @throws RangeError when no layout exists for the version
 */
export function encodeLayout(version: string, input: LayoutInput): Workbook {
  const encoder = Object.hasOwn(LAYOUTS, version) ? LAYOUTS[version] : undefined;
  if (!encoder) {
    throw new RangeError(`No layout for schema version ${version}`);
  }
  return encoder(input);
}
