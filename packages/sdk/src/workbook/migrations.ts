/**
 * Schema migrations: named transitions between consecutive versions.
 *
 * Each step is additive and idempotent. It stamps or bumps metadata and
 * never removes sheets, columns or metadata rows it does not recognise.
 */

import { METADATA_HEADER, setMetadataValue } from "./layouts.js";
import {
  DEALS_SHEET,
  METADATA_SHEET,
  cloneWorkbook,
  dataRows,
  ensureSheet,
  findSheet,
  type Workbook,
} from "./table.js";

export interface Migration {
  from: string;
  to: string;
  name: string;
  apply(workbook: Workbook): void;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    from: "1.0",
    to: "1.1",
    name: "stamp-version",
    apply(workbook) {
      const metadata = ensureSheet(workbook, METADATA_SHEET, [...METADATA_HEADER]);
      setMetadataValue(metadata, "Version", "1.1");
    },
  },
  {
    from: "1.1",
    to: "1.2",
    name: "bump-metadata",
    apply(workbook) {
      const metadata = ensureSheet(workbook, METADATA_SHEET, [...METADATA_HEADER]);
      setMetadataValue(metadata, "Version", "1.2");
      const deals = findSheet(workbook, DEALS_SHEET);
      setMetadataValue(metadata, "DealCount", String(deals ? dataRows(deals).length : 0));
    },
  },
];

/**
 * Chain of migrations leading from `from` to `to`
 * @returns undefined when no chain exists
 */
export function migrationPath(from: string, to: string): Migration[] | undefined {
  const path: Migration[] = [];
  let version = from;
  while (version !== to) {
    const step = MIGRATIONS.find((migration) => migration.from === version);
    if (!step || path.includes(step)) return undefined;
    path.push(step);
    version = step.to;
  }
  return path;
}

export interface MigrationOutcome {
  workbook: Workbook;
  applied: string[];
}

/**
 * Migrate a copy of `workbook` from `from` to `to`; the input is not mutated
 * @throws RangeError when no chain exists
 */
export function migrateWorkbook(workbook: Workbook, from: string, to: string): MigrationOutcome {
  const path = migrationPath(from, to);
  if (!path) {
    throw new RangeError(`No migration path from schema ${from} to ${to}`);
  }
  const migrated = cloneWorkbook(workbook);
  for (const step of path) {
    step.apply(migrated);
  }
  return { workbook: migrated, applied: path.map((step) => step.name) };
}
