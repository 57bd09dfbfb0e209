/**
 * Plain in-memory form of a workbook: named sheets of text rows, first row
 * the header. The layout, validation and migration code works on this form
 * only; `codec.ts` is the one place that knows the file format.
 */

export type Row = string[];

export interface Sheet {
  name: string;
  rows: Row[];
}

export interface Workbook {
  sheets: Sheet[];
}

export const DEALS_SHEET = "Deals";
export const LOOKUPS_SHEET = "Lookups";
export const METADATA_SHEET = "Metadata";

/**
 * Comparison form of a sheet name or header: lowercase, no spaces or underscores
 */
export function nameKey(name: string): string {
  return name.replace(/[\s_]/g, "").toLowerCase();
}

export function findSheet(workbook: Workbook, name: string): Sheet | undefined {
  const key = nameKey(name);
  return workbook.sheets.find((sheet) => nameKey(sheet.name) === key);
}

/**
 * Return the named sheet, appending an empty one if absent
 */
export function ensureSheet(workbook: Workbook, name: string, header: Row): Sheet {
  const existing = findSheet(workbook, name);
  if (existing) return existing;
  const sheet: Sheet = { name, rows: [header] };
  workbook.sheets.push(sheet);
  return sheet;
}

export function headerRow(sheet: Sheet): Row {
  return sheet.rows[0] ?? [];
}

/**
 * Data rows: everything after the header that has at least one non-blank cell
 */
export function dataRows(sheet: Sheet): Row[] {
  return sheet.rows.slice(1).filter((row) => row.some((cell) => cell.trim() !== ""));
}

/**
 * Column index by header comparison key; the first occurrence of a header wins
 */
export function columnIndex(sheet: Sheet): Map<string, number> {
  const index = new Map<string, number>();
  headerRow(sheet).forEach((header, column) => {
    const key = nameKey(header);
    if (key && !index.has(key)) {
      index.set(key, column);
    }
  });
  return index;
}

export function cloneWorkbook(workbook: Workbook): Workbook {
  return {
    sheets: workbook.sheets.map((sheet) => ({
      name: sheet.name,
      rows: sheet.rows.map((row) => [...row]),
    })),
  };
}
