/**
 * Deals sheet ↔ records. Reading is lenient: hand-edited values that do not
 * parse fall back to blanks or defaults, and normalization repairs the rest.
 */

import { parseDate } from "../dates.js";
import { FIELDS, findField, formatField, type FieldSpec } from "../model/fields.js";
import { createRecord, type DealRecord } from "../model/record.js";
import { parseStage } from "../model/stage.js";
import {
  optionalText,
  parseBoolean,
  parseMoney,
  parseWholeNumber,
  splitTags,
} from "../model/values.js";
import { headerRow, dataRows, type Row, type Sheet } from "./table.js";

function decodeCell(record: DealRecord, spec: FieldSpec, text: string): void {
  switch (spec.kind) {
    case "id":
      record.id = text.trim();
      return;
    case "requiredText":
      record[spec.key] = optionalText(text) ?? spec.fallback;
      return;
    case "text":
      record[spec.key] = optionalText(text);
      return;
    case "stage":
      record.stage = parseStage(text);
      return;
    case "probability": {
      const value = parseWholeNumber(text) ?? 0;
      record.probability = Math.min(100, Math.max(0, value));
      return;
    }
    case "money":
      record[spec.key] = parseMoney(text);
      return;
    case "date":
      record[spec.key] = parseDate(text);
      return;
    case "bool":
      record.commissionPaid = parseBoolean(text) ?? false;
      return;
    case "tags":
      record.tags = splitTags(text);
      return;
    case "weighted":
      // Informational column; always recomputed
      return;
  }
}

/**
 * Read every data row of a Deals sheet. Columns with unrecognised headers
 * are kept per record under `extra`.
 */
export function decodeRecords(sheet: Sheet): DealRecord[] {
  const headers = headerRow(sheet);
  const columns = headers.map((header) => (header.trim() ? findField(header) : undefined));

  return dataRows(sheet).map((row) => {
    const record = createRecord();
    // Required text fields take their fallback when the column is absent
    for (const spec of FIELDS) {
      if (spec.kind === "requiredText") {
        record[spec.key] = spec.fallback;
      }
    }

    const seen = new Set<FieldSpec>();
    headers.forEach((header, column) => {
      const text = row[column] ?? "";
      const spec = columns[column];
      if (spec) {
        if (seen.has(spec)) return;
        seen.add(spec);
        decodeCell(record, spec, text);
      } else if (header.trim() && text.trim()) {
        record.extra = { ...record.extra, [header.trim()]: text.trim() };
      }
    });

    return record;
  });
}

/**
 * Unrecognised column headers of a Deals sheet, in column order, blank or not
 */
export function unknownHeaders(sheet: Sheet): string[] {
  const headers = new Set<string>();
  for (const header of headerRow(sheet)) {
    const name = header.trim();
    if (name && !findField(name)) headers.add(name);
  }
  return [...headers];
}

/**
 * Headers of the unrecognised columns carried by `records`, in first-seen order
 */
export function extraHeaders(records: readonly DealRecord[]): string[] {
  const headers = new Set<string>();
  for (const record of records) {
    for (const header of Object.keys(record.extra ?? {})) {
      headers.add(header);
    }
  }
  return [...headers];
}

/**
 * Deals sheet rows: header row, then one row per record.
 * `extraColumns` are written even when no record has a value for them.
 */
export function encodeRecords(
  records: readonly DealRecord[],
  fields: readonly FieldSpec[] = FIELDS,
  extraColumns: readonly string[] = []
): Row[] {
  const extras = [...new Set([...extraColumns, ...extraHeaders(records)])];
  const header = [...fields.map((spec) => spec.header), ...extras];
  const rows = records.map((record) => [
    ...fields.map((spec) => formatField(record, spec) ?? ""),
    ...extras.map((name) => record.extra?.[name] ?? ""),
  ]);
  return [header, ...rows];
}
