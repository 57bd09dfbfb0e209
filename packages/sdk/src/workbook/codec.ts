/**
 * Reads and writes the `.xlsx` container with SheetJS. Every cell is
 * written as text; reads format any typed cell back to text.
 */

import * as XLSX from "xlsx";
import type { Row, Workbook } from "./table.js";

export class WorkbookFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WorkbookFormatError";
  }
}

/**
 * Serialize to `.xlsx` bytes
 */
export function encodeWorkbook(workbook: Workbook): Buffer {
  const book = XLSX.utils.book_new();
  for (const sheet of workbook.sheets) {
    // Blank cells are left out of the sheet rather than stored as empty strings
    const rows = sheet.rows.map((row) => row.map((cell) => (cell === "" ? null : cell)));
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), sheet.name);
  }

  const out: unknown = XLSX.write(book, { type: "buffer", bookType: "xlsx", compression: true });
  if (!Buffer.isBuffer(out)) {
    throw new WorkbookFormatError("Workbook writer did not produce a buffer");
  }
  return out;
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return "";
  if (typeof cell === "string") return cell.trim();
  if (typeof cell === "number" || typeof cell === "boolean") return String(cell);
  return "";
}

/**
 * Parse `.xlsx` bytes into text rows
 * @throws WorkbookFormatError when the bytes are not a readable workbook
 */
export function decodeWorkbook(bytes: Buffer): Workbook {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(bytes, { type: "buffer" });
  } catch (err) {
    throw new WorkbookFormatError("Not a readable workbook", { cause: err });
  }

  if (book.SheetNames.length === 0) {
    throw new WorkbookFormatError("Workbook contains no sheets");
  }

  const sheets = book.SheetNames.map((name) => {
    const worksheet = book.Sheets[name];
    if (!worksheet) {
      return { name, rows: [] };
    }
    const raw = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      raw: false,
      defval: "",
      blankrows: false,
      dateNF: "yyyy-mm-dd",
    });
    const rows: Row[] = raw.map((row) => row.map(cellText));
    return { name, rows };
  });

  return { sheets };
}
