/**
 * Output rendering helpers
 */

import type { DealRecord, ValidationResult } from "@dealbook/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * One tab-separated summary line per record: id, stage, owner, amount, account
 */
export function formatRecordLine(record: DealRecord): string {
  return [
    record.id,
    record.stage,
    record.owner ?? "-",
    record.amount === undefined ? "-" : String(record.amount),
    record.accountName,
  ].join("\t");
}

/**
 * Human-readable validation report
 */
export function formatValidation(filePath: string, result: ValidationResult): string[] {
  const lines = [
    `File: ${filePath}`,
    `Valid: ${result.isValid ? "yes" : "no"}`,
    `Schema version: ${result.schemaVersion ?? "unknown"}`,
    `Records: ${result.recordCount}`,
  ];
  if (result.requiresMigration) {
    lines.push("Requires migration: yes");
  }
  if (result.unsupportedVersion) {
    lines.push("Unsupported version: yes");
  }
  for (const error of result.errors) {
    lines.push(`Error: ${error}`);
  }
  for (const warning of result.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  return lines;
}
