/**
 * Patch engine: applies a field-name → value map to a record through the
 * field table. Each key is accepted or rejected on its own; rejections are
 * returned as data, never thrown.
 */

import { parseDate } from "./dates.js";
import { findField, formatField, type FieldSpec } from "./model/fields.js";
import { cloneRecord, type DealRecord } from "./model/record.js";
import { matchStage } from "./model/stage.js";
import { parseBoolean, parseMoney, parseWholeNumber, splitTags } from "./model/values.js";
import type { NormalizationChange } from "./normalize.js";

export type RejectionCode =
  | "unknown_field"
  | "identifier"
  | "derived_field"
  | "invalid_value"
  | "out_of_range";

export interface AppliedField {
  /** Canonical field name */
  field: string;
  oldValue: string | null;
  newValue: string | null;
}

export interface RejectedField {
  /** Field name as supplied */
  field: string;
  value: unknown;
  reason: string;
  code: RejectionCode;
}

export type PatchStatus = "ok" | "partial" | "rejected" | "not_found";

export interface PatchResult {
  success: boolean;
  status: PatchStatus;
  record?: DealRecord;
  applied: AppliedField[];
  rejected: RejectedField[];
  /** Fixes normalization made after the requested fields were applied */
  changes: NormalizationChange[];
  error?: string;
}

export interface PatchApplication {
  record: DealRecord;
  applied: AppliedField[];
  rejected: RejectedField[];
}

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string; code: RejectionCode };

function accept<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function reject<T>(reason: string, code: RejectionCode = "invalid_value"): Parsed<T> {
  return { ok: false, reason, code };
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function parseOptionalText(value: unknown): Parsed<string | undefined> {
  if (isBlank(value)) return accept(undefined);
  const text = asText(value);
  return text === undefined ? reject("Expected a text value") : accept(text);
}

function parseRequiredText(value: unknown, header: string): Parsed<string> {
  const text = asText(value);
  if (text === undefined || text === "") return reject(`${header} cannot be empty`);
  return accept(text);
}

function parseProbability(value: unknown): Parsed<number> {
  const number =
    typeof value === "number" ? value : typeof value === "string" ? parseWholeNumber(value) : undefined;
  if (number === undefined || !Number.isInteger(number)) return reject("Invalid probability value");
  if (number < 0 || number > 100) return reject("Probability must be between 0 and 100", "out_of_range");
  return accept(number);
}

function parseMoneyValue(value: unknown, header: string): Parsed<number | undefined> {
  if (isBlank(value)) return accept(undefined);
  const number =
    typeof value === "number" && Number.isFinite(value)
      ? value
      : typeof value === "string"
        ? parseMoney(value)
        : undefined;
  if (number === undefined) return reject("Invalid amount value");
  if (number < 0) return reject(`${header} cannot be negative`, "out_of_range");
  return accept(number);
}

function parseDateValue(value: unknown): Parsed<string | undefined> {
  if (isBlank(value)) return accept(undefined);
  const date = typeof value === "string" ? parseDate(value) : undefined;
  return date === undefined ? reject("Invalid date format") : accept(date);
}

function parseBooleanValue(value: unknown): Parsed<boolean> {
  if (typeof value === "boolean") return accept(value);
  if (value === 1 || value === 0) return accept(value === 1);
  const bool = typeof value === "string" ? parseBoolean(value) : undefined;
  return bool === undefined ? reject("Invalid boolean value") : accept(bool);
}

function parseTagsValue(value: unknown): Parsed<string[]> {
  if (isBlank(value)) return accept([]);
  if (typeof value === "string") return accept(splitTags(value));
  if (Array.isArray(value)) {
    const tags: string[] = [];
    for (const item of value) {
      if (typeof item !== "string") return reject("Tags must be strings");
      tags.push(...splitTags(item));
    }
    return accept(tags);
  }
  return reject("Invalid tags value");
}

function derivedRejection(spec: FieldSpec): Pick<RejectedField, "reason" | "code"> {
  return {
    reason: `${spec.header} is a derived field and cannot be patched directly`,
    code: "derived_field",
  };
}

/**
 * Parse `value` for `spec` and write it into `record`
 * @returns the rejection, or undefined when the value was applied
 */
function assign(
  record: DealRecord,
  spec: FieldSpec,
  value: unknown
): Pick<RejectedField, "reason" | "code"> | undefined {
  switch (spec.kind) {
    case "id":
      return { reason: `${spec.header} is the key and cannot be patched`, code: "identifier" };
    case "weighted":
      return derivedRejection(spec);
    case "requiredText": {
      const parsed = parseRequiredText(value, spec.header);
      if (!parsed.ok) return parsed;
      record[spec.key] = parsed.value;
      return undefined;
    }
    case "text": {
      if (spec.derived) {
        return derivedRejection(spec);
      }
      const parsed = parseOptionalText(value);
      if (!parsed.ok) return parsed;
      record[spec.key] = parsed.value;
      return undefined;
    }
    case "stage": {
      const stage = typeof value === "string" && value.trim() ? matchStage(value) : undefined;
      if (!stage) return { reason: `Invalid stage value: ${String(value)}`, code: "invalid_value" };
      record.stage = stage;
      return undefined;
    }
    case "probability": {
      const parsed = parseProbability(value);
      if (!parsed.ok) return parsed;
      record.probability = parsed.value;
      return undefined;
    }
    case "money": {
      const parsed = parseMoneyValue(value, spec.header);
      if (!parsed.ok) return parsed;
      record[spec.key] = parsed.value;
      return undefined;
    }
    case "date": {
      const parsed = parseDateValue(value);
      if (!parsed.ok) return parsed;
      record[spec.key] = parsed.value;
      return undefined;
    }
    case "bool": {
      const parsed = parseBooleanValue(value);
      if (!parsed.ok) return parsed;
      record.commissionPaid = parsed.value;
      return undefined;
    }
    case "tags": {
      const parsed = parseTagsValue(value);
      if (!parsed.ok) return parsed;
      record.tags = parsed.value;
      return undefined;
    }
  }
}

/**
 * Apply a patch to a copy of `record`. Field names match case-insensitively,
 * ignoring spaces and underscores. Normalization is left to the caller.
 */
export function applyPatch(
  record: DealRecord,
  patch: Readonly<Record<string, unknown>>
): PatchApplication {
  const updated = cloneRecord(record);
  const applied: AppliedField[] = [];
  const rejected: RejectedField[] = [];

  for (const [name, value] of Object.entries(patch)) {
    const spec = findField(name);
    if (!spec) {
      rejected.push({ field: name, value, reason: `Unknown field: ${name}`, code: "unknown_field" });
      continue;
    }

    const oldValue = formatField(updated, spec);
    const failure = assign(updated, spec, value);
    if (failure) {
      rejected.push({ field: name, value, reason: failure.reason, code: failure.code });
      continue;
    }
    applied.push({ field: spec.header, oldValue, newValue: formatField(updated, spec) });
  }

  return { record: updated, applied, rejected };
}
