/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isIsoDate } from "@dealbook/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse a yyyy-MM-dd calendar date argument
 */
export function parseIsoDateArg(value: string, name: string): string {
  const trimmed = value.trim();
  if (!isIsoDate(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a date in yyyy-MM-dd form`);
  }
  return trimmed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Narrow parsed JSON to a plain object
 */
export function expectObject(value: unknown, what: string): Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new InvalidArgumentError(`${what} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}
