/**
 * Store settings: defaults, validation and JSON config files
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { readBytes } from "./io.js";
import { DEFAULT_LOCK_OPTIONS } from "./lock.js";
import { CURRENT_SCHEMA_VERSION, SUPPORTED_SCHEMA_VERSIONS, hasLayout } from "./workbook/layouts.js";
import { migrationPath } from "./workbook/migrations.js";

export const DEFAULT_MAX_BACKUPS = 5;

const positiveInt = z.number().int().positive();

export const LockSettingsSchema = z
  .object({
    maxAttempts: positiveInt.default(DEFAULT_LOCK_OPTIONS.maxAttempts),
    baseDelayMs: positiveInt.default(DEFAULT_LOCK_OPTIONS.baseDelayMs),
    maxDelayMs: positiveInt.default(DEFAULT_LOCK_OPTIONS.maxDelayMs),
  })
  .strict();

export const StoreSettingsSchema = z
  .object({
    filePath: z.string().min(1).optional(),
    maxBackups: positiveInt.default(DEFAULT_MAX_BACKUPS),
    lock: LockSettingsSchema.default({}),
    supportedVersions: z
      .array(z.string().min(1))
      .min(1)
      .default([...SUPPORTED_SCHEMA_VERSIONS]),
    currentVersion: z.string().min(1).default(CURRENT_SCHEMA_VERSION),
  })
  .strict()
  .superRefine((settings, ctx) => {
    if (settings.lock.baseDelayMs > settings.lock.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lock", "baseDelayMs"],
        message: "baseDelayMs must not exceed maxDelayMs",
      });
    }
    if (!settings.supportedVersions.includes(settings.currentVersion)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["currentVersion"],
        message: `currentVersion ${settings.currentVersion} is not one of supportedVersions`,
      });
    }
    if (!hasLayout(settings.currentVersion)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["currentVersion"],
        message: `no file layout exists for schema ${settings.currentVersion}`,
      });
    }
    settings.supportedVersions.forEach((version, index) => {
      if (!migrationPath(version, settings.currentVersion)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["supportedVersions", index],
          message: `no migration path from ${version} to ${settings.currentVersion}`,
        });
      }
    });
  });

export type StoreSettingsInput = z.input<typeof StoreSettingsSchema>;
export type StoreSettings = z.output<typeof StoreSettingsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate settings and fill in defaults
 * @throws ConfigError listing every violation
 */
export function parseStoreSettings(input: unknown, source = "store options"): StoreSettings {
  const parsed = StoreSettingsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfigFile(filePath: string): Promise<StoreSettings> {
  const text = (await readBytes(filePath)).toString("utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(filePath, [`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`], {
      cause: err,
    });
  }
  return parseStoreSettings(raw, filePath);
}
