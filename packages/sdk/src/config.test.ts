import { describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { withTempDir } from "@dealbook/testkit";
import { loadConfigFile, parseStoreSettings } from "./config.js";
import { ConfigError } from "./errors.js";

function issuesOf(input: unknown): readonly string[] {
  try {
    parseStoreSettings(input);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe("parseStoreSettings", () => {
  it("should fill in defaults", () => {
    expect(parseStoreSettings({})).toEqual({
      maxBackups: 5,
      lock: { maxAttempts: 10, baseDelayMs: 50, maxDelayMs: 2000 },
      supportedVersions: ["1.0", "1.1", "1.2"],
      currentVersion: "1.2",
    });
    expect(parseStoreSettings(undefined).maxBackups).toBe(5);
  });

  it("should keep explicit values", () => {
    const settings = parseStoreSettings({ filePath: "/data/p.xlsx", maxBackups: 2, lock: { maxAttempts: 3 } });
    expect(settings.filePath).toBe("/data/p.xlsx");
    expect(settings.maxBackups).toBe(2);
    expect(settings.lock).toEqual({ maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 2000 });
  });

  it("should reject non-positive retention", () => {
    expect(issuesOf({ maxBackups: 0 })).toEqual(["maxBackups: Number must be greater than 0"]);
  });

  it("should reject unknown keys", () => {
    expect(issuesOf({ colour: "blue" })).toEqual(["Unrecognized key(s) in object: 'colour'"]);
  });

  it("should check the lock backoff bounds", () => {
    expect(issuesOf({ lock: { baseDelayMs: 500, maxDelayMs: 100 } })).toEqual([
      "lock.baseDelayMs: baseDelayMs must not exceed maxDelayMs",
    ]);
  });

  it("should require a migration path from every supported version", () => {
    expect(issuesOf({ supportedVersions: ["1.2", "0.9"] })).toEqual([
      "supportedVersions.1: no migration path from 0.9 to 1.2",
    ]);
  });

  it("should require a layout for the current version", () => {
    expect(issuesOf({ supportedVersions: ["2.0"], currentVersion: "2.0" })).toEqual([
      "currentVersion: no file layout exists for schema 2.0",
    ]);
  });

  it("should require the current version to be supported", () => {
    expect(issuesOf({ supportedVersions: ["1.0", "1.1"] })).toEqual([
      "currentVersion: currentVersion 1.2 is not one of supportedVersions",
    ]);
  });
});

describe("loadConfigFile", () => {
  it("should read settings from JSON", async () => {
    await withTempDir(async (dir) => {
      const filePath = join(dir, "dealbook.json");
      await writeFile(filePath, JSON.stringify({ maxBackups: 2 }));
      expect((await loadConfigFile(filePath)).maxBackups).toBe(2);
    });
  });

  it("should name the file in errors", async () => {
    await withTempDir(async (dir) => {
      const filePath = join(dir, "dealbook.json");
      await writeFile(filePath, "{ not json");
      await expect(loadConfigFile(filePath)).rejects.toThrow(`Invalid configuration in ${filePath}`);

      await writeFile(filePath, JSON.stringify({ maxBackups: -1 }));
      await expect(loadConfigFile(filePath)).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
