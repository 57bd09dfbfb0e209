import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@dealbook/testkit";
import { BackupManager } from "./backups.js";
import { FixedClock } from "./context.js";

describe("BackupManager", () => {
  let testDir: string;
  let filePath: string;
  let clock: FixedClock;

  beforeEach(async () => {
    testDir = await createTempDir();
    filePath = join(testDir, "pipeline.xlsx");
    clock = FixedClock.at(2025, 3, 15, 9, 0, 0);
    await writeFile(filePath, "v1");
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it("should stamp names from the clock", () => {
    const backups = new BackupManager(filePath, clock, 5);
    expect(backups.pathFor(FixedClock.at(2025, 3, 15, 9, 0, 5).now())).toBe(
      join(testDir, "pipeline_20250315_090005_000.xlsx.bak")
    );
  });

  it("should copy the current file", async () => {
    const backups = new BackupManager(filePath, clock, 5);
    const path = await backups.create();
    expect(await readFile(path, "utf-8")).toBe("v1");
  });

  it("should list newest first and ignore unrelated files", async () => {
    const backups = new BackupManager(filePath, clock, 5);
    await backups.create();
    clock.advance(1000);
    await backups.create();
    await writeFile(join(testDir, "other_20250315_090000_000.xlsx.bak"), "");
    await writeFile(join(testDir, "pipeline_latest.xlsx.bak"), "");

    expect((await backups.list()).map((backup) => backup.name)).toEqual([
      "pipeline_20250315_090001_000.xlsx.bak",
      "pipeline_20250315_090000_000.xlsx.bak",
    ]);
    expect((await backups.latest())?.timestamp).toBe("20250315_090001_000");
  });

  it("should prune the oldest beyond retention", async () => {
    const backups = new BackupManager(filePath, clock, 2);
    for (let i = 0; i < 3; i++) {
      await backups.create();
      clock.advance(1000);
    }

    expect(await backups.prune()).toEqual([join(testDir, "pipeline_20250315_090000_000.xlsx.bak")]);
    expect((await backups.list()).map((backup) => backup.timestamp)).toEqual([
      "20250315_090002_000",
      "20250315_090001_000",
    ]);
  });

  it("should keep every backup made within the same millisecond", async () => {
    const backups = new BackupManager(filePath, clock, 2);
    await backups.create();
    await writeFile(filePath, "v2");
    await backups.create();
    await writeFile(filePath, "v3");
    const newest = await backups.create();

    expect((await backups.list()).map((backup) => backup.name)).toEqual([
      "pipeline_20250315_090000_000_2.xlsx.bak",
      "pipeline_20250315_090000_000_1.xlsx.bak",
      "pipeline_20250315_090000_000.xlsx.bak",
    ]);
    expect(await readFile(newest, "utf-8")).toBe("v3");
    expect((await backups.latest())?.sequence).toBe(2);
    expect(await backups.prune()).toEqual([join(testDir, "pipeline_20250315_090000_000.xlsx.bak")]);
  });

  it("should have nothing to list before the first backup", async () => {
    const backups = new BackupManager(filePath, clock, 2);
    expect(await backups.list()).toEqual([]);
    expect(await backups.latest()).toBeUndefined();
  });
});
