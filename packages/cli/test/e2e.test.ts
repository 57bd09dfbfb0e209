/**
 * End-to-end CLI workflows: migration on write, backup recovery and restore
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@dealbook/testkit";
import { runCli, lines } from "./harness.js";

const DEAL = JSON.stringify({
  DealId: "D-1",
  AccountName: "Acme Ltd",
  DealName: "Solar roof",
  Stage: "Discovery",
  CreatedDate: "2025-03-01",
});

describe("CLI workflows", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await createTempDir("dealbook-e2e-");
    file = join(dir, "pipeline.xlsx");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function schemaOf(path: string): Promise<unknown> {
    const result = await runCli(["--file", path, "validate", "--json"]);
    const parsed: unknown = JSON.parse(result.stdout);
    return parsed;
  }

  it("should upgrade a legacy workbook on the first write and keep the original as a backup", async () => {
    const legacy = join(dir, "legacy.xlsx");
    expect((await runCli(["--file", file, "put", "--data", DEAL])).exitCode).toBe(0);
    expect((await runCli(["--file", file, "export", legacy, "--schema", "1.0"])).exitCode).toBe(0);

    // Reads migrate in memory only
    const listed = await runCli(["--file", legacy, "ls"]);
    expect(lines(listed.stdout)).toEqual(["D-1"]);
    expect(listed.stderr).toContain("[store.migrate]");
    expect(await schemaOf(legacy)).toMatchObject({ schemaVersion: "1.0", requiresMigration: true });

    const patched = await runCli(["--file", legacy, "patch", "D-1", "--data", '{"Owner":"Alex"}']);
    expect(patched.exitCode).toBe(0);
    expect(await schemaOf(legacy)).toMatchObject({
      schemaVersion: "1.2",
      requiresMigration: false,
      recordCount: 1,
    });

    const backups = await runCli(["--file", legacy, "backups", "list"]);
    expect(lines(backups.stdout)).toHaveLength(1);

    expect((await runCli(["--file", legacy, "backups", "restore", "--force"])).exitCode).toBe(0);
    expect(await schemaOf(legacy)).toMatchObject({ schemaVersion: "1.0" });

    const got = await runCli(["--file", legacy, "get", "D-1", "--raw"]);
    expect(JSON.parse(got.stdout)).toMatchObject({ id: "D-1", stage: "Discovery", probability: 40 });
    expect(JSON.parse(got.stdout)).not.toHaveProperty("owner");
  });

  it("should recover a damaged workbook from the newest backup", async () => {
    await runCli(["--file", file, "init"]);
    await runCli(["--file", file, "put", "--data", DEAL]);
    await runCli([
      "--file",
      file,
      "put",
      "--data",
      JSON.stringify({ DealId: "D-2", AccountName: "Bright Homes", DealName: "Heat pump" }),
    ]);

    await writeFile(file, "not a workbook");

    const listed = await runCli(["--file", file, "ls"]);

    expect(listed.exitCode).toBe(0);
    expect(lines(listed.stdout)).toEqual(["D-1"]);
    expect(listed.stderr).toContain("validation failed, trying latest backup");
  });

  it("should exit 4 for a damaged workbook without backups", async () => {
    await writeFile(file, "not a workbook");

    const result = await runCli(["--file", file, "ls"]);

    expect(result.exitCode).toBe(4);
    expect(result.stderr).toContain(`Error: Integrity check failed for ${file}:`);
  });
});
