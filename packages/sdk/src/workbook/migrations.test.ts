import { describe, it, expect } from "vitest";
import { MIGRATIONS, migrateWorkbook, migrationPath } from "./migrations.js";
import { cloneWorkbook, findSheet, type Workbook } from "./table.js";

function legacyWorkbook(): Workbook {
  return {
    sheets: [
      {
        name: "Deals",
        rows: [
          ["DealId", "AccountName", "DealName", "Stage"],
          ["D-1", "A", "B", "Lead"],
          ["D-2", "C", "D", "Lead"],
        ],
      },
    ],
  };
}

function migration(name: string) {
  const found = MIGRATIONS.find((candidate) => candidate.name === name);
  if (!found) throw new Error(`No migration named ${name}`);
  return found;
}

describe("migrationPath", () => {
  it("should chain consecutive steps", () => {
    expect(migrationPath("1.0", "1.2")?.map((step) => step.name)).toEqual([
      "stamp-version",
      "bump-metadata",
    ]);
    expect(migrationPath("1.1", "1.2")?.map((step) => step.name)).toEqual(["bump-metadata"]);
  });

  it("should be empty for the target itself", () => {
    expect(migrationPath("1.2", "1.2")).toEqual([]);
  });

  it("should be undefined when no chain exists", () => {
    expect(migrationPath("9.9", "1.2")).toBeUndefined();
    expect(migrationPath("1.2", "1.0")).toBeUndefined();
  });
});

describe("migrateWorkbook", () => {
  it("should stamp metadata on a legacy workbook", () => {
    const input = legacyWorkbook();
    const { workbook, applied } = migrateWorkbook(input, "1.0", "1.2");

    expect(applied).toEqual(["stamp-version", "bump-metadata"]);
    expect(findSheet(workbook, "Metadata")?.rows).toEqual([
      ["Property", "Value"],
      ["Version", "1.2"],
      ["DealCount", "2"],
    ]);
    expect(input.sheets).toHaveLength(1);
  });

  it("should keep metadata rows it does not manage", () => {
    const input = legacyWorkbook();
    input.sheets.push({
      name: "Metadata",
      rows: [["Property", "Value"], ["Version", "1.1"], ["Team", "North"]],
    });

    const { workbook } = migrateWorkbook(input, "1.1", "1.2");

    expect(findSheet(workbook, "Metadata")?.rows).toEqual([
      ["Property", "Value"],
      ["Version", "1.2"],
      ["Team", "North"],
      ["DealCount", "2"],
    ]);
  });

  it("should leave a current workbook alone", () => {
    const input = legacyWorkbook();
    expect(migrateWorkbook(input, "1.2", "1.2")).toEqual({ workbook: input, applied: [] });
  });

  it("should throw without a chain", () => {
    expect(() => migrateWorkbook(legacyWorkbook(), "0.9", "1.2")).toThrow(RangeError);
  });

  it.each(["stamp-version", "bump-metadata"])("%s should be idempotent", (name) => {
    const step = migration(name);
    const once = cloneWorkbook(legacyWorkbook());
    step.apply(once);
    const twice = cloneWorkbook(once);
    step.apply(twice);
    expect(twice).toEqual(once);
  });
});
