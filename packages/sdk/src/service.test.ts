import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { makeRecord, withTempDir } from "@dealbook/testkit";
import { forTesting } from "./context.js";
import { FileRepository } from "./file-repository.js";
import { InMemoryRepository } from "./memory-repository.js";
import { RecordService } from "./service.js";

function setup() {
  const repository = new InMemoryRepository([
    makeRecord({ id: "D-1", owner: "Alice", stage: "Qualified", probability: 20 }),
  ]);
  const service = new RecordService(repository, forTesting(new Date(2025, 2, 15)));
  const save = vi.spyOn(repository, "saveChanges");
  return { repository, service, save };
}

describe("RecordService.patch", () => {
  it("should save the valid fields of a partially rejected patch", async () => {
    const { repository, service, save } = setup();

    const result = await service.patch("d-1", { Owner: "New Owner", InvalidField: "x", Probability: 150 });

    expect(result.success).toBe(false);
    expect(result.status).toBe("partial");
    expect(result.error).toBe("Partial success: 2 field(s) rejected");
    expect(result.applied.map((field) => field.field)).toEqual(["Owner"]);
    expect(result.rejected.map((field) => field.code)).toEqual(["unknown_field", "out_of_range"]);

    const stored = await repository.getById("D-1");
    expect(stored?.owner).toBe("New Owner");
    expect(stored?.probability).toBe(20);
    expect(save).toHaveBeenCalledTimes(1);
  });

  it("should save nothing when every field is rejected", async () => {
    const { repository, service, save } = setup();

    const result = await service.patch("D-1", { Probability: "lots" });

    expect(result).toMatchObject({
      success: false,
      status: "rejected",
      error: "Validation failed for 1 field(s)",
      applied: [],
    });
    expect((await repository.getById("D-1"))?.probability).toBe(20);
    expect(save).not.toHaveBeenCalled();
  });

  it("should report a missing record", async () => {
    const { service, save } = setup();
    const result = await service.patch("nope", { Owner: "x" });
    expect(result).toEqual({
      success: false,
      status: "not_found",
      applied: [],
      rejected: [],
      changes: [],
      error: "Record not found: nope",
    });
    expect(save).not.toHaveBeenCalled();
  });

  it("should treat an empty patch as a successful no-op", async () => {
    const { service, save } = setup();
    const result = await service.patch("D-1", {});
    expect(result.status).toBe("ok");
    expect(result.success).toBe(true);
    expect(save).not.toHaveBeenCalled();
  });

  it("should renormalize after a patch", async () => {
    const { service } = setup();
    const result = await service.patch("D-1", { Postcode: "M1 1AA", Stage: "Negotiation", Probability: 0 });
    expect(result.status).toBe("ok");
    expect(result.record).toMatchObject({ postcodeArea: "M", region: "North West", probability: 80 });
    expect(result.changes.map((change) => change.field)).toEqual([
      "Probability",
      "PostcodeArea",
      "Region",
      "MapLink",
    ]);
  });
});

describe("RecordService writes", () => {
  it("should normalize new records before storing", async () => {
    const { repository, service } = setup();
    const { record } = await service.create({ accountName: "Acme", dealName: "Loft insulation" });
    expect(record.id).toBe("D-20250315-00000001");
    expect(record.probability).toBe(10);
    expect((await repository.getById(record.id))?.createdDate).toBe("2025-03-15");
  });

  it("should report whether a removed record existed", async () => {
    const { repository, service, save } = setup();
    expect(await service.remove("missing")).toBe(false);
    expect(save).not.toHaveBeenCalled();
    expect(await service.remove("D-1")).toBe(true);
    expect(repository.size).toBe(0);
    expect(save).toHaveBeenCalledTimes(1);
  });

  it("should persist through a durable repository", async () => {
    await withTempDir(async (dir) => {
      const filePath = join(dir, "pipeline.xlsx");
      const context = forTesting(new Date(2025, 2, 15, 9, 0, 0));
      const service = new RecordService(new FileRepository({ filePath, context }), context);

      await service.create({ accountName: "Acme", dealName: "Solar", postcode: "EH1 1AA" });

      const stored = await new FileRepository({ filePath, context }).getById("D-20250315-00000001");
      expect(stored?.region).toBe("Scotland");
    });
  });
});
