import { describe, it, expect } from "vitest";
import { formatMoney, parseBoolean, parseMoney, parseWholeNumber, splitTags } from "./values.js";
import { matchStage, parseStage, isStage } from "./stage.js";
import { LookupTables, extractArea } from "./lookups.js";
import { findField, formatField } from "./fields.js";
import { createRecord, weightedAmount } from "./record.js";

describe("value parsers", () => {
  it("should parse money with currency symbols and separators", () => {
    expect(parseMoney("£12,500.50")).toBe(12500.5);
    expect(parseMoney(" 300 ")).toBe(300);
    expect(parseMoney("-4")).toBe(-4);
    expect(parseMoney("12.")).toBeUndefined();
    expect(parseMoney("")).toBeUndefined();
    expect(parseMoney("ten")).toBeUndefined();
  });

  it("should parse amounts written in exponent form", () => {
    expect(parseMoney("5e-7")).toBe(0.0000005);
    expect(parseMoney("1E+21")).toBe(1e21);
  });

  it("should format amounts as plain decimals", () => {
    expect(formatMoney(12500.5)).toBe("12500.5");
    expect(formatMoney(0.0000005)).toBe("0.0000005");
    expect(formatMoney(-1.25e-7)).toBe("-0.000000125");
    expect(formatMoney(1e21)).toBe("1000000000000000000000");
    expect(formatMoney(1.5e22)).toBe("15000000000000000000000");
  });

  it("should parse whole numbers with an optional percent sign", () => {
    expect(parseWholeNumber("45%")).toBe(45);
    expect(parseWholeNumber(" 7 ")).toBe(7);
    expect(parseWholeNumber("7.5")).toBeUndefined();
  });

  it("should parse yes/no words", () => {
    expect(["Yes", "y", "TRUE", "1"].map(parseBoolean)).toEqual([true, true, true, true]);
    expect(["no", "N", "false", "0"].map(parseBoolean)).toEqual([false, false, false, false]);
    expect(parseBoolean("")).toBeUndefined();
  });

  it("should split tags on any separator", () => {
    expect(splitTags("a, b;c | d,,")).toEqual(["a", "b", "c", "d"]);
  });
});

describe("stages", () => {
  it("should match loosely", () => {
    expect(matchStage("closed_won")).toBe("Closed Won");
    expect(matchStage("ON-HOLD")).toBe("On Hold");
    expect(matchStage("lost")).toBe("Closed Lost");
    expect(matchStage("")).toBe("Lead");
    expect(matchStage("nonsense")).toBeUndefined();
  });

  it("should fall back to Other when reading", () => {
    expect(parseStage("nonsense")).toBe("Other");
    expect(isStage("Proposal")).toBe(true);
    expect(isStage("proposal")).toBe(false);
  });
});

describe("LookupTables", () => {
  const lookups = LookupTables.createDefault();

  it("should extract the leading letters of a postcode", () => {
    expect(extractArea("sw1a 1aa")).toBe("SW");
    expect(extractArea("M1 1AA")).toBe("M");
    expect(extractArea("123")).toBe("");
  });

  it("should map areas to regions", () => {
    expect(lookups.regionForPostcode("EH1 1AA")).toBe("Scotland");
    expect(lookups.regionForPostcode("BT1 1AA")).toBe("Northern Ireland");
    expect(lookups.regionForPostcode("ZZ1 1AA")).toBeUndefined();
    expect(lookups.regionForPostcode(undefined)).toBeUndefined();
  });

  it("should give default stage probabilities", () => {
    expect(lookups.probabilityFor("Negotiation")).toBe(80);
    expect(lookups.probabilityFor("Closed Lost")).toBe(0);
  });

  it("should layer overrides without touching the original", () => {
    const custom = lookups.withOverrides({
      areaRegions: [["sw", "Thames"]],
      stageProbabilities: { Lead: 5 },
    });
    expect(custom.regionForArea("SW")).toBe("Thames");
    expect(custom.probabilityFor("Lead")).toBe(5);
    expect(lookups.regionForArea("SW")).toBe("London");
    expect(lookups.probabilityFor("Lead")).toBe(10);
  });
});

describe("fields", () => {
  it("should resolve headers, keys and aliases", () => {
    expect(findField("AmountGBP")?.header).toBe("Amount");
    expect(findField("account_name")?.header).toBe("AccountName");
    expect(findField("nextStepDueDate")?.header).toBe("NextStepDueDate");
    expect(findField("colour")).toBeUndefined();
  });

  it("should format values as written to the file", () => {
    const record = createRecord({ amount: 1000, probability: 25, tags: ["a", "b"] });
    const format = (name: string) => {
      const spec = findField(name);
      return spec ? formatField(record, spec) : "missing";
    };
    expect(format("Amount")).toBe("1000");
    expect(format("WeightedAmount")).toBe("250");
    expect(format("Tags")).toBe("a, b");
    expect(format("CommissionPaid")).toBe("No");
    expect(format("CloseDate")).toBeNull();
  });

  it("should round weighted amounts to pence", () => {
    expect(weightedAmount(createRecord({ amount: 333.33, probability: 33 }))).toBe(110);
    expect(weightedAmount(createRecord({ probability: 50 }))).toBeUndefined();
  });
});
