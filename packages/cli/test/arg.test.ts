/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { parseNonNegativeInt, parseJson, parseIsoDateArg, expectObject } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid positive integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 25 ", "test")).toBe(25);
      expect(parseNonNegativeInt("9999", "test")).toBe(9999);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(
        "--limit must be a non-negative integer"
      );
    });

    it("should reject fractions and words", () => {
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow("must be a non-negative integer");
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
    });

    it("should cap at 10000", () => {
      expect(parseNonNegativeInt("10000", "test")).toBe(10000);
      expect(() => parseNonNegativeInt("10001", "--limit")).toThrow("--limit must be <= 10000");
    });
  });

  describe("parseIsoDateArg", () => {
    it("should accept calendar dates", () => {
      expect(parseIsoDateArg("2025-03-15", "--as-of")).toBe("2025-03-15");
      expect(parseIsoDateArg(" 2024-02-29 ", "--as-of")).toBe("2024-02-29");
    });

    it("should reject other forms and impossible dates", () => {
      expect(() => parseIsoDateArg("15/03/2025", "--as-of")).toThrow(
        "--as-of must be a date in yyyy-MM-dd form"
      );
      expect(() => parseIsoDateArg("2025-02-30", "--as-of")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2,3]", "test")).toEqual([1, 2, 3]);
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should name the source in errors", () => {
      expect(() => parseJson("{", "stdin")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "stdin")).toThrow("Invalid JSON in stdin");
      expect(() => parseJson("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });

  describe("expectObject", () => {
    it("should return plain objects", () => {
      expect(expectObject({ Stage: "Won" }, "Patch")).toEqual({ Stage: "Won" });
    });

    it("should reject arrays, null and scalars", () => {
      expect(() => expectObject([], "Patch")).toThrow("Patch must be a JSON object");
      expect(() => expectObject(null, "Patch")).toThrow("Patch must be a JSON object");
      expect(() => expectObject("Won", "Record")).toThrow("Record must be a JSON object");
    });
  });
});
