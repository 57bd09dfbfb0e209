import { describe, it, expect } from "vitest";
import { daysBetween, isIsoDate, parseDate, toIsoDate } from "./dates.js";

describe("parseDate", () => {
  it("should accept ISO dates", () => {
    expect(parseDate("2025-03-15")).toBe("2025-03-15");
    expect(parseDate("  2025-03-15 ")).toBe("2025-03-15");
  });

  it("should drop a time part after an ISO date", () => {
    expect(parseDate("2025-03-15T10:20:00Z")).toBe("2025-03-15");
    expect(parseDate("2025-03-15 10:20")).toBe("2025-03-15");
  });

  it("should accept day-first dates with slashes, hyphens or dots", () => {
    expect(parseDate("15/03/2025")).toBe("2025-03-15");
    expect(parseDate("5/3/2025")).toBe("2025-03-05");
    expect(parseDate("15-03-2025")).toBe("2025-03-15");
    expect(parseDate("15.03.2025")).toBe("2025-03-15");
  });

  it("should reject impossible calendar dates", () => {
    expect(parseDate("2025-02-30")).toBeUndefined();
    expect(parseDate("31/02/2025")).toBeUndefined();
    expect(parseDate("2025-13-01")).toBeUndefined();
  });

  it("should reject blanks, two-digit years and free text", () => {
    expect(parseDate("")).toBeUndefined();
    expect(parseDate("   ")).toBeUndefined();
    expect(parseDate("1/1/25")).toBeUndefined();
    expect(parseDate("next tuesday")).toBeUndefined();
  });
});

describe("date helpers", () => {
  it("should format local dates", () => {
    expect(toIsoDate(new Date(2025, 0, 5, 23, 59))).toBe("2025-01-05");
  });

  it("should validate ISO strings", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2025-02-29")).toBe(false);
    expect(isIsoDate("2025-3-1")).toBe(false);
  });

  it("should count calendar days", () => {
    expect(daysBetween("2025-03-01", "2025-03-15")).toBe(14);
    expect(daysBetween("2024-12-01", "2025-03-15")).toBe(104);
    expect(daysBetween("2025-03-15", "2025-03-01")).toBe(-14);
  });
});
