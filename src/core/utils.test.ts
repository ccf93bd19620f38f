import { describe, expect, it } from "vitest";
import {
  expandTwoDigitYear,
  isValidCalendarDate,
  makeUniqueName,
  splitExtension,
  toYYYYMMDD,
  trimSeparators,
} from "./utils.js";

describe("isValidCalendarDate", () => {
  it("knows month lengths", () => {
    expect(isValidCalendarDate(2024, 4, 30)).toBe(true);
    expect(isValidCalendarDate(2024, 4, 31)).toBe(false);
    expect(isValidCalendarDate(2024, 12, 31)).toBe(true);
  });

  it("applies the Gregorian leap year rule", () => {
    expect(isValidCalendarDate(2024, 2, 29)).toBe(true);
    expect(isValidCalendarDate(2023, 2, 29)).toBe(false);
    expect(isValidCalendarDate(1900, 2, 29)).toBe(false);
    expect(isValidCalendarDate(2000, 2, 29)).toBe(true);
  });

  it("rejects out-of-range parts", () => {
    expect(isValidCalendarDate(2024, 0, 1)).toBe(false);
    expect(isValidCalendarDate(2024, 13, 1)).toBe(false);
    expect(isValidCalendarDate(2024, 1, 0)).toBe(false);
    expect(isValidCalendarDate(0, 1, 1)).toBe(false);
  });
});

describe("expandTwoDigitYear", () => {
  it("splits the century at the pivot", () => {
    expect(expandTwoDigitYear(0, 80)).toBe(2000);
    expect(expandTwoDigitYear(79, 80)).toBe(2079);
    expect(expandTwoDigitYear(80, 80)).toBe(1980);
    expect(expandTwoDigitYear(99, 80)).toBe(1999);
  });
});

describe("toYYYYMMDD", () => {
  it("zero-pads each part", () => {
    expect(toYYYYMMDD(2021, 3, 8)).toBe("20210308");
    expect(toYYYYMMDD(987, 1, 1)).toBe("09870101");
  });
});

describe("trimSeparators", () => {
  it("strips underscores, hyphens and spaces from both ends", () => {
    expect(trimSeparators("_- report -_")).toBe("report");
    expect(trimSeparators("a_b")).toBe("a_b");
    expect(trimSeparators("__")).toBe("");
  });
});

describe("splitExtension", () => {
  it("splits at the last dot", () => {
    expect(splitExtension("archive.tar.gz")).toEqual({ stem: "archive.tar", ext: ".gz" });
    expect(splitExtension("README")).toEqual({ stem: "README", ext: "" });
    expect(splitExtension(".env")).toEqual({ stem: ".env", ext: "" });
  });
});

describe("makeUniqueName", () => {
  it("returns the name when it is free", () => {
    expect(makeUniqueName("20240312_invoice.pdf", () => false)).toBe(
      "20240312_invoice.pdf",
    );
  });

  it("counts up from (2)", () => {
    const taken = new Set(["a.txt", "a (2).txt"]);
    expect(makeUniqueName("a.txt", (n) => taken.has(n))).toBe("a (3).txt");
  });

  it("suffixes names without an extension", () => {
    expect(makeUniqueName("notes", (n) => n === "notes")).toBe("notes (2)");
  });
});
