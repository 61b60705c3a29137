import { describe, it, expect } from "vitest";
import { ParseError, isParseError } from "../src/errors.js";
import { parseCidr, parseInstant, parseJsonText, parseSnapshotArray, parseTimestamp } from "../src/validate.js";

describe("field coercion", () => {
  it("reads prefix lengths from numbers and strings", () => {
    expect(parseCidr(24)).toBe(24);
    expect(parseCidr("23")).toBe(23);
    expect(parseCidr(" /22 ")).toBe(22);
    expect(parseCidr(0)).toBe(0);
  });

  it("rejects what is not an integer prefix length", () => {
    expect(parseCidr(null)).toBeNull();
    expect(parseCidr(undefined)).toBeNull();
    expect(parseCidr("abc")).toBeNull();
    expect(parseCidr(23.5)).toBeNull();
    expect(parseCidr(-1)).toBeNull();
    expect(parseCidr(true)).toBeNull();
  });

  it("keeps timestamp strings verbatim after trimming", () => {
    expect(parseTimestamp(" 2024-01-01T00:00:00Z ")).toBe("2024-01-01T00:00:00Z");
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(1704067200000)).toBeNull();
  });
});

describe("payload parsing", () => {
  it("requires a top-level array", () => {
    expect(parseSnapshotArray([1, 2])).toEqual([1, 2]);
    expect(() => parseSnapshotArray({ records: [] })).toThrow(ParseError);
  });

  it("wraps JSON syntax errors", () => {
    let caught: unknown = null;
    try {
      parseJsonText("[{");
    } catch (e) {
      caught = e;
    }
    expect(isParseError(caught)).toBe(true);
    if (isParseError(caught)) expect(caught.source).toBe("SNAPSHOT");
  });

  it("parses instants and rejects garbage", () => {
    expect(parseInstant("2024-01-01T00:00:00Z")).toBe(Date.UTC(2024, 0, 1));
    expect(parseInstant(new Date(Date.UTC(2024, 0, 2)))).toBe(Date.UTC(2024, 0, 2));
    expect(() => parseInstant("yesterday-ish")).toThrow(ParseError);
    expect(() => parseInstant(new Date(Number.NaN))).toThrow(ParseError);
  });
});
