import { afterEach, describe, expect, it } from "vitest";
import { parseOptionalTimestamp, parseTimestamp } from "./timestamps.js";

describe("parseTimestamp", () => {
  const originalZone = process.env["TZ"];

  afterEach(() => {
    if (originalZone === undefined) {
      delete process.env["TZ"];
    } else {
      process.env["TZ"] = originalZone;
    }
  });

  it("reads unix seconds and zoned ISO strings", () => {
    expect(parseTimestamp(1_704_067_200)).toBe(1_704_067_200);
    expect(parseTimestamp("1704067200")).toBe(1_704_067_200);
    expect(parseTimestamp("2024-01-01T00:00:00Z")).toBe(1_704_067_200);
    expect(parseTimestamp("2024-01-01T02:00:00+02:00")).toBe(1_704_067_200);
  });

  it("reads date-times without a zone as UTC whatever the host zone", () => {
    process.env["TZ"] = "America/New_York";

    expect(parseTimestamp("2024-01-01T00:00:00")).toBe(1_704_067_200);
    expect(parseTimestamp("2024-01-01 00:00")).toBe(1_704_067_200);
    expect(parseTimestamp("2024-01-01T00:00:00.500")).toBe(1_704_067_200.5);
    expect(parseTimestamp("2024-01-01")).toBe(1_704_067_200);
  });

  it("rejects blanks, negatives and garbage", () => {
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(-1)).toBeNull();
    expect(parseTimestamp("yesterday-ish")).toBeNull();
    expect(parseOptionalTimestamp("nope")).toEqual({ ok: false });
    expect(parseOptionalTimestamp(null)).toEqual({ ok: true, value: null });
  });
});
