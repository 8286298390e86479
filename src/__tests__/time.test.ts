import { describe, expect, it } from "vitest";
import { getISODate, toTimezoneTime } from "../utils/time";

describe("toTimezoneTime", () => {
  it("shifts into a positive offset zone", () => {
    expect(toTimezoneTime("2024-01-01T20:00:00Z", "Asia/Shanghai")).toBe("2024-01-02T04:00:00+08:00");
  });

  it("shifts into a negative offset zone", () => {
    expect(toTimezoneTime("2024-01-01T20:00:00Z", "America/New_York")).toBe("2024-01-01T15:00:00-05:00");
  });

  it("writes UTC with an explicit zero offset", () => {
    expect(toTimezoneTime(new Date("2024-01-01T20:00:00Z"), "UTC")).toBe("2024-01-01T20:00:00+00:00");
  });

  it("round-trips to the same instant", () => {
    const shifted = toTimezoneTime("2024-06-30T23:59:59Z", "Asia/Kolkata");
    expect(shifted).toBe("2024-07-01T05:29:59+05:30");
    expect(new Date(shifted).toISOString()).toBe("2024-06-30T23:59:59.000Z");
  });

  it("rejects unparseable timestamps", () => {
    expect(() => toTimezoneTime("not a date", "UTC")).toThrow(RangeError);
  });
});

describe("getISODate", () => {
  it("uses the calendar date of the zone", () => {
    const instant = new Date("2024-01-01T20:00:00Z");
    expect(getISODate(instant, "Asia/Shanghai")).toBe("2024-01-02");
    expect(getISODate(instant, "UTC")).toBe("2024-01-01");
  });
});
