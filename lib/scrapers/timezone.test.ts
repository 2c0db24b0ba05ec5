import { describe, it, expect } from "vitest";
import { dateFromZonedParts, dateKeyInTimeZone, partsInTimeZone, startOfDayInTimeZone } from "./timezone";

const BERLIN = "Europe/Berlin";

describe("dateFromZonedParts", () => {
  it("applies winter and summer offsets", () => {
    expect(dateFromZonedParts({ year: 2026, month: 3, day: 15, hour: 19, minute: 30 }, BERLIN).toISOString()).toBe(
      "2026-03-15T18:30:00.000Z"
    );
    expect(dateFromZonedParts({ year: 2026, month: 4, day: 25, hour: 18 }, BERLIN).toISOString()).toBe(
      "2026-04-25T16:00:00.000Z"
    );
  });

  it("handles the day after the spring change", () => {
    expect(dateFromZonedParts({ year: 2026, month: 3, day: 30 }, BERLIN).toISOString()).toBe(
      "2026-03-29T22:00:00.000Z"
    );
  });
});

describe("partsInTimeZone", () => {
  it("reads the wall clock in the zone", () => {
    expect(partsInTimeZone(new Date("2026-03-14T23:30:00Z"), BERLIN)).toEqual({
      year: 2026,
      month: 3,
      day: 15,
      hour: 0,
      minute: 30,
      second: 0,
    });
  });
});

describe("day helpers", () => {
  it("finds local midnight and the local calendar day", () => {
    const instant = new Date("2026-03-01T12:00:00Z");
    expect(startOfDayInTimeZone(instant, BERLIN).toISOString()).toBe("2026-02-28T23:00:00.000Z");
    expect(dateKeyInTimeZone(new Date("2026-03-14T23:30:00Z"), BERLIN)).toBe("2026-03-15");
    expect(dateKeyInTimeZone(new Date("2026-03-14T23:30:00Z"), "UTC")).toBe("2026-03-14");
  });
});
