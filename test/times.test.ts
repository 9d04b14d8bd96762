import { describe, expect, it } from "vitest";
import {
  parseWallTime,
  resolveMeetingWindow,
  toGraphUtc,
  validateMeetingTime,
  wallTimeToDate,
} from "../src/meetings/times.js";

const NINE = { hour: 9, minute: 0 };
const HALF_FIVE = { hour: 17, minute: 30 };

describe("parseWallTime", () => {
  it("reads naive date-times", () => {
    expect(parseWallTime("2026-05-04 10:15", "UTC")).toEqual({
      year: 2026,
      month: 5,
      day: 4,
      hour: 10,
      minute: 15,
      second: 0,
    });
  });

  it("rejects impossible dates", () => {
    expect(parseWallTime("2026-02-30", "UTC")).toBeNull();
    expect(parseWallTime("next tuesday", "UTC")).toBeNull();
  });

  it("converts zoned values into the local zone", () => {
    expect(parseWallTime("2026-05-04T08:00:00Z", "Europe/Berlin")).toMatchObject({ hour: 10, minute: 0 });
  });
});

describe("wallTimeToDate", () => {
  it("applies the zone offset", () => {
    const wall = parseWallTime("2026-05-04 10:00", "Europe/Berlin");
    expect(wall).not.toBeNull();
    if (wall) {
      expect(toGraphUtc(wallTimeToDate(wall, "Europe/Berlin"))).toBe("2026-05-04T08:00:00Z");
    }
  });
});

describe("resolveMeetingWindow", () => {
  const now = new Date("2026-05-01T12:00:00Z");

  it("gives date-only values the default times of day", () => {
    const window = resolveMeetingWindow({
      start: "2026-05-04",
      end: "2026-05-04",
      defaultStartTime: NINE,
      defaultEndTime: HALF_FIVE,
      timeZone: "UTC",
      now,
    });

    expect(toGraphUtc(window.start)).toBe("2026-05-04T09:00:00Z");
    expect(toGraphUtc(window.end)).toBe("2026-05-04T17:30:00Z");
  });

  it("falls back to now and one hour", () => {
    const window = resolveMeetingWindow({
      defaultStartTime: NINE,
      defaultEndTime: NINE,
      timeZone: "UTC",
      now,
    });

    expect(toGraphUtc(window.start)).toBe("2026-05-01T12:00:00Z");
    expect(toGraphUtc(window.end)).toBe("2026-05-01T13:00:00Z");
  });

  it("pushes an end that is not after the start to one hour later", () => {
    const window = resolveMeetingWindow({
      start: "2026-05-04",
      end: "2026-05-04",
      defaultStartTime: NINE,
      defaultEndTime: NINE,
      timeZone: "UTC",
      now,
    });

    expect(toGraphUtc(window.end)).toBe("2026-05-04T10:00:00Z");
  });
});

describe("validateMeetingTime", () => {
  const now = new Date("2026-05-01T00:00:00Z");

  it("accepts a sensible window", () => {
    expect(validateMeetingTime("2026-05-04 10:00", "2026-05-04 11:30", "UTC", now)).toEqual({
      valid: true,
      errors: [],
      durationHours: 1.5,
    });
  });

  it("flags meetings shorter than fifteen minutes", () => {
    expect(validateMeetingTime("2026-05-04 10:00", "2026-05-04 10:10", "UTC", now)).toEqual({
      valid: false,
      errors: ["Meeting duration should be at least 15 minutes."],
      durationHours: 0.17,
    });
  });

  it("flags an end before the start", () => {
    const result = validateMeetingTime("2026-05-04 10:00", "2026-05-04 09:00", "UTC", now);
    expect(result.errors).toEqual([
      "End time must be after start time.",
      "Meeting duration should be at least 15 minutes.",
    ]);
    expect(result.durationHours).toBe(-1);
  });

  it("flags meetings over a day and in the past", () => {
    const result = validateMeetingTime("2026-04-01 10:00", "2026-04-02 11:00", "UTC", now);
    expect(result.errors).toEqual([
      "Meeting duration cannot exceed 24 hours.",
      "Meeting cannot be scheduled in the past.",
    ]);
  });

  it("reports unparsable input", () => {
    expect(validateMeetingTime("soon", "2026-05-04 10:00", "UTC", now)).toEqual({
      valid: false,
      errors: ["Invalid date/time format: soon"],
    });
  });
});
