import type { TimeOfDay } from "../records/kinds.js";

const HOUR_MS = 60 * 60 * 1000;

export interface WallTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const NAIVE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const ZONED_PATTERN = /[zZ]$|[+-]\d\d:?\d\d$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function zonedParts(date: Date, timeZone: string): WallTime {
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
  const lookup: Record<string, number> = {};
  for (const part of fmt.formatToParts(date)) {
    if (part.type !== "literal") lookup[part.type] = Number(part.value);
  }
  return {
    year: lookup.year ?? 1970,
    month: lookup.month ?? 1,
    day: lookup.day ?? 1,
    // Intl reports midnight as 24 in some engines.
    hour: (lookup.hour ?? 0) % 24,
    minute: lookup.minute ?? 0,
    second: lookup.second ?? 0,
  };
}

function wallToNaiveUtcMs(wall: WallTime): number {
  return Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
}

function offsetMs(utcMs: number, timeZone: string): number {
  return wallToNaiveUtcMs(zonedParts(new Date(utcMs), timeZone)) - utcMs;
}

/**
 * Parses a record datetime. Naive values are wall times in `timeZone`; values
 * carrying `Z` or an offset are converted into that zone's wall time.
 */
export function parseWallTime(value: string, timeZone: string): WallTime | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  if (ZONED_PATTERN.test(trimmed)) {
    const instant = new Date(trimmed);
    if (Number.isNaN(instant.getTime())) {
      return null;
    }
    return zonedParts(instant, timeZone);
  }

  const match = NAIVE_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  const wall: WallTime = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? 0),
    minute: Number(match[5] ?? 0),
    second: Number(match[6] ?? 0),
  };

  const roundTrip = new Date(wallToNaiveUtcMs(wall));
  if (
    roundTrip.getUTCFullYear() !== wall.year ||
    roundTrip.getUTCMonth() + 1 !== wall.month ||
    roundTrip.getUTCDate() !== wall.day ||
    wall.hour > 23 ||
    wall.minute > 59 ||
    wall.second > 59
  ) {
    return null;
  }
  return wall;
}

/** A value sitting exactly on midnight gets the given time of day instead. */
export function withDefaultTime(wall: WallTime, fallback: TimeOfDay): WallTime {
  if (wall.hour === 0 && wall.minute === 0 && wall.second === 0) {
    return { ...wall, hour: fallback.hour, minute: fallback.minute };
  }
  return wall;
}

export function wallTimeToDate(wall: WallTime, timeZone: string): Date {
  const naive = wallToNaiveUtcMs(wall);
  let utcMs = naive - offsetMs(naive, timeZone);
  // A second pass settles wall times next to a DST transition.
  utcMs = naive - offsetMs(utcMs, timeZone);
  return new Date(utcMs);
}

export function toGraphUtc(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}` +
    `T${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}Z`
  );
}

export interface MeetingWindow {
  start: Date;
  end: Date;
}

export interface WindowInput {
  start?: string;
  end?: string;
  defaultStartTime: TimeOfDay;
  defaultEndTime: TimeOfDay;
  timeZone: string;
  now: Date;
}

/**
 * Resolves a meeting window: a missing start becomes `now`, a missing or
 * non-positive end becomes one hour after the start.
 */
export function resolveMeetingWindow(input: WindowInput): MeetingWindow {
  const toDate = (raw: string | undefined, fallback: TimeOfDay): Date | null => {
    if (!raw) return null;
    const wall = parseWallTime(raw, input.timeZone);
    return wall ? wallTimeToDate(withDefaultTime(wall, fallback), input.timeZone) : null;
  };

  const start = toDate(input.start, input.defaultStartTime) ?? input.now;
  let end = toDate(input.end, input.defaultEndTime);
  if (!end || end.getTime() <= start.getTime()) {
    end = new Date(start.getTime() + HOUR_MS);
  }
  return { start, end };
}

export interface MeetingTimeValidation {
  valid: boolean;
  errors: string[];
  durationHours?: number;
}

export function validateMeetingTime(
  startRaw: string,
  endRaw: string,
  timeZone: string,
  now = new Date(),
): MeetingTimeValidation {
  const startWall = parseWallTime(startRaw, timeZone);
  const endWall = parseWallTime(endRaw, timeZone);
  if (!startWall || !endWall) {
    const bad = startWall ? endRaw : startRaw;
    return { valid: false, errors: [`Invalid date/time format: ${bad}`] };
  }

  const start = wallTimeToDate(startWall, timeZone);
  const end = wallTimeToDate(endWall, timeZone);
  const durationMs = end.getTime() - start.getTime();

  const errors: string[] = [];
  if (durationMs <= 0) {
    errors.push("End time must be after start time.");
  }
  if (durationMs > 24 * HOUR_MS) {
    errors.push("Meeting duration cannot exceed 24 hours.");
  }
  if (durationMs < 15 * 60 * 1000) {
    errors.push("Meeting duration should be at least 15 minutes.");
  }
  if (start.getTime() < now.getTime()) {
    errors.push("Meeting cannot be scheduled in the past.");
  }

  return {
    valid: errors.length === 0,
    errors,
    durationHours: Math.round((durationMs / HOUR_MS) * 100) / 100,
  };
}
