import type { DbClient, ParticipantRow, RecordRow } from "../db.js";
import {
  RecordNotFoundError,
  RecordPermissionError,
  RecordValidationError,
} from "../errors.js";
import { parseWallTime, wallTimeToDate } from "../meetings/times.js";
import {
  isAttendingStatus,
  type MeetingRecord,
  type Participant,
  type RecordKey,
} from "../types.js";
import { kindConfig, requireRecordKind } from "./kinds.js";

export interface SaveOptions {
  /** Skip field validation (system-driven updates). */
  ignoreValidation?: boolean;
  /** Skip the owner check (system-driven updates). */
  ignorePermissions?: boolean;
  /** Who is saving; compared with the record owner unless permissions are ignored. */
  actor?: string;
}

export interface MeetingLink {
  remoteEventId: string | null;
  meetingUrl: string | null;
}

export interface LocalRecordStore {
  findByRemoteEventId(remoteEventId: string): MeetingRecord | undefined;
  get(key: RecordKey): MeetingRecord | undefined;
  load(key: RecordKey): MeetingRecord;
  save(record: MeetingRecord, options?: SaveOptions): void;
  setMeetingLink(key: RecordKey, link: MeetingLink): void;
}

function parseFields(json: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return {};
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      fields[key] = value;
    }
  }
  return fields;
}

function toParticipant(row: ParticipantRow): Participant {
  return {
    identity: row.identity,
    userId: row.userId,
    attendingStatus: row.attending && isAttendingStatus(row.attending) ? row.attending : null,
  };
}

export function validateRecord(record: MeetingRecord, timeZone: string): string[] {
  const problems: string[] = [];
  if (!record.name.trim()) {
    problems.push("name is required");
  }

  record.participants.forEach((participant, index) => {
    if (!participant.identity.trim() && !participant.userId) {
      problems.push(`participant #${index + 1} has neither an email nor a user`);
    }
  });

  const config = kindConfig(record.kind);
  const startRaw = record.fields[config.startField];
  const endRaw = record.fields[config.endField];
  const start = startRaw ? parseWallTime(startRaw, timeZone) : null;
  const end = endRaw ? parseWallTime(endRaw, timeZone) : null;
  if (startRaw && !start) problems.push(`${config.startField} is not a valid date/time`);
  if (endRaw && !end) problems.push(`${config.endField} is not a valid date/time`);
  if (start && end && wallTimeToDate(end, timeZone) < wallTimeToDate(start, timeZone)) {
    problems.push(`${config.endField} is before ${config.startField}`);
  }
  return problems;
}

export class SqliteRecordStore implements LocalRecordStore {
  constructor(
    private readonly db: DbClient,
    private readonly timeZone: string,
  ) {}

  findByRemoteEventId(remoteEventId: string): MeetingRecord | undefined {
    const [row] = this.db.findRecordsByRemoteEventId(remoteEventId);
    return row ? this.hydrate(row) : undefined;
  }

  get(key: RecordKey): MeetingRecord | undefined {
    const row = this.db.getRecord(key.kind, key.name);
    return row ? this.hydrate(row) : undefined;
  }

  load(key: RecordKey): MeetingRecord {
    const record = this.get(key);
    if (!record) {
      throw new RecordNotFoundError(kindConfig(key.kind).label, key.name);
    }
    return record;
  }

  save(record: MeetingRecord, options: SaveOptions = {}): void {
    if (!options.ignorePermissions) {
      const existing = this.get(record);
      const owner = existing?.owner ?? null;
      if (owner !== null && owner !== options.actor) {
        throw new RecordPermissionError(
          `${options.actor ?? "Anonymous caller"} may not modify ${record.kind} '${record.name}'`,
        );
      }
    }

    if (!options.ignoreValidation) {
      const problems = validateRecord(record, this.timeZone);
      if (problems.length > 0) {
        throw new RecordValidationError(
          `Invalid ${record.kind} '${record.name}': ${problems.join("; ")}`,
          problems,
        );
      }
    }

    this.db.transaction(() => {
      this.db.upsertRecord({
        kind: record.kind,
        name: record.name,
        owner: record.owner,
        fieldsJson: JSON.stringify(record.fields),
        remoteEventId: record.remoteEventId,
        meetingUrl: record.meetingUrl,
        updatedAt: new Date().toISOString(),
      });
      this.db.replaceParticipants(
        record.kind,
        record.name,
        record.participants.map((participant, position) => ({
          position,
          identity: participant.identity,
          userId: participant.userId,
          attending: participant.attendingStatus,
        })),
      );
    });
  }

  setMeetingLink(key: RecordKey, link: MeetingLink): void {
    const row = this.db.getRecord(key.kind, key.name);
    if (!row) {
      throw new RecordNotFoundError(kindConfig(key.kind).label, key.name);
    }
    this.db.upsertRecord({
      ...row,
      remoteEventId: link.remoteEventId,
      meetingUrl: link.meetingUrl,
      updatedAt: new Date().toISOString(),
    });
  }

  private hydrate(row: RecordRow): MeetingRecord {
    return {
      kind: requireRecordKind(row.kind),
      name: row.name,
      owner: row.owner,
      fields: parseFields(row.fieldsJson),
      remoteEventId: row.remoteEventId,
      meetingUrl: row.meetingUrl,
      participants: this.db.listParticipants(row.kind, row.name).map(toParticipant),
    };
  }
}
