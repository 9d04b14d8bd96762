import fs from "node:fs";
import { z } from "zod";
import { RecordValidationError } from "../errors.js";
import type { MeetingRecord, Participant } from "../types.js";
import { isAttendingStatus } from "../types.js";
import { kindConfig, requireRecordKind } from "./kinds.js";
import type { LocalRecordStore, SaveOptions } from "./store.js";

const ParticipantSchema = z.object({
  email: z.string().default(""),
  user: z.string().min(1).nullable().optional(),
  attending: z.string().nullable().optional(),
});

const RecordDocumentSchema = z
  .object({
    kind: z.string().min(1),
    name: z.string().min(1),
    owner: z.string().min(1).nullable().optional(),
  })
  .passthrough();

const ImportFileSchema = z.union([z.array(RecordDocumentSchema), RecordDocumentSchema]);

export type RecordDocument = z.infer<typeof RecordDocumentSchema>;

export interface ImportSummary {
  imported: string[];
}

function toParticipants(value: unknown, field: string): Participant[] {
  if (value === undefined || value === null) {
    return [];
  }
  const parsed = z.array(ParticipantSchema).safeParse(value);
  if (!parsed.success) {
    throw new RecordValidationError(`'${field}' must be a list of {email, user?, attending?}`);
  }
  return parsed.data.map((row) => ({
    identity: row.email,
    userId: row.user ?? null,
    attendingStatus: row.attending && isAttendingStatus(row.attending) ? row.attending : null,
  }));
}

/**
 * Builds a record from an import document. String fields are kept under their
 * own names; the kind's participants field becomes the participant rows.
 */
export function toMeetingRecord(
  document: RecordDocument,
  existing?: MeetingRecord,
): MeetingRecord {
  const kind = requireRecordKind(document.kind);
  const config = kindConfig(kind);

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(document)) {
    if (key === "kind" || key === "name" || key === "owner" || key === config.participantsField) {
      continue;
    }
    if (typeof value === "string") {
      fields[key] = value;
    }
  }

  return {
    kind,
    name: document.name,
    owner: document.owner ?? existing?.owner ?? null,
    fields,
    remoteEventId: existing?.remoteEventId ?? null,
    meetingUrl: existing?.meetingUrl ?? null,
    participants: toParticipants(document[config.participantsField], config.participantsField),
  };
}

export function importRecords(
  input: unknown,
  records: LocalRecordStore,
  options: SaveOptions = {},
): ImportSummary {
  const documents = ImportFileSchema.parse(input);
  const list = Array.isArray(documents) ? documents : [documents];

  const imported: string[] = [];
  for (const document of list) {
    const kind = requireRecordKind(document.kind);
    const record = toMeetingRecord(document, records.get({ kind, name: document.name }));
    records.save(record, options);
    imported.push(`${record.kind}/${record.name}`);
  }
  return { imported };
}

export function importRecordsFromFile(
  filePath: string,
  records: LocalRecordStore,
  options: SaveOptions = {},
): ImportSummary {
  const input: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return importRecords(input, records, options);
}
