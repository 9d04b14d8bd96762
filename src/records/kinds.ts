import { RecordValidationError } from "../errors.js";
import { isRecordKind, type RecordKind } from "../types.js";

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** Which fields of a record kind carry the meeting data. */
export interface RecordKindConfig {
  label: string;
  participantsField: string;
  subjectField: string;
  startField: string;
  endField: string;
  defaultStartTime: TimeOfDay;
  defaultEndTime: TimeOfDay;
}

export const SUPPORTED_RECORD_KINDS: Record<RecordKind, RecordKindConfig> = {
  event: {
    label: "Event",
    participantsField: "participants",
    subjectField: "subject",
    startField: "startsOn",
    endField: "endsOn",
    defaultStartTime: { hour: 9, minute: 0 },
    defaultEndTime: { hour: 9, minute: 0 },
  },
  project: {
    label: "Project",
    participantsField: "users",
    subjectField: "projectName",
    startField: "expectedStartDate",
    endField: "expectedEndDate",
    defaultStartTime: { hour: 9, minute: 0 },
    defaultEndTime: { hour: 17, minute: 30 },
  },
};

export function requireRecordKind(kind: string): RecordKind {
  if (!isRecordKind(kind)) {
    throw new RecordValidationError(`Record kind '${kind}' is not supported for Teams meetings.`);
  }
  return kind;
}

export function kindConfig(kind: RecordKind): RecordKindConfig {
  return SUPPORTED_RECORD_KINDS[kind];
}
