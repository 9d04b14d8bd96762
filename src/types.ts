export type AttendingStatus = "Yes" | "No" | "Maybe";

export const RECORD_KINDS = ["event", "project"] as const;
export type RecordKind = (typeof RECORD_KINDS)[number];

export interface OAuthToken {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
  scope?: string;
}

export interface Participant {
  identity: string;
  userId: string | null;
  attendingStatus: AttendingStatus | null;
}

export interface RecordKey {
  kind: RecordKind;
  name: string;
}

export interface MeetingRecord extends RecordKey {
  owner: string | null;
  fields: Record<string, string>;
  remoteEventId: string | null;
  meetingUrl: string | null;
  participants: Participant[];
}

export function isRecordKind(value: string): value is RecordKind {
  return (RECORD_KINDS as readonly string[]).includes(value);
}

export function isAttendingStatus(value: string): value is AttendingStatus {
  return value === "Yes" || value === "No" || value === "Maybe";
}
