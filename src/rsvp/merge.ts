import type { GraphAttendee } from "../clients/microsoft-graph.js";
import type { AttendingStatus, Participant } from "../types.js";

const RESPONSE_TO_STATUS: Record<string, AttendingStatus> = {
  accepted: "Yes",
  declined: "No",
  tentative: "Maybe",
};

/** `none`, `notResponded`, `organizer` and unknown responses map to nothing. */
export function mapRemoteResponse(response: string | undefined): AttendingStatus | undefined {
  if (!response) {
    return undefined;
  }
  return RESPONSE_TO_STATUS[response.toLowerCase()];
}

/** Lower-cased attendee email to local status, for attendees with a mapped response. */
export function collectAttendeeResponses(attendees: GraphAttendee[]): Map<string, AttendingStatus> {
  const responses = new Map<string, AttendingStatus>();
  for (const attendee of attendees) {
    const email = attendee.emailAddress?.address?.trim().toLowerCase();
    const status = mapRemoteResponse(attendee.status?.response);
    if (email && status) {
      responses.set(email, status);
    }
  }
  return responses;
}

export interface MergeResult {
  participants: Participant[];
  changed: number;
}

/**
 * Applies remote responses to participants matched by lower-cased identity.
 * Rows without a remote match, or already holding the mapped status, are
 * returned untouched; rows sharing an identity all receive the same status.
 */
export function mergeAttendeeResponses(
  participants: Participant[],
  responses: Map<string, AttendingStatus>,
): MergeResult {
  let changed = 0;
  const merged = participants.map((participant) => {
    const next = responses.get(participant.identity.trim().toLowerCase());
    if (!next || participant.attendingStatus === next) {
      return participant;
    }
    changed += 1;
    return { ...participant, attendingStatus: next };
  });
  return { participants: merged, changed };
}
