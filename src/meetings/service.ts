import { recordState, type MicrosoftAuth } from "../auth/microsoft.js";
import type {
  GraphAttendee,
  GraphEvent,
  MicrosoftGraphClient,
} from "../clients/microsoft-graph.js";
import type { DbClient } from "../db.js";
import { AuthRequiredError, RecordValidationError, RemoteApiError } from "../errors.js";
import { HttpError } from "../http.js";
import type { Logger } from "../logger.js";
import { kindConfig } from "../records/kinds.js";
import type { LocalRecordStore } from "../records/store.js";
import type { MeetingRecord, RecordKey } from "../types.js";
import { resolveMeetingWindow, toGraphUtc, type MeetingWindow } from "./times.js";

const PERMISSION_HINT =
  "Permission denied (403): the Microsoft token lacks calendar access. " +
  "Make sure Calendars.ReadWrite is granted, then authenticate again.";

export type RemoteMeeting = { type: "event"; id: string } | { type: "onlineMeeting"; id: string };

export interface MeetingActionResult {
  status: "created" | "updated" | "unchanged" | "rescheduled" | "not_found";
  message: string;
  meetingUrl?: string;
}

export interface MeetingDetails {
  exists: boolean;
  url?: string;
  message?: string;
  details?: {
    subject?: string;
    startDateTime?: string;
    endDateTime?: string;
    participants: number;
    type: "Outlook Event" | "Teams Meeting";
  };
}

export interface AttendeeSummary {
  id?: string;
  email?: string;
  displayName?: string;
}

export interface MeetingAttendees {
  attendees: AttendeeSummary[];
  count?: number;
  type?: "Outlook Event" | "Teams Meeting";
  message?: string;
}

export interface DeleteMeetingResult {
  success: boolean;
  message: string;
  loginUrl?: string;
}

export interface MeetingServiceDeps {
  auth: Pick<MicrosoftAuth, "getAccessToken" | "requireAccessToken" | "getAuthorizationUrl">;
  graph: MicrosoftGraphClient;
  records: LocalRecordStore;
  db: DbClient;
  logger: Logger;
  timeZone: string;
  now?: () => Date;
}

/** Teams meetings owned by local records, backed by Outlook calendar events. */
export class MeetingService {
  private readonly now: () => Date;

  constructor(private readonly deps: MeetingServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async createMeeting(key: RecordKey): Promise<MeetingActionResult> {
    const record = this.deps.records.load(key);
    await this.deps.auth.requireAccessToken(recordState(key));

    const objectIds = await this.collectParticipantObjectIds(record);
    if (record.meetingUrl) {
      return this.updateExistingMeeting(record, objectIds);
    }
    return this.createNewMeeting(record, objectIds);
  }

  async getMeetingDetails(key: RecordKey): Promise<MeetingDetails> {
    try {
      const record = this.deps.records.load(key);
      const url = record.meetingUrl;
      if (!url) {
        return { exists: false, message: "No meeting found." };
      }
      if (!(await this.deps.auth.getAccessToken())) {
        return { exists: true, url, message: "Auth required." };
      }

      const remote = await this.locateRemote(record);
      if (remote?.type === "event") {
        const event = await this.deps.graph.getEvent(remote.id);
        return {
          exists: true,
          url,
          details: {
            subject: event.subject,
            startDateTime: event.start?.dateTime,
            endDateTime: event.end?.dateTime,
            participants: event.attendees?.length ?? 0,
            type: "Outlook Event",
          },
        };
      }
      if (remote?.type === "onlineMeeting") {
        const meeting = await this.deps.graph.getOnlineMeeting(remote.id);
        return {
          exists: true,
          url,
          details: {
            subject: meeting.subject,
            startDateTime: meeting.startDateTime,
            endDateTime: meeting.endDateTime,
            participants: meeting.participants?.attendees?.length ?? 0,
            type: "Teams Meeting",
          },
        };
      }
      return { exists: true, url, message: "Details unavailable." };
    } catch (error) {
      this.deps.logger.error({ ...key, err: error }, "Meeting details error");
      return { exists: false, message: "Error fetching details." };
    }
  }

  async getMeetingAttendees(key: RecordKey): Promise<MeetingAttendees> {
    try {
      const record = this.deps.records.load(key);
      if (!record.meetingUrl) {
        return { attendees: [], message: "No meeting found." };
      }
      if (!(await this.deps.auth.getAccessToken())) {
        return { attendees: [], message: "Auth required." };
      }

      const remote = await this.locateRemote(record);
      if (remote?.type === "event") {
        const event = await this.deps.graph.getEvent(remote.id);
        const attendees = (event.attendees ?? []).map((attendee) => ({
          email: attendee.emailAddress?.address,
          displayName: attendee.emailAddress?.name || "Unknown",
        }));
        return { attendees, count: attendees.length, type: "Outlook Event" };
      }
      if (remote?.type === "onlineMeeting") {
        const meeting = await this.deps.graph.getOnlineMeeting(remote.id);
        const attendees = (meeting.participants?.attendees ?? []).map((participant) => ({
          id: participant.identity?.user?.id,
          displayName: participant.identity?.user?.displayName,
          email: participant.upn,
        }));
        return { attendees, count: attendees.length, type: "Teams Meeting" };
      }
      return { attendees: [], message: "Details unavailable." };
    } catch (error) {
      this.deps.logger.error({ ...key, err: error }, "Meeting attendees error");
      return { attendees: [], message: "Error fetching attendees." };
    }
  }

  async rescheduleMeeting(key: RecordKey, start?: string, end?: string): Promise<MeetingActionResult> {
    const record = this.deps.records.load(key);
    if (!record.meetingUrl) {
      throw new RecordValidationError("No meeting found.");
    }
    await this.deps.auth.requireAccessToken(recordState(key));

    const window =
      start && end ? this.windowFor(record, start, end) : this.windowFor(record);
    const startIso = toGraphUtc(window.start);
    const endIso = toGraphUtc(window.end);

    const remote = await this.locateRemote(record);
    if (remote?.type === "event") {
      await this.callGraph(key, () =>
        this.deps.graph.updateEvent(remote.id, {
          start: { dateTime: startIso, timeZone: "UTC" },
          end: { dateTime: endIso, timeZone: "UTC" },
        }),
      );
      return { status: "rescheduled", message: "Outlook Calendar updated." };
    }
    if (remote?.type === "onlineMeeting") {
      await this.callGraph(key, () =>
        this.deps.graph.updateOnlineMeeting(remote.id, {
          startDateTime: startIso,
          endDateTime: endIso,
        }),
      );
      return { status: "rescheduled", message: "Teams Meeting updated." };
    }
    throw new RemoteApiError("Could not update meeting (ID not found).");
  }

  async deleteMeeting(key: RecordKey): Promise<DeleteMeetingResult> {
    try {
      const record = this.deps.records.load(key);
      if (!record.meetingUrl) {
        return { success: true, message: "No meeting to delete." };
      }
      if (!(await this.deps.auth.getAccessToken())) {
        return {
          success: false,
          message: "Authentication required.",
          loginUrl: this.deps.auth.getAuthorizationUrl(recordState(key)),
        };
      }

      const remote = await this.locateRemote(record);
      if (remote?.type === "event") {
        await this.deps.graph.deleteEvent(remote.id);
      } else if (remote?.type === "onlineMeeting") {
        await this.deps.graph.deleteOnlineMeeting(remote.id);
      }
      this.deps.records.setMeetingLink(key, { remoteEventId: null, meetingUrl: null });

      if (remote?.type === "event") return { success: true, message: "Outlook Event deleted." };
      if (remote?.type === "onlineMeeting") return { success: true, message: "Teams Meeting deleted." };
      return { success: true, message: "URL cleared (not found on remote)." };
    } catch (error) {
      this.deps.logger.error({ ...key, err: error }, "Meeting delete error");
      return { success: false, message: "Error deleting meeting." };
    }
  }

  /**
   * Finds the remote object behind a record: the tracked event id when there
   * is one, otherwise an event and then an online meeting with the join URL.
   */
  async locateRemote(record: MeetingRecord): Promise<RemoteMeeting | null> {
    if (record.remoteEventId) {
      return { type: "event", id: record.remoteEventId };
    }
    if (!record.meetingUrl) {
      return null;
    }

    const eventId = await this.deps.graph.findEventIdByJoinUrl(record.meetingUrl);
    if (eventId) {
      return { type: "event", id: eventId };
    }
    const meetingId = await this.deps.graph.findOnlineMeetingIdByJoinUrl(record.meetingUrl);
    return meetingId ? { type: "onlineMeeting", id: meetingId } : null;
  }

  /** Directory object ids of the record's participants, resolving unknown emails remotely. */
  async collectParticipantObjectIds(record: MeetingRecord): Promise<string[]> {
    const objectIds = new Set<string>();

    for (const participant of record.participants) {
      let objectId: string | undefined;
      if (participant.userId) {
        objectId = this.deps.db.getDirectoryUserByEmail(participant.userId)?.objectId;
      }
      const email = participant.identity.trim();
      if (!objectId && email) {
        objectId = this.deps.db.getDirectoryUserByEmail(email)?.objectId;
        if (!objectId) {
          objectId = (await this.deps.graph.findUserIdByEmail(email)) ?? undefined;
          if (objectId) {
            this.deps.db.upsertDirectoryUser({ email, objectId, displayName: null });
          }
        }
      }
      if (objectId) {
        objectIds.add(objectId);
      }
    }

    return [...objectIds];
  }

  private async createNewMeeting(
    record: MeetingRecord,
    objectIds: string[],
  ): Promise<MeetingActionResult> {
    const config = kindConfig(record.kind);
    const subject =
      record.fields[config.subjectField]?.trim() || `${config.label} Meeting: ${record.name}`;
    const window = this.windowFor(record);

    const created = await this.callGraph(record, () =>
      this.deps.graph.createEvent({
        subject,
        start: { dateTime: toGraphUtc(window.start), timeZone: "UTC" },
        end: { dateTime: toGraphUtc(window.end), timeZone: "UTC" },
        isOnlineMeeting: true,
        onlineMeetingProvider: "teamsForBusiness",
        attendees: this.eventAttendees(objectIds),
      }),
    );

    const joinUrl = created.onlineMeeting?.joinUrl || created.webLink;
    if (!joinUrl) {
      throw new RemoteApiError("Event created but no Teams link returned.");
    }

    this.deps.records.setMeetingLink(record, { remoteEventId: created.id, meetingUrl: joinUrl });
    this.deps.logger.info(
      { kind: record.kind, name: record.name, remoteEventId: created.id },
      "Teams meeting created",
    );
    return {
      status: "created",
      message: "Outlook Calendar blocked and Teams meeting created.",
      meetingUrl: joinUrl,
    };
  }

  private async updateExistingMeeting(
    record: MeetingRecord,
    objectIds: string[],
  ): Promise<MeetingActionResult> {
    const remote = await this.locateRemote(record);
    if (remote?.type === "event") {
      if (record.remoteEventId !== remote.id) {
        this.deps.records.setMeetingLink(record, {
          remoteEventId: remote.id,
          meetingUrl: record.meetingUrl,
        });
      }
      return this.updateEventAttendees(record, remote.id, objectIds);
    }
    if (remote?.type === "onlineMeeting") {
      await this.callGraph(record, () =>
        this.deps.graph.updateOnlineMeeting(remote.id, {
          participants: {
            attendees: objectIds.map((id) => ({ identity: { user: { id } } })),
          },
        }),
      );
      return { status: "updated", message: "Teams Meeting participants updated." };
    }
    return { status: "not_found", message: "Could not find meeting on Teams/Outlook." };
  }

  private async updateEventAttendees(
    key: RecordKey,
    eventId: string,
    objectIds: string[],
  ): Promise<MeetingActionResult> {
    const current: GraphEvent = await this.callGraph(key, () => this.deps.graph.getEvent(eventId));
    const existing = current.attendees ?? [];
    const existingEmails = new Set(
      existing.map((attendee) => (attendee.emailAddress?.address ?? "").toLowerCase()),
    );

    const additions = this.eventAttendees(objectIds).filter(
      (attendee) => !existingEmails.has((attendee.emailAddress?.address ?? "").toLowerCase()),
    );
    if (additions.length === 0) {
      return { status: "unchanged", message: "No new participants to add." };
    }

    await this.callGraph(key, () =>
      this.deps.graph.updateEvent(eventId, { attendees: [...existing, ...additions] }),
    );
    return { status: "updated", message: "Outlook Event attendees updated." };
  }

  /** Event attendees need an email; object ids without a known email are dropped. */
  private eventAttendees(objectIds: string[]): GraphAttendee[] {
    const attendees: GraphAttendee[] = [];
    for (const objectId of objectIds) {
      const email = this.deps.db.getDirectoryUserByObjectId(objectId)?.email;
      if (email) {
        attendees.push({ emailAddress: { address: email }, type: "required" });
      }
    }
    return attendees;
  }

  private windowFor(record: MeetingRecord, start?: string, end?: string): MeetingWindow {
    const config = kindConfig(record.kind);
    return resolveMeetingWindow({
      start: start ?? record.fields[config.startField],
      end: end ?? record.fields[config.endField],
      defaultStartTime: config.defaultStartTime,
      defaultEndTime: config.defaultEndTime,
      timeZone: this.deps.timeZone,
      now: this.now(),
    });
  }

  /** Runs a Graph call, translating 401/403/other rejections into domain errors. */
  private async callGraph<T>(key: RecordKey, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof HttpError)) {
        throw error;
      }
      if (error.status === 401) {
        throw new AuthRequiredError(
          "Microsoft rejected the stored token.",
          this.deps.auth.getAuthorizationUrl(recordState(key)),
        );
      }
      if (error.status === 403) {
        throw RemoteApiError.fromHttpError(error, PERMISSION_HINT);
      }
      this.deps.logger.error(
        { kind: key.kind, name: key.name, status: error.status, body: error.body },
        "Teams API error",
      );
      throw RemoteApiError.fromHttpError(error);
    }
  }
}
