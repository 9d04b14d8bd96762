import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DbClient } from "../src/db.js";
import {
  RecordNotFoundError,
  RecordPermissionError,
  RecordValidationError,
} from "../src/errors.js";
import { SqliteRecordStore, validateRecord } from "../src/records/store.js";
import { eventRecord, participant } from "./helpers/records.js";

describe("SqliteRecordStore", () => {
  let db: DbClient;
  let store: SqliteRecordStore;

  beforeEach(() => {
    db = new DbClient(":memory:");
    store = new SqliteRecordStore(db, "UTC");
  });

  afterEach(() => {
    db.close();
  });

  it("saves and loads a record with its participants in order", () => {
    const record = eventRecord({
      fields: { subject: "Kickoff", startsOn: "2026-05-04 10:00" },
      participants: [participant("b@example.com", "No"), participant("a@example.com")],
    });

    store.save(record);

    expect(store.load({ kind: "event", name: "EV-0001" })).toEqual(record);
  });

  it("finds records by remote event id", () => {
    store.save(eventRecord({ name: "EV-0002", remoteEventId: "evt-9" }));

    expect(store.findByRemoteEventId("evt-9")?.name).toBe("EV-0002");
    expect(store.findByRemoteEventId("evt-unknown")).toBeUndefined();
  });

  it("throws for unknown records", () => {
    expect(() => store.load({ kind: "project", name: "PROJ-404" })).toThrow(RecordNotFoundError);
    expect(() => store.load({ kind: "project", name: "PROJ-404" })).toThrow("Project 'PROJ-404' not found");
  });

  it("rejects invalid records unless validation is skipped", () => {
    const record = eventRecord({
      fields: { startsOn: "2026-05-04 10:00", endsOn: "2026-05-04 09:00" },
      participants: [participant("")],
    });

    expect(() => store.save(record)).toThrow(RecordValidationError);
    store.save(record, { ignoreValidation: true });
    expect(store.get(record)?.fields.endsOn).toBe("2026-05-04 09:00");
  });

  it("only lets the owner modify an owned record", () => {
    store.save(eventRecord({ owner: "alice@example.com" }), { actor: "alice@example.com" });
    const update = eventRecord({ owner: "alice@example.com", fields: { subject: "Moved" } });

    expect(() => store.save(update, { actor: "bob@example.com" })).toThrow(RecordPermissionError);
    store.save(update, { ignorePermissions: true });
    expect(store.load(update).fields.subject).toBe("Moved");
  });

  it("sets and clears the meeting link", () => {
    store.save(eventRecord());

    store.setMeetingLink({ kind: "event", name: "EV-0001" }, {
      remoteEventId: "evt-1",
      meetingUrl: "https://teams.example.test/join/1",
    });
    expect(store.findByRemoteEventId("evt-1")?.meetingUrl).toBe("https://teams.example.test/join/1");

    store.setMeetingLink({ kind: "event", name: "EV-0001" }, { remoteEventId: null, meetingUrl: null });
    expect(store.load({ kind: "event", name: "EV-0001" }).meetingUrl).toBeNull();
  });
});

describe("validateRecord", () => {
  it("lists every problem", () => {
    const problems = validateRecord(
      eventRecord({
        name: " ",
        fields: { startsOn: "someday", endsOn: "2026-05-04 09:00" },
        participants: [participant("ok@example.com"), participant(" ")],
      }),
      "UTC",
    );

    expect(problems).toEqual([
      "name is required",
      "participant #2 has neither an email nor a user",
      "startsOn is not a valid date/time",
    ]);
  });
});
