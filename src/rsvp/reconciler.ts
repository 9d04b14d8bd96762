import type { TokenProvider } from "../auth/microsoft.js";
import type { GraphEvent, MicrosoftGraphClient } from "../clients/microsoft-graph.js";
import { HttpError, formatErrorBody } from "../http.js";
import type { Logger } from "../logger.js";
import type { LocalRecordStore } from "../records/store.js";
import type { RecordKey } from "../types.js";
import { parseResourceReference, resolveResourceUrl } from "../webhook/resource.js";
import { collectAttendeeResponses, mergeAttendeeResponses } from "./merge.js";

export interface RsvpJob {
  resource: string;
}

export type ReconcileOutcome =
  | { status: "updated"; record: RecordKey; changed: number }
  | { status: "unchanged"; record: RecordKey }
  | { status: "not_found"; reason: "remote_event" | "no_attendees" | "local_record" }
  | { status: "skipped"; reason: "no_token" }
  | { status: "rejected"; reason: "untrusted_resource" }
  | { status: "failed"; reason: "remote_error" | "transient" | "internal"; httpStatus?: number };

export interface RsvpReconcilerDeps {
  tokens: TokenProvider;
  graph: Pick<MicrosoftGraphClient, "getResource">;
  records: LocalRecordStore;
  logger: Logger;
  apiBase?: string;
}

/**
 * Pulls the current attendee responses of a changed remote event and writes
 * them onto the local record tracking it. Never throws: every path ends in a
 * {@link ReconcileOutcome}.
 */
export class RsvpReconciler {
  constructor(private readonly deps: RsvpReconcilerDeps) {}

  async reconcile(resource: string): Promise<ReconcileOutcome> {
    const outcome = await this.run(resource);
    const level =
      outcome.status === "failed" || outcome.status === "rejected"
        ? "warn"
        : outcome.status === "updated"
          ? "info"
          : "debug";
    this.deps.logger[level]({ resource, outcome }, "RSVP reconciliation finished");
    return outcome;
  }

  private async run(resource: string): Promise<ReconcileOutcome> {
    const { tokens, graph, records, logger } = this.deps;

    try {
      const reference = parseResourceReference(resource, this.deps.apiBase);
      if (reference.kind === "untrusted") {
        return { status: "rejected", reason: "untrusted_resource" };
      }

      const token = await tokens.getAccessToken();
      if (!token) {
        return { status: "skipped", reason: "no_token" };
      }

      const url = resolveResourceUrl(reference, this.deps.apiBase);

      let event: GraphEvent;
      try {
        event = await graph.getResource<GraphEvent>(url);
      } catch (error) {
        if (error instanceof HttpError) {
          logger.warn(
            { url, status: error.status, body: formatErrorBody(error.body) },
            "RSVP sync could not fetch event",
          );
          return error.status === 404
            ? { status: "not_found", reason: "remote_event" }
            : { status: "failed", reason: "remote_error", httpStatus: error.status };
        }
        logger.warn({ url, err: error }, "RSVP sync request did not complete");
        return { status: "failed", reason: "transient" };
      }

      const attendees = event.attendees ?? [];
      if (!event.id || attendees.length === 0) {
        return { status: "not_found", reason: "no_attendees" };
      }

      const record = records.findByRemoteEventId(event.id);
      if (!record) {
        return { status: "not_found", reason: "local_record" };
      }

      const key: RecordKey = { kind: record.kind, name: record.name };
      const merged = mergeAttendeeResponses(record.participants, collectAttendeeResponses(attendees));
      if (merged.changed === 0) {
        return { status: "unchanged", record: key };
      }

      records.save(
        { ...record, participants: merged.participants },
        { ignoreValidation: true, ignorePermissions: true },
      );
      return { status: "updated", record: key, changed: merged.changed };
    } catch (error) {
      logger.error({ resource, err: error }, "RSVP processing error");
      return { status: "failed", reason: "internal" };
    }
  }
}
