import type { Logger } from "../logger.js";
import {
  API_TIMEOUT_MS,
  HttpError,
  PROBE_TIMEOUT_MS,
  sendJson,
  type JsonResponse,
} from "../http.js";

export const GRAPH_API_BASE = "https://graph.microsoft.com/v1.0";

export interface GraphDateTimeTimeZone {
  dateTime: string;
  timeZone: string;
}

export interface GraphEmailAddress {
  address?: string;
  name?: string;
}

export interface GraphAttendee {
  emailAddress?: GraphEmailAddress;
  status?: {
    response?: string;
    time?: string;
  };
  type?: "required" | "optional" | "resource";
}

export interface GraphEvent {
  id: string;
  subject?: string;
  start?: GraphDateTimeTimeZone;
  end?: GraphDateTimeTimeZone;
  attendees?: GraphAttendee[];
  isOnlineMeeting?: boolean;
  onlineMeeting?: {
    joinUrl?: string;
  } | null;
  webLink?: string;
}

export interface GraphEventInput {
  subject?: string;
  start?: GraphDateTimeTimeZone;
  end?: GraphDateTimeTimeZone;
  attendees?: GraphAttendee[];
  isOnlineMeeting?: boolean;
  onlineMeetingProvider?: "teamsForBusiness";
}

export interface GraphMeetingParticipant {
  identity?: {
    user?: {
      id?: string;
      displayName?: string;
    };
  };
  upn?: string;
}

export interface GraphOnlineMeeting {
  id: string;
  subject?: string;
  startDateTime?: string;
  endDateTime?: string;
  joinWebUrl?: string;
  participants?: {
    attendees?: GraphMeetingParticipant[];
  };
}

export interface GraphOnlineMeetingInput {
  startDateTime?: string;
  endDateTime?: string;
  participants?: {
    attendees: GraphMeetingParticipant[];
  };
}

export interface GraphSubscriptionRequest {
  changeType: string;
  notificationUrl: string;
  resource: string;
  expirationDateTime: string;
  clientState: string;
}

export interface GraphSubscription {
  id: string;
  resource?: string;
  expirationDateTime?: string;
}

export interface GraphUser {
  id: string;
  displayName?: string;
  mail?: string | null;
  userPrincipalName?: string;
}

interface GraphCollection<T> {
  value?: T[];
}

export type AccessTokenSource = () => Promise<string>;

/** Escapes a value for use inside a single-quoted OData literal. */
function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class MicrosoftGraphClient {
  constructor(
    private readonly getAccessToken: AccessTokenSource,
    private readonly logger: Logger,
  ) {}

  /** GET of an absolute Graph URL, e.g. a notification's resolved resource. */
  async getResource<T>(url: string): Promise<T> {
    const { data } = await this.send<T>(url, { method: "GET" });
    return data;
  }

  async getEvent(eventId: string): Promise<GraphEvent> {
    return this.getResource<GraphEvent>(`${GRAPH_API_BASE}/me/events/${encodeURIComponent(eventId)}`);
  }

  async createEvent(input: GraphEventInput): Promise<GraphEvent> {
    const { data } = await this.send<GraphEvent>(`${GRAPH_API_BASE}/me/events`, {
      method: "POST",
      body: JSON.stringify(input),
    });
    return data;
  }

  async updateEvent(eventId: string, patch: GraphEventInput): Promise<GraphEvent> {
    const { data } = await this.send<GraphEvent>(
      `${GRAPH_API_BASE}/me/events/${encodeURIComponent(eventId)}`,
      { method: "PATCH", body: JSON.stringify(patch) },
    );
    return data;
  }

  async deleteEvent(eventId: string): Promise<void> {
    await this.send<unknown>(`${GRAPH_API_BASE}/me/events/${encodeURIComponent(eventId)}`, {
      method: "DELETE",
    });
  }

  async findEventIdByJoinUrl(joinUrl: string): Promise<string | null> {
    const url = new URL(`${GRAPH_API_BASE}/me/events`);
    url.searchParams.set("$filter", `onlineMeeting/joinUrl eq ${odataString(joinUrl)}`);
    url.searchParams.set("$select", "id");
    return this.findFirstId<GraphEvent>(url.toString(), "event");
  }

  async getOnlineMeeting(meetingId: string): Promise<GraphOnlineMeeting> {
    return this.getResource<GraphOnlineMeeting>(
      `${GRAPH_API_BASE}/me/onlineMeetings/${encodeURIComponent(meetingId)}`,
    );
  }

  async updateOnlineMeeting(meetingId: string, patch: GraphOnlineMeetingInput): Promise<void> {
    await this.send<unknown>(`${GRAPH_API_BASE}/me/onlineMeetings/${encodeURIComponent(meetingId)}`, {
      method: "PATCH",
      body: JSON.stringify(patch),
    });
  }

  async deleteOnlineMeeting(meetingId: string): Promise<void> {
    await this.send<unknown>(`${GRAPH_API_BASE}/me/onlineMeetings/${encodeURIComponent(meetingId)}`, {
      method: "DELETE",
    });
  }

  async findOnlineMeetingIdByJoinUrl(joinUrl: string): Promise<string | null> {
    const url = new URL(`${GRAPH_API_BASE}/me/onlineMeetings`);
    url.searchParams.set("$filter", `JoinWebUrl eq ${odataString(joinUrl)}`);
    return this.findFirstId<GraphOnlineMeeting>(url.toString(), "onlineMeeting");
  }

  async createSubscription(
    request: GraphSubscriptionRequest,
  ): Promise<JsonResponse<GraphSubscription>> {
    return this.send<GraphSubscription>(`${GRAPH_API_BASE}/subscriptions`, {
      method: "POST",
      body: JSON.stringify(request),
    });
  }

  async renewSubscription(
    subscriptionId: string,
    expirationDateTime: string,
  ): Promise<JsonResponse<GraphSubscription>> {
    return this.send<GraphSubscription>(
      `${GRAPH_API_BASE}/subscriptions/${encodeURIComponent(subscriptionId)}`,
      { method: "PATCH", body: JSON.stringify({ expirationDateTime }) },
    );
  }

  async getMe(): Promise<GraphUser> {
    const { data } = await this.send<GraphUser>(
      `${GRAPH_API_BASE}/me?$select=id,displayName,mail,userPrincipalName`,
      { method: "GET" },
      PROBE_TIMEOUT_MS,
    );
    return data;
  }

  /** Directory object id for an email, or null when the tenant has no such user. */
  async findUserIdByEmail(email: string): Promise<string | null> {
    try {
      const { data } = await this.send<GraphUser>(
        `${GRAPH_API_BASE}/users/${encodeURIComponent(email)}?$select=id`,
        { method: "GET" },
        PROBE_TIMEOUT_MS,
      );
      return data.id ?? null;
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  private async findFirstId<T extends { id: string }>(
    url: string,
    operationName: string,
  ): Promise<string | null> {
    try {
      const { data } = await this.send<GraphCollection<T>>(url, { method: "GET" });
      return data.value?.[0]?.id ?? null;
    } catch (error) {
      if (!(error instanceof HttpError)) {
        throw error;
      }
      this.logger.debug(
        { operationName, status: error.status },
        "Join URL lookup rejected by Graph; treating as not found",
      );
      return null;
    }
  }

  private async send<T>(
    url: string,
    init: RequestInit,
    timeoutMs = API_TIMEOUT_MS,
  ): Promise<JsonResponse<T>> {
    const token = await this.getAccessToken();
    return sendJson<T>(
      url,
      {
        ...init,
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
      },
      timeoutMs,
    );
  }
}
