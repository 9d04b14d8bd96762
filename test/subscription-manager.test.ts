import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { GraphSubscription, GraphSubscriptionRequest } from "../src/clients/microsoft-graph.js";
import { DbClient } from "../src/db.js";
import { AuthRequiredError, RemoteApiError } from "../src/errors.js";
import { HttpError, type JsonResponse } from "../src/http.js";
import { IntegrationState } from "../src/integration-state.js";
import { createSilentLogger } from "../src/logger.js";
import { SubscriptionManager } from "../src/subscription/manager.js";

const NOW = new Date("2026-03-01T10:00:00Z");
const EXPIRY = "2026-03-03T10:00:00Z";

type CreateFn = (request: GraphSubscriptionRequest) => Promise<JsonResponse<GraphSubscription>>;
type RenewFn = (id: string, expiration: string) => Promise<JsonResponse<GraphSubscription>>;

describe("SubscriptionManager", () => {
  let db: DbClient;
  let state: IntegrationState;
  let token: string | null;
  let createSubscription: Mock<CreateFn>;
  let renewSubscription: Mock<RenewFn>;
  let manager: SubscriptionManager;

  beforeEach(() => {
    db = new DbClient(":memory:");
    state = new IntegrationState(db, "default");
    token = "test-token";
    createSubscription = vi.fn<CreateFn>(async () => ({ status: 201, data: { id: "sub-new" } }));
    renewSubscription = vi.fn<RenewFn>(async (id) => ({ status: 200, data: { id } }));
    manager = new SubscriptionManager(
      {
        tokens: { getAccessToken: async () => token },
        graph: { createSubscription, renewSubscription },
        state,
        logger: createSilentLogger(),
      },
      {
        notificationUrl: "https://bridge.example.test/webhooks/graph",
        clientState: "MeetingBridgeSyncV1",
        now: () => NOW,
      },
    );
  });

  afterEach(() => {
    db.close();
  });

  it("renews the stored subscription two days ahead", async () => {
    state.setSubscriptionId("sub-old");

    const outcome = await manager.ensureSubscription();

    expect(outcome).toEqual({ status: "renewed", subscriptionId: "sub-old" });
    expect(renewSubscription).toHaveBeenCalledWith("sub-old", EXPIRY);
    expect(createSubscription).not.toHaveBeenCalled();
  });

  it("creates a subscription when none is stored", async () => {
    const outcome = await manager.ensureSubscription();

    expect(outcome).toEqual({ status: "created", subscriptionId: "sub-new" });
    expect(renewSubscription).not.toHaveBeenCalled();
    expect(createSubscription).toHaveBeenCalledWith({
      changeType: "updated",
      notificationUrl: "https://bridge.example.test/webhooks/graph",
      resource: "/me/events",
      expirationDateTime: EXPIRY,
      clientState: "MeetingBridgeSyncV1",
    });
    expect(state.getSubscriptionId()).toBe("sub-new");
  });

  it("replaces a subscription whose renewal is refused", async () => {
    state.setSubscriptionId("sub-gone");
    renewSubscription.mockImplementation(async () => {
      throw new HttpError("gone", 404, { error: { code: "ResourceNotFound" } }, new Headers());
    });

    const outcome = await manager.ensureSubscription();

    expect(outcome).toEqual({ status: "created", subscriptionId: "sub-new" });
    expect(state.getSubscriptionId()).toBe("sub-new");
  });

  it("replaces a subscription when renewal answers other than 200", async () => {
    state.setSubscriptionId("sub-odd");
    renewSubscription.mockResolvedValue({ status: 202, data: { id: "sub-odd" } });

    const outcome = await manager.ensureSubscription();

    expect(outcome.status).toBe("created");
  });

  it("aborts quietly without a token", async () => {
    token = null;
    state.setSubscriptionId("sub-old");

    const outcome = await manager.ensureSubscription();

    expect(outcome).toEqual({ status: "skipped", reason: "no_token" });
    expect(renewSubscription).not.toHaveBeenCalled();
    expect(createSubscription).not.toHaveBeenCalled();
  });

  it("reports a failed creation instead of throwing", async () => {
    createSubscription.mockImplementation(async () => {
      throw new HttpError("bad", 400, { error: { code: "InvalidRequest" } }, new Headers());
    });

    const outcome = await manager.ensureSubscription();

    expect(outcome).toEqual({ status: "failed", message: "Failed to subscribe: 400" });
    expect(state.getSubscriptionId()).toBeUndefined();
  });

  it("requires a token for interactive creation", async () => {
    token = null;

    await expect(manager.createSubscription()).rejects.toBeInstanceOf(AuthRequiredError);
  });

  it("rejects a creation answered without an id", async () => {
    createSubscription.mockResolvedValue({ status: 201, data: { id: "" } });

    await expect(manager.createSubscription()).rejects.toBeInstanceOf(RemoteApiError);
    expect(state.getSubscriptionId()).toBeUndefined();
  });

  it("returns the id of a created subscription", async () => {
    await expect(manager.createSubscription()).resolves.toEqual({ subscriptionId: "sub-new" });
  });
});
