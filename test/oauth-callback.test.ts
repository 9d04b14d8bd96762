import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { completeMicrosoftLogin, type OAuthCallbackDeps } from "../src/auth/callback.js";
import { MicrosoftAuth } from "../src/auth/microsoft.js";
import { TokenStore } from "../src/auth/token-store.js";
import { MicrosoftGraphClient } from "../src/clients/microsoft-graph.js";
import { DbClient } from "../src/db.js";
import { IntegrationState } from "../src/integration-state.js";
import { createSilentLogger } from "../src/logger.js";
import { stubFetch, type FetchRoute } from "./helpers/fake-fetch.js";

const TOKEN_ROUTE: FetchRoute = {
  method: "POST",
  url: "https://login.microsoftonline.com/common/oauth2/v2.0/token",
  body: { access_token: "at-1", refresh_token: "rt-1", expires_in: 3600 },
};
const ME_URL = "https://graph.microsoft.com/v1.0/me?$select=id,displayName,mail,userPrincipalName";

describe("completeMicrosoftLogin", () => {
  let db: DbClient;
  let deps: OAuthCallbackDeps;

  beforeEach(() => {
    db = new DbClient(":memory:");
    const logger = createSilentLogger();
    const auth = new MicrosoftAuth(
      {
        clientId: "test-client",
        clientSecret: "test-secret",
        tenantId: "common",
        redirectUri: "https://bridge.example.test/auth/microsoft/callback",
      },
      new TokenStore(db, "test-secret-key-1", logger),
      logger,
    );
    deps = {
      auth,
      graph: new MicrosoftGraphClient(() => auth.requireAccessToken(), logger),
      db,
      state: new IntegrationState(db, "default"),
      logger,
    };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    db.close();
  });

  it("stores the token, links the mailbox owner and returns to the record", async () => {
    stubFetch([
      TOKEN_ROUTE,
      {
        method: "GET",
        url: ME_URL,
        body: { id: "oid-owner", displayName: "Owner", mail: "Owner@Example.com" },
      },
    ]);

    const result = await completeMicrosoftLogin(
      { code: "test-code", state: "from_record::event::EV 1" },
      deps,
    );

    expect(result).toEqual({ type: "redirect", location: "/records/event/EV%201?auth_status=success" });
    expect(deps.state.getOwner()).toEqual({ email: "Owner@Example.com", objectId: "oid-owner" });
    expect(db.getDirectoryUserByEmail("owner@example.com")).toEqual({
      email: "owner@example.com",
      objectId: "oid-owner",
      displayName: "Owner",
    });
    await expect(deps.auth.getAccessToken()).resolves.toBe("at-1");
  });

  it("completes the login when the profile lookup fails", async () => {
    stubFetch([TOKEN_ROUTE, { method: "GET", url: ME_URL, status: 500, body: "oops" }]);

    const result = await completeMicrosoftLogin({ code: "test-code" }, deps);

    expect(result).toEqual({ type: "redirect", location: "/?auth_status=success" });
    expect(deps.state.getOwner()).toBeUndefined();
  });

  it("keeps an existing owner", async () => {
    deps.state.setOwner({ email: "first@example.com", objectId: "oid-first" });
    stubFetch([
      TOKEN_ROUTE,
      { method: "GET", url: ME_URL, body: { id: "oid-second", userPrincipalName: "second@example.com" } },
    ]);

    await completeMicrosoftLogin({ code: "test-code" }, deps);

    expect(deps.state.getOwner()).toEqual({ email: "first@example.com", objectId: "oid-first" });
    expect(db.getDirectoryUserByObjectId("oid-second")?.email).toBe("second@example.com");
  });

  it("redirects with an error when the provider reports one", async () => {
    const result = await completeMicrosoftLogin(
      { error: "access_denied", errorDescription: "User declined" },
      deps,
    );

    expect(result).toEqual({ type: "redirect", location: "/?auth_status=error" });
  });

  it("rejects a callback without a code", async () => {
    const result = await completeMicrosoftLogin({}, deps);

    expect(result).toEqual({ type: "bad_request", message: "Authorization code is missing from callback" });
  });

  it("redirects with an error when the exchange fails", async () => {
    stubFetch([{ ...TOKEN_ROUTE, status: 400, body: { error: "invalid_grant" } }]);

    const result = await completeMicrosoftLogin({ code: "test-code" }, deps);

    expect(result).toEqual({ type: "redirect", location: "/?auth_status=error" });
  });
});
