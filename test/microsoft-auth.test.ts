import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MicrosoftAuth, parseRecordState, recordState } from "../src/auth/microsoft.js";
import { TokenStore } from "../src/auth/token-store.js";
import { DbClient } from "../src/db.js";
import { AuthRequiredError } from "../src/errors.js";
import { createSilentLogger } from "../src/logger.js";
import { stubFetch } from "./helpers/fake-fetch.js";

const NOW = 1_800_000_000_000;
const TOKEN_URL = "https://login.microsoftonline.com/common/oauth2/v2.0/token";
const PROBE_URL = "https://graph.microsoft.com/v1.0/me?$select=id";

describe("record state", () => {
  it("round-trips a record key", () => {
    const state = recordState({ kind: "project", name: "PROJ-0007" });
    expect(state).toBe("from_record::project::PROJ-0007");
    expect(parseRecordState(state)).toEqual({ kind: "project", name: "PROJ-0007" });
  });

  it("ignores other states", () => {
    expect(parseRecordState(undefined)).toBeNull();
    expect(parseRecordState("random")).toBeNull();
    expect(parseRecordState("from_record::invoice::INV-1")).toBeNull();
  });
});

describe("MicrosoftAuth", () => {
  let db: DbClient;
  let tokenStore: TokenStore;
  let auth: MicrosoftAuth;

  beforeEach(() => {
    db = new DbClient(":memory:");
    tokenStore = new TokenStore(db, "test-secret-key-1", createSilentLogger());
    auth = new MicrosoftAuth(
      {
        clientId: "test-client",
        clientSecret: "test-secret",
        tenantId: "common",
        redirectUri: "https://bridge.example.test/auth/microsoft/callback",
      },
      tokenStore,
      createSilentLogger(),
      () => NOW,
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    db.close();
  });

  it("builds the authorization URL", () => {
    const url = new URL(auth.getAuthorizationUrl("from_record::event::EV-1"));

    expect(url.origin + url.pathname).toBe(
      "https://login.microsoftonline.com/common/oauth2/v2.0/authorize",
    );
    expect(url.searchParams.get("client_id")).toBe("test-client");
    expect(url.searchParams.get("response_mode")).toBe("query");
    expect(url.searchParams.get("scope")).toBe(
      "offline_access User.Read Calendars.ReadWrite OnlineMeetings.ReadWrite",
    );
    expect(url.searchParams.get("state")).toBe("from_record::event::EV-1");
  });

  it("hands out a stored token that is still valid", async () => {
    const { fetchMock } = stubFetch([]);
    tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW + 60_000 });

    await expect(auth.getAccessToken()).resolves.toBe("at-1");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("refreshes a token close to expiry", async () => {
    const { calls } = stubFetch([
      { method: "POST", url: TOKEN_URL, body: { access_token: "at-2", expires_in: 3600 } },
    ]);
    tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW + 10_000 });

    await expect(auth.getAccessToken()).resolves.toBe("at-2");
    expect(String(calls[0]?.body)).toContain("grant_type=refresh_token");
    expect(tokenStore.get()).toEqual({
      accessToken: "at-2",
      refreshToken: "rt-1",
      expiresAt: NOW + 3_300_000,
      scope: undefined,
    });
  });

  it("returns null when the refresh is refused", async () => {
    stubFetch([{ method: "POST", url: TOKEN_URL, status: 400, body: { error: "invalid_grant" } }]);
    tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW - 1 });

    await expect(auth.getAccessToken()).resolves.toBeNull();
  });

  it("throws with a login link when a token is required", async () => {
    const failure = await auth.requireAccessToken("from_record::event::EV-1").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(AuthRequiredError);
    if (failure instanceof AuthRequiredError) {
      expect(failure.loginUrl).toContain("state=from_record%3A%3Aevent%3A%3AEV-1");
    }
  });

  it("exchanges an authorization code and stores the token", async () => {
    const { calls } = stubFetch([
      {
        method: "POST",
        url: TOKEN_URL,
        body: { access_token: "at-9", refresh_token: "rt-9", expires_in: 600, scope: "User.Read" },
      },
    ]);

    await auth.exchangeCode("test-code");

    expect(String(calls[0]?.body)).toContain("code=test-code");
    expect(tokenStore.get()).toEqual({
      accessToken: "at-9",
      refreshToken: "rt-9",
      expiresAt: NOW + 300_000,
      scope: "User.Read",
    });
  });

  it("turns a refused exchange into an authentication error", async () => {
    stubFetch([{ method: "POST", url: TOKEN_URL, status: 400, body: { error: "invalid_grant" } }]);

    await expect(auth.exchangeCode("test-code")).rejects.toBeInstanceOf(AuthRequiredError);
  });

  describe("getAuthenticationStatus", () => {
    it("reports a missing token", async () => {
      await expect(auth.getAuthenticationStatus()).resolves.toEqual({
        authenticated: false,
        message: "No access token found",
      });
    });

    it("reports an expired token", async () => {
      tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW - 1 });

      await expect(auth.getAuthenticationStatus()).resolves.toEqual({
        authenticated: false,
        message: "Token expired",
      });
    });

    it("probes the profile endpoint", async () => {
      stubFetch([{ method: "GET", url: PROBE_URL, body: { id: "oid-1" } }]);
      tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW + 60_000 });

      await expect(auth.getAuthenticationStatus()).resolves.toEqual({
        authenticated: true,
        message: "Authentication successful",
      });
    });

    it("reports a rejected token", async () => {
      stubFetch([{ method: "GET", url: PROBE_URL, status: 401, body: { error: "unauthorized" } }]);
      tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW + 60_000 });

      await expect(auth.getAuthenticationStatus()).resolves.toEqual({
        authenticated: false,
        message: "Token validation failed",
      });
    });
  });

  it("revokes the stored token", () => {
    tokenStore.save({ accessToken: "at-1", refreshToken: "rt-1", expiresAt: NOW + 60_000 });

    expect(auth.revoke()).toBe(true);
    expect(tokenStore.get()).toBeUndefined();
  });
});
