import type { Logger } from "../logger.js";
import { AuthRequiredError } from "../errors.js";
import {
  HttpError,
  PROBE_TIMEOUT_MS,
  formatErrorBody,
  requestJson,
  toFormBody,
} from "../http.js";
import type { OAuthToken, RecordKey } from "../types.js";
import { isRecordKind } from "../types.js";
import type { TokenStore } from "./token-store.js";

export const MICROSOFT_SCOPES = [
  "offline_access",
  "User.Read",
  "Calendars.ReadWrite",
  "OnlineMeetings.ReadWrite",
];

/** Refresh this long before the provider's stated expiry. */
const EXPIRY_SAFETY_MS = 5 * 60_000;
/** A stored token must stay valid at least this long to be handed out. */
const MIN_REMAINING_MS = 30_000;

const RECORD_STATE_PREFIX = "from_record::";

export interface MicrosoftAuthConfig {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  redirectUri: string;
}

/** Supplies a bearer token for Graph calls, or null when none can be had. */
export interface TokenProvider {
  getAccessToken(): Promise<string | null>;
}

export interface AuthenticationStatus {
  authenticated: boolean;
  message: string;
}

interface OAuthTokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
}

export function recordState(key: RecordKey): string {
  return `${RECORD_STATE_PREFIX}${key.kind}::${key.name}`;
}

export function parseRecordState(state: string | undefined): RecordKey | null {
  if (!state?.startsWith(RECORD_STATE_PREFIX)) {
    return null;
  }
  const rest = state.slice(RECORD_STATE_PREFIX.length);
  const separator = rest.indexOf("::");
  if (separator <= 0) {
    return null;
  }
  const kind = rest.slice(0, separator);
  const name = rest.slice(separator + 2);
  return isRecordKind(kind) && name ? { kind, name } : null;
}

export class MicrosoftAuth implements TokenProvider {
  constructor(
    private readonly config: MicrosoftAuthConfig,
    private readonly tokenStore: TokenStore,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  private get tokenEndpoint(): string {
    return `https://login.microsoftonline.com/${this.config.tenantId}/oauth2/v2.0/token`;
  }

  getAuthorizationUrl(state?: string): string {
    const url = new URL(
      `https://login.microsoftonline.com/${this.config.tenantId}/oauth2/v2.0/authorize`,
    );
    url.searchParams.set("client_id", this.config.clientId);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("redirect_uri", this.config.redirectUri);
    url.searchParams.set("response_mode", "query");
    url.searchParams.set("scope", MICROSOFT_SCOPES.join(" "));
    if (state) {
      url.searchParams.set("state", state);
    }
    return url.toString();
  }

  async exchangeCode(code: string): Promise<OAuthToken> {
    let response: OAuthTokenResponse;
    try {
      response = await requestJson<OAuthTokenResponse>(this.tokenEndpoint, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: toFormBody({
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          grant_type: "authorization_code",
          code,
          redirect_uri: this.config.redirectUri,
          scope: MICROSOFT_SCOPES.join(" "),
        }),
      });
    } catch (error) {
      if (error instanceof HttpError) {
        this.logger.error(
          { status: error.status, body: formatErrorBody(error.body) },
          "Microsoft token exchange failed",
        );
        throw new AuthRequiredError(
          "Failed to authenticate with Microsoft Teams. Please try again.",
          this.getAuthorizationUrl(),
        );
      }
      throw error;
    }

    const token = this.toStoredToken(response);
    this.tokenStore.save(token);
    this.logger.info("Microsoft authentication completed");
    return token;
  }

  async getAccessToken(): Promise<string | null> {
    const stored = this.tokenStore.get();
    if (!stored) {
      return null;
    }

    if (stored.expiresAt > this.now() + MIN_REMAINING_MS) {
      return stored.accessToken;
    }

    try {
      const refreshed = await requestJson<OAuthTokenResponse>(this.tokenEndpoint, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: toFormBody({
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          grant_type: "refresh_token",
          refresh_token: stored.refreshToken,
          scope: MICROSOFT_SCOPES.join(" "),
        }),
      });
      const token = this.toStoredToken(refreshed, stored.refreshToken);
      this.tokenStore.save(token);
      return token.accessToken;
    } catch (error) {
      this.logger.warn(
        {
          err: error,
          status: error instanceof HttpError ? error.status : undefined,
        },
        "Microsoft token refresh failed",
      );
      return null;
    }
  }

  /** Like {@link getAccessToken} but throws with a login link for interactive callers. */
  async requireAccessToken(state?: string): Promise<string> {
    const token = await this.getAccessToken();
    if (!token) {
      throw new AuthRequiredError(undefined, this.getAuthorizationUrl(state));
    }
    return token;
  }

  async getAuthenticationStatus(): Promise<AuthenticationStatus> {
    const stored = this.tokenStore.get();
    if (!stored) {
      return { authenticated: false, message: "No access token found" };
    }
    if (stored.expiresAt < this.now()) {
      return { authenticated: false, message: "Token expired" };
    }

    try {
      await requestJson<{ id: string }>(
        "https://graph.microsoft.com/v1.0/me?$select=id",
        { headers: { Authorization: `Bearer ${stored.accessToken}` } },
        PROBE_TIMEOUT_MS,
      );
      return { authenticated: true, message: "Authentication successful" };
    } catch (error) {
      if (error instanceof HttpError) {
        return { authenticated: false, message: "Token validation failed" };
      }
      this.logger.error({ err: error }, "Authentication status check failed");
      return { authenticated: false, message: "Authentication check failed" };
    }
  }

  revoke(): boolean {
    const removed = this.tokenStore.clear();
    this.logger.info({ removed }, "Microsoft authentication revoked");
    return removed;
  }

  private toStoredToken(response: OAuthTokenResponse, fallbackRefreshToken?: string): OAuthToken {
    const refreshToken = response.refresh_token ?? fallbackRefreshToken;
    if (!refreshToken) {
      throw new AuthRequiredError(
        "Microsoft token response missing refresh_token; check the offline_access scope",
        this.getAuthorizationUrl(),
      );
    }

    const expiresInMs = (response.expires_in ?? 3600) * 1000;
    return {
      accessToken: response.access_token,
      refreshToken,
      expiresAt: this.now() + expiresInMs - EXPIRY_SAFETY_MS,
      scope: response.scope,
    };
  }
}
