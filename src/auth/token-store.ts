import { openSecret, sealSecret } from "../crypto.js";
import type { DbClient } from "../db.js";
import type { Logger } from "../logger.js";
import type { OAuthToken } from "../types.js";

export class TokenStore {
  constructor(
    private readonly db: DbClient,
    private readonly encryptionKey: string,
    private readonly logger: Logger,
    private readonly tokenKey = "microsoft",
  ) {}

  get(): OAuthToken | undefined {
    const row = this.db.getToken(this.tokenKey);
    if (!row) {
      return undefined;
    }

    try {
      return {
        accessToken: openSecret(row.access_token, this.encryptionKey),
        refreshToken: openSecret(row.refresh_token, this.encryptionKey),
        expiresAt: row.expiry_ts,
        scope: row.scopes ?? undefined,
      };
    } catch (error) {
      this.logger.error({ tokenKey: this.tokenKey, err: error }, "Failed to decrypt token from storage");
      throw new Error("Unable to decrypt the stored Microsoft token. Check TOKEN_ENCRYPTION_KEY.");
    }
  }

  save(token: OAuthToken) {
    this.db.upsertToken({
      token_key: this.tokenKey,
      access_token: sealSecret(token.accessToken, this.encryptionKey),
      refresh_token: sealSecret(token.refreshToken, this.encryptionKey),
      expiry_ts: token.expiresAt,
      scopes: token.scope ?? null,
      updated_at: new Date().toISOString(),
    });
  }

  clear(): boolean {
    return this.db.deleteToken(this.tokenKey) > 0;
  }
}
