import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export interface TokenRow {
  token_key: string;
  access_token: string;
  refresh_token: string;
  expiry_ts: number;
  scopes: string | null;
  updated_at: string;
}

export interface RecordRow {
  kind: string;
  name: string;
  owner: string | null;
  fieldsJson: string;
  remoteEventId: string | null;
  meetingUrl: string | null;
  updatedAt: string;
}

export interface ParticipantRow {
  position: number;
  identity: string;
  userId: string | null;
  attending: string | null;
}

export interface DirectoryUserRow {
  email: string;
  objectId: string;
  displayName: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS oauth_tokens (
    token_key TEXT PRIMARY KEY,
    access_token TEXT NOT NULL,
    refresh_token TEXT NOT NULL,
    expiry_ts INTEGER NOT NULL,
    scopes TEXT,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS integration_state (
    deployment_id TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    PRIMARY KEY (deployment_id, key)
  );

  CREATE TABLE IF NOT EXISTS meeting_records (
    kind TEXT NOT NULL,
    name TEXT NOT NULL,
    owner TEXT,
    fields_json TEXT NOT NULL DEFAULT '{}',
    remote_event_id TEXT,
    meeting_url TEXT,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (kind, name)
  );

  CREATE INDEX IF NOT EXISTS idx_meeting_records_remote_event_id
    ON meeting_records(remote_event_id);

  CREATE TABLE IF NOT EXISTS meeting_participants (
    kind TEXT NOT NULL,
    name TEXT NOT NULL,
    position INTEGER NOT NULL,
    identity TEXT NOT NULL,
    user_id TEXT,
    attending TEXT,
    PRIMARY KEY (kind, name, position),
    FOREIGN KEY (kind, name) REFERENCES meeting_records(kind, name) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS directory_users (
    email TEXT PRIMARY KEY,
    object_id TEXT NOT NULL,
    display_name TEXT,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_directory_users_object_id
    ON directory_users(object_id);
`;

const RECORD_COLUMNS = `
  kind,
  name,
  owner,
  fields_json AS fieldsJson,
  remote_event_id AS remoteEventId,
  meeting_url AS meetingUrl,
  updated_at AS updatedAt
`;

export class DbClient {
  private readonly db: Database.Database;

  constructor(sqlitePath: string) {
    if (sqlitePath !== ":memory:") {
      fs.mkdirSync(path.dirname(sqlitePath), { recursive: true });
    }
    this.db = new Database(sqlitePath);
    if (sqlitePath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate() {
    this.db.exec("BEGIN");
    try {
      this.db.exec(SCHEMA);
      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  close() {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getToken(tokenKey = "default"): TokenRow | undefined {
    const stmt = this.db.prepare(`
      SELECT token_key, access_token, refresh_token, expiry_ts, scopes, updated_at
      FROM oauth_tokens
      WHERE token_key = ?
    `);
    return stmt.get(tokenKey) as TokenRow | undefined;
  }

  upsertToken(row: TokenRow) {
    const stmt = this.db.prepare(`
      INSERT INTO oauth_tokens (token_key, access_token, refresh_token, expiry_ts, scopes, updated_at)
      VALUES (@token_key, @access_token, @refresh_token, @expiry_ts, @scopes, @updated_at)
      ON CONFLICT(token_key) DO UPDATE SET
        access_token = excluded.access_token,
        refresh_token = excluded.refresh_token,
        expiry_ts = excluded.expiry_ts,
        scopes = excluded.scopes,
        updated_at = excluded.updated_at
    `);
    stmt.run(row);
  }

  deleteToken(tokenKey = "default"): number {
    return this.db.prepare(`DELETE FROM oauth_tokens WHERE token_key = ?`).run(tokenKey).changes;
  }

  getState(deploymentId: string, key: string): string | undefined {
    const stmt = this.db.prepare(`
      SELECT value
      FROM integration_state
      WHERE deployment_id = ? AND key = ?
    `);
    const row = stmt.get(deploymentId, key) as { value: string } | undefined;
    return row?.value;
  }

  setState(deploymentId: string, key: string, value: string) {
    const stmt = this.db.prepare(`
      INSERT INTO integration_state (deployment_id, key, value)
      VALUES (?, ?, ?)
      ON CONFLICT(deployment_id, key) DO UPDATE SET value = excluded.value
    `);
    stmt.run(deploymentId, key, value);
  }

  getRecord(kind: string, name: string): RecordRow | undefined {
    const stmt = this.db.prepare(`
      SELECT ${RECORD_COLUMNS}
      FROM meeting_records
      WHERE kind = ? AND name = ?
    `);
    return stmt.get(kind, name) as RecordRow | undefined;
  }

  findRecordsByRemoteEventId(remoteEventId: string): RecordRow[] {
    const stmt = this.db.prepare(`
      SELECT ${RECORD_COLUMNS}
      FROM meeting_records
      WHERE remote_event_id = ?
      ORDER BY kind, name
    `);
    return stmt.all(remoteEventId) as RecordRow[];
  }

  upsertRecord(row: RecordRow) {
    const stmt = this.db.prepare(`
      INSERT INTO meeting_records (kind, name, owner, fields_json, remote_event_id, meeting_url, updated_at)
      VALUES (@kind, @name, @owner, @fieldsJson, @remoteEventId, @meetingUrl, @updatedAt)
      ON CONFLICT(kind, name) DO UPDATE SET
        owner = excluded.owner,
        fields_json = excluded.fields_json,
        remote_event_id = excluded.remote_event_id,
        meeting_url = excluded.meeting_url,
        updated_at = excluded.updated_at
    `);
    stmt.run(row);
  }

  listParticipants(kind: string, name: string): ParticipantRow[] {
    const stmt = this.db.prepare(`
      SELECT position, identity, user_id AS userId, attending
      FROM meeting_participants
      WHERE kind = ? AND name = ?
      ORDER BY position
    `);
    return stmt.all(kind, name) as ParticipantRow[];
  }

  replaceParticipants(kind: string, name: string, rows: ParticipantRow[]) {
    this.db.prepare(`DELETE FROM meeting_participants WHERE kind = ? AND name = ?`).run(kind, name);
    const insert = this.db.prepare(`
      INSERT INTO meeting_participants (kind, name, position, identity, user_id, attending)
      VALUES (@kind, @name, @position, @identity, @userId, @attending)
    `);
    for (const row of rows) {
      insert.run({ kind, name, ...row });
    }
  }

  getDirectoryUserByEmail(email: string): DirectoryUserRow | undefined {
    const stmt = this.db.prepare(`
      SELECT email, object_id AS objectId, display_name AS displayName
      FROM directory_users
      WHERE email = ?
    `);
    return stmt.get(email.toLowerCase()) as DirectoryUserRow | undefined;
  }

  getDirectoryUserByObjectId(objectId: string): DirectoryUserRow | undefined {
    const stmt = this.db.prepare(`
      SELECT email, object_id AS objectId, display_name AS displayName
      FROM directory_users
      WHERE object_id = ?
    `);
    return stmt.get(objectId) as DirectoryUserRow | undefined;
  }

  upsertDirectoryUser(row: DirectoryUserRow) {
    const stmt = this.db.prepare(`
      INSERT INTO directory_users (email, object_id, display_name, updated_at)
      VALUES (@email, @objectId, @displayName, @updatedAt)
      ON CONFLICT(email) DO UPDATE SET
        object_id = excluded.object_id,
        display_name = COALESCE(excluded.display_name, directory_users.display_name),
        updated_at = excluded.updated_at
    `);
    stmt.run({ ...row, email: row.email.toLowerCase(), updatedAt: new Date().toISOString() });
  }
}
