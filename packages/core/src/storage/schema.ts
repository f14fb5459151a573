/** DDL constants for the v1 credential database schema. */

export const CREATE_STORE_META = `
CREATE TABLE IF NOT EXISTS store_meta (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
) STRICT;
`;

export const CREATE_PRINCIPALS = `
CREATE TABLE IF NOT EXISTS principals (
  id         TEXT PRIMARY KEY,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
) STRICT;
`;

export const CREATE_CREDENTIALS = `
CREATE TABLE IF NOT EXISTS credentials (
  principal_id TEXT NOT NULL REFERENCES principals(id) ON DELETE CASCADE,
  kind         TEXT NOT NULL CHECK (kind IN ('pin', 'password')),
  secret_hash  TEXT NOT NULL,
  updated_at   INTEGER NOT NULL,
  PRIMARY KEY (principal_id, kind)
) STRICT;
`;

// No foreign key: failed logins for identities that do not exist are audited too.
export const CREATE_AUDIT_LOG = `
CREATE TABLE IF NOT EXISTS audit_log (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  principal_id TEXT NOT NULL,
  event_kind   TEXT NOT NULL,
  origin       TEXT NOT NULL,
  user_agent   TEXT,
  created_at   INTEGER NOT NULL
) STRICT;
`;

export const CREATE_AUDIT_LOG_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_audit_principal ON audit_log (principal_id, id);
CREATE INDEX IF NOT EXISTS idx_audit_created_at ON audit_log (created_at);
`;

export const CREATE_FAILED_ATTEMPTS = `
CREATE TABLE IF NOT EXISTS failed_attempts (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  principal_id TEXT,
  origin       TEXT NOT NULL,
  created_at   INTEGER NOT NULL
) STRICT;
`;

export const CREATE_FAILED_ATTEMPTS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_failed_origin ON failed_attempts (origin, created_at);
CREATE INDEX IF NOT EXISTS idx_failed_principal ON failed_attempts (principal_id, created_at);
`;

export const CREATE_SESSIONS = `
CREATE TABLE IF NOT EXISTS sessions (
  token_hash     TEXT PRIMARY KEY,
  session_id     TEXT NOT NULL,
  principal_id   TEXT NOT NULL REFERENCES principals(id) ON DELETE CASCADE,
  created_at     INTEGER NOT NULL,
  expires_at     INTEGER NOT NULL,
  max_expires_at INTEGER NOT NULL
) STRICT;
`;

export const CREATE_SESSIONS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions (expires_at);
CREATE INDEX IF NOT EXISTS idx_sessions_principal ON sessions (principal_id);
`;
