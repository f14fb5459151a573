import Database from "better-sqlite3";
import type {
  AuditEvent,
  AuditEventKind,
  Credential,
  CredentialKind,
  Principal,
  SessionRecord,
} from "@keyshift/shared";
import { AuthError, DEFAULT_STORE_TIMEOUT_MS, SCHEMA_VERSION, SQLITE_PRAGMAS } from "@keyshift/shared";
import { migration001 } from "./migrations/001-initial.js";

/** Filters for querying the audit log. */
export interface AuditFilter {
  principalId?: string;
  eventKind?: AuditEventKind;
  since?: number;
  until?: number;
  limit?: number;
}

/** Which key of a failure row a count is taken over. */
export type FailureScope = "origin" | "principal";

const FAILURE_COLUMNS: Record<FailureScope, string> = {
  origin: "origin",
  principal: "principal_id",
};

export interface SqliteStoreOptions {
  /** How long a statement waits on a locked database before failing. */
  timeoutMs?: number;
}

export class SqliteStore {
  readonly db: Database.Database;

  constructor(path: string, options: SqliteStoreOptions = {}) {
    try {
      this.db = new Database(path, { timeout: options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS });
    } catch (err) {
      throw AuthError.storeFailure(
        `Failed to open database: ${err instanceof Error ? err.message : "unknown"}`,
      );
    }

    this.guard(() => {
      this.setPragmas();
      this.runMigrations();
    });
  }

  private setPragmas(): void {
    for (const [key, value] of Object.entries(SQLITE_PRAGMAS)) {
      this.db.pragma(`${key} = ${value}`);
    }
  }

  private runMigrations(): void {
    const currentVersion = this.getMigrationVersion();
    if (currentVersion < migration001.version) {
      this.db.transaction(() => {
        this.db.exec(migration001.up);
        this.setMeta("schema_version", String(SCHEMA_VERSION));
      })();
    }
  }

  private getMigrationVersion(): number {
    const row = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='store_meta'")
      .get() as { name: string } | undefined;

    if (!row) return 0;

    const version = this.getMeta("schema_version");
    return version ? parseInt(version, 10) : 0;
  }

  /**
   * Run a store operation, translating driver errors into AuthError.
   * A busy database past the configured timeout is reported as a timeout.
   */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof AuthError) throw err;
      if (err instanceof Database.SqliteError && err.code.startsWith("SQLITE_BUSY")) {
        throw AuthError.storeTimeout();
      }
      throw AuthError.storeFailure(err instanceof Error ? err.message : "unknown");
    }
  }

  // ---------------------------------------------------------------------------
  // store_meta
  // ---------------------------------------------------------------------------

  getMeta(key: string): string | undefined {
    return this.guard(() => {
      const row = this.db.prepare("SELECT value FROM store_meta WHERE key = ?").get(key) as
        | { value: string }
        | undefined;
      return row?.value;
    });
  }

  setMeta(key: string, value: string): void {
    this.guard(() => {
      this.db
        .prepare("INSERT OR REPLACE INTO store_meta (key, value) VALUES (?, ?)")
        .run(key, value);
    });
  }

  // ---------------------------------------------------------------------------
  // principals / credentials
  // ---------------------------------------------------------------------------

  insertPrincipal(principal: Principal): void {
    this.guard(() => {
      this.db
        .prepare("INSERT INTO principals (id, created_at, updated_at) VALUES (?, ?, ?)")
        .run(principal.id, principal.created_at, principal.updated_at);
    });
  }

  getPrincipal(id: string): Principal | undefined {
    return this.guard(() => {
      const row = this.db.prepare("SELECT * FROM principals WHERE id = ?").get(id) as
        | Record<string, unknown>
        | undefined;
      return row ? this.rowToPrincipal(row) : undefined;
    });
  }

  upsertCredential(credential: Credential): void {
    this.guard(() => {
      this.db
        .prepare(
          `INSERT INTO credentials (principal_id, kind, secret_hash, updated_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT (principal_id, kind)
           DO UPDATE SET secret_hash = excluded.secret_hash, updated_at = excluded.updated_at`,
        )
        .run(credential.principal_id, credential.kind, credential.secret_hash, credential.updated_at);
    });
  }

  getCredential(principalId: string, kind: CredentialKind): Credential | undefined {
    return this.guard(() => {
      const row = this.db
        .prepare("SELECT * FROM credentials WHERE principal_id = ? AND kind = ?")
        .get(principalId, kind) as Record<string, unknown> | undefined;
      return row ? this.rowToCredential(row) : undefined;
    });
  }

  /** Replace the hash of an existing credential. Returns false if there is none. */
  updateCredentialHash(
    principalId: string,
    kind: CredentialKind,
    secretHash: string,
    updatedAt: number,
  ): boolean {
    return this.guard(() => {
      const result = this.db
        .prepare(
          "UPDATE credentials SET secret_hash = ?, updated_at = ? WHERE principal_id = ? AND kind = ?",
        )
        .run(secretHash, updatedAt, principalId, kind);
      if (result.changes === 0) return false;

      this.db
        .prepare("UPDATE principals SET updated_at = ? WHERE id = ?")
        .run(updatedAt, principalId);
      return true;
    });
  }

  // ---------------------------------------------------------------------------
  // audit_log
  // ---------------------------------------------------------------------------

  insertAuditEvent(event: Omit<AuditEvent, "id">): number {
    return this.guard(() => {
      const result = this.db
        .prepare(
          `INSERT INTO audit_log (principal_id, event_kind, origin, user_agent, created_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(event.principal_id, event.event_kind, event.origin, event.user_agent, event.created_at);
      return Number(result.lastInsertRowid);
    });
  }

  queryAuditLog(filter?: AuditFilter): AuditEvent[] {
    let sql = "SELECT * FROM audit_log WHERE 1=1";
    const params: unknown[] = [];

    if (filter?.principalId !== undefined) {
      sql += " AND principal_id = ?";
      params.push(filter.principalId);
    }
    if (filter?.eventKind) {
      sql += " AND event_kind = ?";
      params.push(filter.eventKind);
    }
    if (filter?.since !== undefined) {
      sql += " AND created_at >= ?";
      params.push(filter.since);
    }
    if (filter?.until !== undefined) {
      sql += " AND created_at <= ?";
      params.push(filter.until);
    }

    sql += " ORDER BY id ASC";

    if (filter?.limit) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }

    return this.guard(() => {
      const rows = this.db.prepare(sql).all(...params) as Record<string, unknown>[];
      return rows.map((row) => this.rowToAuditEvent(row));
    });
  }

  // ---------------------------------------------------------------------------
  // failed_attempts
  // ---------------------------------------------------------------------------

  insertFailedAttempt(origin: string, principalId: string | null, createdAt: number): void {
    this.guard(() => {
      this.db
        .prepare("INSERT INTO failed_attempts (principal_id, origin, created_at) VALUES (?, ?, ?)")
        .run(principalId, origin, createdAt);
    });
  }

  /** Failures for one key strictly newer than `since`. */
  countFailures(scope: FailureScope, key: string, since: number): number {
    const column = FAILURE_COLUMNS[scope];
    return this.guard(() => {
      const row = this.db
        .prepare(`SELECT COUNT(*) AS n FROM failed_attempts WHERE ${column} = ? AND created_at > ?`)
        .get(key, since) as { n: number };
      return row.n;
    });
  }

  /** Timestamp of the failure at `offset` (oldest first) among those newer than `since`. */
  failureTimeAt(scope: FailureScope, key: string, since: number, offset: number): number | undefined {
    const column = FAILURE_COLUMNS[scope];
    return this.guard(() => {
      const row = this.db
        .prepare(
          `SELECT created_at FROM failed_attempts WHERE ${column} = ? AND created_at > ?
           ORDER BY created_at ASC, id ASC LIMIT 1 OFFSET ?`,
        )
        .get(key, since, offset) as { created_at: number } | undefined;
      return row?.created_at;
    });
  }

  deleteFailuresBefore(cutoff: number): number {
    return this.guard(
      () => this.db.prepare("DELETE FROM failed_attempts WHERE created_at <= ?").run(cutoff).changes,
    );
  }

  deleteFailuresForPrincipal(principalId: string): number {
    return this.guard(
      () =>
        this.db.prepare("DELETE FROM failed_attempts WHERE principal_id = ?").run(principalId)
          .changes,
    );
  }

  // ---------------------------------------------------------------------------
  // sessions
  // ---------------------------------------------------------------------------

  insertSession(session: SessionRecord): void {
    this.guard(() => {
      this.db
        .prepare(
          `INSERT INTO sessions (
            token_hash, session_id, principal_id, created_at, expires_at, max_expires_at
          ) VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          session.token_hash,
          session.session_id,
          session.principal_id,
          session.created_at,
          session.expires_at,
          session.max_expires_at,
        );
    });
  }

  getSession(tokenHash: string): SessionRecord | undefined {
    return this.guard(() => {
      const row = this.db.prepare("SELECT * FROM sessions WHERE token_hash = ?").get(tokenHash) as
        | Record<string, unknown>
        | undefined;
      return row ? this.rowToSession(row) : undefined;
    });
  }

  updateSessionExpiry(tokenHash: string, expiresAt: number): void {
    this.guard(() => {
      this.db
        .prepare("UPDATE sessions SET expires_at = ? WHERE token_hash = ?")
        .run(expiresAt, tokenHash);
    });
  }

  deleteSession(tokenHash: string): boolean {
    return this.guard(
      () => this.db.prepare("DELETE FROM sessions WHERE token_hash = ?").run(tokenHash).changes > 0,
    );
  }

  deleteExpiredSessions(now: number): number {
    return this.guard(
      () => this.db.prepare("DELETE FROM sessions WHERE expires_at <= ?").run(now).changes,
    );
  }

  // ---------------------------------------------------------------------------
  // Transaction helper
  // ---------------------------------------------------------------------------

  /** Run `fn` atomically. Any error rolls back every write made inside it. */
  transaction<T>(fn: () => T): T {
    return this.guard(() => this.db.transaction(fn)());
  }

  // ---------------------------------------------------------------------------
  // Close
  // ---------------------------------------------------------------------------

  close(): void {
    this.db.close();
  }

  // ---------------------------------------------------------------------------
  // Row mappers
  // ---------------------------------------------------------------------------

  private rowToPrincipal(row: Record<string, unknown>): Principal {
    return {
      id: row.id as string,
      created_at: row.created_at as number,
      updated_at: row.updated_at as number,
    };
  }

  private rowToCredential(row: Record<string, unknown>): Credential {
    return {
      principal_id: row.principal_id as string,
      kind: row.kind as CredentialKind,
      secret_hash: row.secret_hash as string,
      updated_at: row.updated_at as number,
    };
  }

  private rowToAuditEvent(row: Record<string, unknown>): AuditEvent {
    return {
      id: row.id as number,
      principal_id: row.principal_id as string,
      event_kind: row.event_kind as AuditEventKind,
      origin: row.origin as string,
      user_agent: (row.user_agent as string | null) ?? null,
      created_at: row.created_at as number,
    };
  }

  private rowToSession(row: Record<string, unknown>): SessionRecord {
    return {
      token_hash: row.token_hash as string,
      session_id: row.session_id as string,
      principal_id: row.principal_id as string,
      created_at: row.created_at as number,
      expires_at: row.expires_at as number,
      max_expires_at: row.max_expires_at as number,
    };
  }
}
