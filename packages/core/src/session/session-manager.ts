import type { SessionPolicy } from "@keyshift/shared";
import {
  DEFAULT_SESSION_TTL_MS,
  MAX_SESSION_TTL_MS,
  SESSION_SLIDE_INTERVAL_MS,
} from "@keyshift/shared";
import { digestToken, generateSessionToken, generateUUIDv7 } from "../crypto/random.js";
import type { SqliteStore } from "../storage/sqlite-store.js";

export const DEFAULT_SESSION_POLICY: SessionPolicy = {
  ttlMs: DEFAULT_SESSION_TTL_MS,
  maxTtlMs: MAX_SESSION_TTL_MS,
};

/** A live session as seen by callers. The raw token is only known at start. */
export interface AuthSession {
  sessionId: string;
  principalId: string;
  createdAt: number;
  expiresAt: number;
}

export interface StartedSession extends AuthSession {
  token: string;
}

export interface StartOptions {
  /** Token the caller held before; it is ended so it cannot be reused. */
  replaceToken?: string;
}

/**
 * Maps opaque session tokens to principals.
 *
 * - Only the SHA-256 digest of a token is stored.
 * - Sliding window TTL with absolute ceiling.
 * - Expired rows are deleted when seen and on every start.
 */
export class SessionManager {
  constructor(
    private readonly store: SqliteStore,
    private readonly policy: SessionPolicy = DEFAULT_SESSION_POLICY,
  ) {}

  start(principalId: string, options: StartOptions = {}): StartedSession {
    if (options.replaceToken) {
      this.end(options.replaceToken);
    }
    this.purgeExpired();

    const now = Date.now();
    const token = generateSessionToken();
    const record = {
      token_hash: digestToken(token),
      session_id: generateUUIDv7(),
      principal_id: principalId,
      created_at: now,
      expires_at: now + this.policy.ttlMs,
      max_expires_at: now + this.policy.maxTtlMs,
    };
    this.store.insertSession(record);

    return {
      token,
      sessionId: record.session_id,
      principalId,
      createdAt: now,
      expiresAt: record.expires_at,
    };
  }

  /**
   * Resolve a token. Returns null if absent, unknown or expired.
   * A live session is extended to min(now + ttl, max_expires_at).
   */
  current(token: string | undefined): AuthSession | null {
    if (!token) return null;

    const tokenHash = digestToken(token);
    const session = this.store.getSession(tokenHash);
    if (!session) return null;

    const now = Date.now();
    if (now >= session.expires_at) {
      this.store.deleteSession(tokenHash);
      return null;
    }

    let expiresAt = session.expires_at;
    const extended = Math.min(now + this.policy.ttlMs, session.max_expires_at);

    // Skip the write when the extension is negligible
    if (extended - session.expires_at >= SESSION_SLIDE_INTERVAL_MS) {
      this.store.updateSessionExpiry(tokenHash, extended);
      expiresAt = extended;
    }

    return {
      sessionId: session.session_id,
      principalId: session.principal_id,
      createdAt: session.created_at,
      expiresAt,
    };
  }

  /** End a session. Returns true if the token named a live session. */
  end(token: string | undefined): boolean {
    if (!token) return false;

    const tokenHash = digestToken(token);
    const session = this.store.getSession(tokenHash);
    if (!session) return false;

    this.store.deleteSession(tokenHash);
    return Date.now() < session.expires_at;
  }

  purgeExpired(): number {
    return this.store.deleteExpiredSessions(Date.now());
  }
}
