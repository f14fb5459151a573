import type { AuditEventKind } from "@keyshift/shared";
import type { SqliteStore } from "../storage/sqlite-store.js";

export interface AuditAppendOptions {
  principalId: string;
  eventKind: AuditEventKind;
  origin: string;
  userAgent?: string;
}

/**
 * Append-only writer for the audit trail. Events are never updated or deleted;
 * insertion order is the autoincrement id.
 */
export class AuditLogger {
  constructor(private readonly store: SqliteStore) {}

  append(options: AuditAppendOptions): number {
    const { principalId, eventKind, origin, userAgent } = options;

    return this.store.insertAuditEvent({
      principal_id: principalId,
      event_kind: eventKind,
      origin,
      user_agent: userAgent ?? null,
      created_at: Date.now(),
    });
  }
}
