import type { AuditEvent, AuditEventKind } from "@keyshift/shared";
import type { AuditFilter, SqliteStore } from "../storage/sqlite-store.js";

export interface AuditQueryOptions {
  principalId?: string;
  eventKind?: AuditEventKind;
  since?: number;
  until?: number;
  limit?: number;
}

/**
 * Read side of the audit trail, oldest event first.
 */
export class AuditQuery {
  constructor(private readonly store: SqliteStore) {}

  list(options?: AuditQueryOptions): AuditEvent[] {
    const filter: AuditFilter = {
      principalId: options?.principalId,
      eventKind: options?.eventKind,
      since: options?.since,
      until: options?.until,
      limit: options?.limit,
    };

    return this.store.queryAuditLog(filter);
  }

  /** Event kinds for one principal, in the order they happened. */
  kindsFor(principalId: string): AuditEventKind[] {
    return this.list({ principalId }).map((event) => event.event_kind);
  }
}
