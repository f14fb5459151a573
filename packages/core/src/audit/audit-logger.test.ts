import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuditEventKind } from "@keyshift/shared";
import { SqliteStore } from "../storage/sqlite-store.js";
import { AuditLogger } from "./audit-logger.js";

let store: SqliteStore;
let logger: AuditLogger;

beforeEach(() => {
  store = new SqliteStore(":memory:");
  logger = new AuditLogger(store);
});

afterEach(() => {
  store.close();
  vi.useRealTimers();
});

describe("AuditLogger", () => {
  it("appends an event and returns its ID", () => {
    const id = logger.append({
      principalId: "demo",
      eventKind: AuditEventKind.LOGIN_SUCCESS,
      origin: "10.0.0.1",
    });

    expect(id).toBeGreaterThan(0);
  });

  it("stores every field with the current time", () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(1_700_000_000_000);

    const id = logger.append({
      principalId: "demo",
      eventKind: AuditEventKind.PASSWORD_CHANGE_FAILED_MISMATCH,
      origin: "10.0.0.1",
      userAgent: "test-agent/1.0",
    });

    expect(store.queryAuditLog()).toEqual([
      {
        id,
        principal_id: "demo",
        event_kind: "password_change_failed_mismatch",
        origin: "10.0.0.1",
        user_agent: "test-agent/1.0",
        created_at: 1_700_000_000_000,
      },
    ]);
  });

  it("stores a null user agent when none is given", () => {
    logger.append({ principalId: "demo", eventKind: AuditEventKind.LOGOUT, origin: "unknown" });
    expect(store.queryAuditLog()[0]?.user_agent).toBeNull();
  });

  it("assigns strictly increasing IDs", () => {
    const a = logger.append({ principalId: "a", eventKind: AuditEventKind.LOGOUT, origin: "unknown" });
    const b = logger.append({ principalId: "b", eventKind: AuditEventKind.LOGOUT, origin: "unknown" });
    expect(b).toBe(a + 1);
  });
});
