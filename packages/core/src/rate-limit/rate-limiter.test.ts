import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SqliteStore } from "../storage/sqlite-store.js";
import { RateLimiter } from "./rate-limiter.js";

const WINDOW = 900_000;
const T0 = new Date("2026-01-01T00:00:00Z").getTime();

let store: SqliteStore;
let limiter: RateLimiter;

function fail(times: number, origin: string, principalId?: string): void {
  for (let i = 0; i < times; i++) limiter.recordFailure(origin, principalId);
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(T0);
  store = new SqliteStore(":memory:");
  limiter = new RateLimiter(store, { maxAttempts: 5, windowMs: WINDOW });
});

afterEach(() => {
  store.close();
  vi.useRealTimers();
});

describe("isBlocked", () => {
  it("allows a clean origin", () => {
    expect(limiter.isBlocked("10.0.0.1", "demo")).toBe(false);
  });

  it("blocks an origin at the threshold, not before", () => {
    fail(4, "10.0.0.1");
    expect(limiter.isBlocked("10.0.0.1")).toBe(false);

    fail(1, "10.0.0.1");
    expect(limiter.isBlocked("10.0.0.1")).toBe(true);
    expect(limiter.isBlocked("10.0.0.2")).toBe(false);
  });

  it("blocks a principal across origins", () => {
    fail(1, "10.0.0.1", "demo");
    fail(1, "10.0.0.2", "demo");
    fail(1, "10.0.0.3", "demo");
    fail(1, "10.0.0.4", "demo");
    fail(1, "10.0.0.5", "demo");

    expect(limiter.isBlocked("10.0.0.9", "demo")).toBe(true);
    expect(limiter.isBlocked("10.0.0.9", "other")).toBe(false);
    expect(limiter.isBlocked("10.0.0.9")).toBe(false);
  });

  it("unblocks once failures leave the window", () => {
    fail(5, "10.0.0.1", "demo");

    vi.setSystemTime(T0 + WINDOW - 1);
    expect(limiter.isBlocked("10.0.0.1", "demo")).toBe(true);

    vi.setSystemTime(T0 + WINDOW);
    expect(limiter.isBlocked("10.0.0.1", "demo")).toBe(false);
  });
});

describe("check", () => {
  it("reports both counts and the wait until unblock", () => {
    fail(3, "10.0.0.1", "demo");
    vi.setSystemTime(T0 + 60_000);
    fail(2, "10.0.0.1", "demo");
    vi.setSystemTime(T0 + 120_000);

    expect(limiter.check("10.0.0.1", "demo")).toEqual({
      blocked: true,
      originFailures: 5,
      principalFailures: 5,
      retryAfterMs: WINDOW - 120_000,
    });
  });

  it("waits for enough failures to expire when over the threshold", () => {
    fail(2, "10.0.0.1");
    vi.setSystemTime(T0 + 60_000);
    fail(4, "10.0.0.1");

    // 6 failures: both T0 rows must expire to fall below 5.
    expect(limiter.check("10.0.0.1").retryAfterMs).toBe(WINDOW - 60_000);
  });

  it("reports zero wait when not blocked", () => {
    fail(2, "10.0.0.1", "demo");
    expect(limiter.check("10.0.0.1", "demo")).toEqual({
      blocked: false,
      originFailures: 2,
      principalFailures: 2,
      retryAfterMs: 0,
    });
  });
});

describe("recordFailure", () => {
  it("compacts rows that left the window", () => {
    fail(3, "10.0.0.1");
    vi.setSystemTime(T0 + WINDOW + 1);
    fail(1, "10.0.0.2");

    const rows = store.db.prepare("SELECT COUNT(*) AS n FROM failed_attempts").get() as {
      n: number;
    };
    expect(rows.n).toBe(1);
  });

  it("records anonymous failures against the origin only", () => {
    fail(1, "10.0.0.1");
    expect(limiter.check("10.0.0.1", "demo").principalFailures).toBe(0);
  });
});

describe("reset", () => {
  it("clears principal failures but leaves anonymous origin failures", () => {
    fail(5, "10.0.0.1", "demo");
    fail(2, "10.0.0.1");

    limiter.reset("demo");

    expect(limiter.check("10.0.0.1", "demo")).toEqual({
      blocked: false,
      originFailures: 2,
      principalFailures: 0,
      retryAfterMs: 0,
    });
  });
});
