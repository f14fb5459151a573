import { describe, expect, it } from "vitest";

import {
  ARGON2_MEMORY_COST,
  ARGON2_PARALLELISM,
  ARGON2_TIME_COST,
  DEFAULT_SESSION_TTL_MS,
  MAX_SESSION_TTL_MS,
  PASSWORD_MIN_LENGTH,
  RATE_LIMIT_MAX_ATTEMPTS,
  RATE_LIMIT_WINDOW_MS,
  SESSION_SLIDE_INTERVAL_MS,
  SQLITE_PRAGMAS,
  UNKNOWN_ORIGIN,
} from "./constants.js";

describe("rate limit defaults", () => {
  it("allows 5 failures", () => {
    expect(RATE_LIMIT_MAX_ATTEMPTS).toBe(5);
  });

  it("counts failures over 15 minutes", () => {
    expect(RATE_LIMIT_WINDOW_MS).toBe(900_000);
  });

  it("uses a fixed bucket name for unknown origins", () => {
    expect(UNKNOWN_ORIGIN).toBe("unknown");
  });
});

describe("session timing", () => {
  it("default TTL is 15 minutes", () => {
    expect(DEFAULT_SESSION_TTL_MS).toBe(900_000);
  });

  it("absolute ceiling is 24 hours", () => {
    expect(MAX_SESSION_TTL_MS).toBe(86_400_000);
  });

  it("slide interval is shorter than the TTL", () => {
    expect(SESSION_SLIDE_INTERVAL_MS).toBeLessThan(DEFAULT_SESSION_TTL_MS);
  });
});

describe("argon2 defaults", () => {
  it("uses 64 MB, 3 iterations, 4 lanes", () => {
    expect(ARGON2_MEMORY_COST).toBe(65_536);
    expect(ARGON2_TIME_COST).toBe(3);
    expect(ARGON2_PARALLELISM).toBe(4);
  });
});

describe("password policy", () => {
  it("requires at least 8 characters", () => {
    expect(PASSWORD_MIN_LENGTH).toBe(8);
  });
});

describe("SQLITE_PRAGMAS", () => {
  it("enables WAL, foreign keys and full sync", () => {
    expect(SQLITE_PRAGMAS).toEqual({
      journal_mode: "WAL",
      foreign_keys: "ON",
      synchronous: "FULL",
    });
  });
});
