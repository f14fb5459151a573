import { describe, expect, it } from "vitest";

import {
  AuditEventKind,
  AuthActionKind,
  CredentialKind,
  LOGIN_KIND,
  ROTATING_KIND,
  RotationFailureReason,
  RotationState,
  rotationFailureEvent,
} from "./types.js";

// ---------------------------------------------------------------------------
// Enum member counts guard the switches and zod enums built from them
// ---------------------------------------------------------------------------

describe("enum member counts", () => {
  it("CredentialKind has 2 members", () => {
    expect(Object.values(CredentialKind)).toHaveLength(2);
  });

  it("AuditEventKind has 9 members", () => {
    expect(Object.values(AuditEventKind)).toHaveLength(9);
  });

  it("RotationFailureReason has 5 members", () => {
    expect(Object.values(RotationFailureReason)).toHaveLength(5);
  });

  it("RotationState has 4 members", () => {
    expect(Object.values(RotationState)).toHaveLength(4);
  });

  it("AuthActionKind has 3 members", () => {
    expect(Object.values(AuthActionKind)).toHaveLength(3);
  });
});

describe("credential kinds", () => {
  it("logs in with the PIN and rotates the password", () => {
    expect(LOGIN_KIND).toBe("pin");
    expect(ROTATING_KIND).toBe("password");
  });
});

describe("rotationFailureEvent", () => {
  it.each([
    [RotationFailureReason.MISSING_FIELDS, "password_change_failed_missing_fields"],
    [RotationFailureReason.MISMATCH, "password_change_failed_mismatch"],
    [RotationFailureReason.TOO_SHORT, "password_change_failed_too_short"],
    [RotationFailureReason.COMPLEXITY, "password_change_failed_complexity"],
    [RotationFailureReason.PIN, "password_change_failed_pin"],
  ] as const)("%s → %s", (reason, expected) => {
    expect(rotationFailureEvent(reason)).toBe(expected);
  });

  it("every failure event starts with password_change_failed_", () => {
    for (const reason of Object.values(RotationFailureReason)) {
      expect(rotationFailureEvent(reason).startsWith("password_change_failed_")).toBe(true);
    }
  });
});
