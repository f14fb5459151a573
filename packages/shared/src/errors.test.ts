import { describe, expect, it } from "vitest";

import { AuthError, ErrorCode } from "./errors.js";

describe("AuthError", () => {
  it("is an instance of Error", () => {
    const err = new AuthError(ErrorCode.INTERNAL_ERROR, "test");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AuthError);
  });

  it("preserves code, message, and statusCode", () => {
    const err = new AuthError(ErrorCode.PRINCIPAL_NOT_FOUND, "gone");
    expect(err.code).toBe(ErrorCode.PRINCIPAL_NOT_FOUND);
    expect(err.message).toBe("gone");
    expect(err.statusCode).toBe(404);
    expect(err.name).toBe("AuthError");
  });

  it("preserves details", () => {
    const err = new AuthError(ErrorCode.INTERNAL_ERROR, "oops", { key: "value" });
    expect(err.details).toEqual({ key: "value" });
  });

  it("has undefined details when not provided", () => {
    const err = new AuthError(ErrorCode.INTERNAL_ERROR, "oops");
    expect(err.details).toBeUndefined();
  });

  it("classifies 4xx codes as client errors", () => {
    expect(AuthError.rateLimited(1_000).isClientError).toBe(true);
    expect(AuthError.unauthorized().isClientError).toBe(true);
    expect(AuthError.storeFailure().isClientError).toBe(false);
  });
});

describe("HTTP status mapping", () => {
  it.each([
    [ErrorCode.VALIDATION_FAILED, 400],
    [ErrorCode.SCHEMA_VALIDATION_ERROR, 400],
    [ErrorCode.UNKNOWN_ACTION, 400],
    [ErrorCode.UNAUTHORIZED, 401],
    [ErrorCode.INVALID_CREDENTIALS, 401],
    [ErrorCode.RATE_LIMITED, 429],
    [ErrorCode.PRINCIPAL_NOT_FOUND, 404],
    [ErrorCode.DUPLICATE_PRINCIPAL, 409],
    [ErrorCode.STORE_FAILURE, 500],
    [ErrorCode.HASH_ERROR, 500],
    [ErrorCode.CONFIG_ERROR, 500],
    [ErrorCode.INTERNAL_ERROR, 500],
  ] as const)("%s → %d", (code, expected) => {
    const err = new AuthError(code, "test");
    expect(err.statusCode).toBe(expected);
  });

  it("covers all ErrorCode members", () => {
    const members = Object.values(ErrorCode).filter((v) => typeof v === "string");
    expect(members).toHaveLength(12);
  });
});

describe("factory methods", () => {
  it("validation() carries the reason", () => {
    const err = AuthError.validation("mismatch", "New password and confirmation do not match.");
    expect(err.code).toBe(ErrorCode.VALIDATION_FAILED);
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe("New password and confirmation do not match.");
    expect(err.details).toEqual({ reason: "mismatch" });
  });

  it("validation() merges extra details after the reason", () => {
    const err = AuthError.validation("complexity", "weak", { state: "rotation_rejected" });
    expect(err.details).toEqual({ reason: "complexity", state: "rotation_rejected" });
  });

  it("schemaValidation()", () => {
    const err = AuthError.schemaValidation("identity: Expected string, received number");
    expect(err.code).toBe(ErrorCode.SCHEMA_VALIDATION_ERROR);
    expect(err.message).toBe("identity: Expected string, received number");
  });

  it("unknownAction() with action name", () => {
    const err = AuthError.unknownAction("noop");
    expect(err.code).toBe(ErrorCode.UNKNOWN_ACTION);
    expect(err.message).toBe("Unknown action");
    expect(err.details).toEqual({ action: "noop" });
  });

  it("unknownAction() without action name", () => {
    const err = AuthError.unknownAction();
    expect(err.details).toBeUndefined();
  });

  it("unauthorized()", () => {
    const err = AuthError.unauthorized();
    expect(err.code).toBe(ErrorCode.UNAUTHORIZED);
    expect(err.statusCode).toBe(401);
    expect(err.message).toBe("Unauthorized");
  });

  it("invalidCredentials() default message", () => {
    const err = AuthError.invalidCredentials();
    expect(err.code).toBe(ErrorCode.INVALID_CREDENTIALS);
    expect(err.message).toBe("Invalid credentials");
  });

  it("invalidCredentials() custom message", () => {
    expect(AuthError.invalidCredentials("Old PIN is incorrect.").message).toBe(
      "Old PIN is incorrect.",
    );
  });

  it("invalidCredentials() with details", () => {
    const err = AuthError.invalidCredentials("Old PIN is incorrect.", { reason: "pin" });
    expect(err.details).toEqual({ reason: "pin" });
  });

  it("rateLimited() includes retry_after_ms", () => {
    const err = AuthError.rateLimited(30_000);
    expect(err.code).toBe(ErrorCode.RATE_LIMITED);
    expect(err.statusCode).toBe(429);
    expect(err.message).toBe("Too many attempts. Try again later.");
    expect(err.details).toEqual({ retry_after_ms: 30_000 });
  });

  it("principalNotFound() with and without id", () => {
    expect(AuthError.principalNotFound().message).toBe("Principal not found");
    expect(AuthError.principalNotFound("demo").message).toBe("Principal not found: demo");
  });

  it("duplicatePrincipal()", () => {
    const err = AuthError.duplicatePrincipal("demo");
    expect(err.code).toBe(ErrorCode.DUPLICATE_PRINCIPAL);
    expect(err.statusCode).toBe(409);
    expect(err.message).toBe("Principal already exists: demo");
  });

  it("storeFailure() with and without detail", () => {
    expect(AuthError.storeFailure().message).toBe("Store failure");
    const err = AuthError.storeFailure("disk I/O error");
    expect(err.code).toBe(ErrorCode.STORE_FAILURE);
    expect(err.message).toBe("Store failure: disk I/O error");
  });

  it("storeTimeout() is a store failure", () => {
    const err = AuthError.storeTimeout();
    expect(err.code).toBe(ErrorCode.STORE_FAILURE);
    expect(err.statusCode).toBe(500);
    expect(err.details).toEqual({ timeout: true });
  });

  it("hashError()", () => {
    const err = AuthError.hashError("pchstr must contain a $ as first char");
    expect(err.code).toBe(ErrorCode.HASH_ERROR);
    expect(err.message).toBe("Hash error: pchstr must contain a $ as first char");
  });

  it("configError()", () => {
    const err = AuthError.configError("bad port");
    expect(err.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(err.message).toBe("bad port");
  });

  it("internalError()", () => {
    const err = AuthError.internalError("unexpected failure");
    expect(err.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(err.statusCode).toBe(500);
  });
});
