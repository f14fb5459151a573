// ---------------------------------------------------------------------------
// Error codes and AuthError class
// ---------------------------------------------------------------------------

export enum ErrorCode {
  // Validation
  VALIDATION_FAILED = "VALIDATION_FAILED",
  SCHEMA_VALIDATION_ERROR = "SCHEMA_VALIDATION_ERROR",
  UNKNOWN_ACTION = "UNKNOWN_ACTION",

  // Auth
  UNAUTHORIZED = "UNAUTHORIZED",
  INVALID_CREDENTIALS = "INVALID_CREDENTIALS",
  RATE_LIMITED = "RATE_LIMITED",

  // Principals
  PRINCIPAL_NOT_FOUND = "PRINCIPAL_NOT_FOUND",
  DUPLICATE_PRINCIPAL = "DUPLICATE_PRINCIPAL",

  // System
  STORE_FAILURE = "STORE_FAILURE",
  HASH_ERROR = "HASH_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

const STATUS_MAP: Record<ErrorCode, number> = {
  // Validation
  [ErrorCode.VALIDATION_FAILED]: 400,
  [ErrorCode.SCHEMA_VALIDATION_ERROR]: 400,
  [ErrorCode.UNKNOWN_ACTION]: 400,

  // Auth
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_CREDENTIALS]: 401,
  [ErrorCode.RATE_LIMITED]: 429,

  // Principals
  [ErrorCode.PRINCIPAL_NOT_FOUND]: 404,
  [ErrorCode.DUPLICATE_PRINCIPAL]: 409,

  // System
  [ErrorCode.STORE_FAILURE]: 500,
  [ErrorCode.HASH_ERROR]: 500,
  [ErrorCode.CONFIG_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export class AuthError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AuthError";
    this.code = code;
    this.statusCode = STATUS_MAP[code];
    this.details = details;
  }

  /** True for errors the caller can act on (4xx); false for fatal system errors. */
  get isClientError(): boolean {
    return this.statusCode < 500;
  }

  static validation(reason: string, message: string, details?: Record<string, unknown>): AuthError {
    return new AuthError(ErrorCode.VALIDATION_FAILED, message, { reason, ...details });
  }

  static schemaValidation(message: string): AuthError {
    return new AuthError(ErrorCode.SCHEMA_VALIDATION_ERROR, message);
  }

  static unknownAction(action?: string): AuthError {
    const details = action !== undefined ? { action } : undefined;
    return new AuthError(ErrorCode.UNKNOWN_ACTION, "Unknown action", details);
  }

  static unauthorized(): AuthError {
    return new AuthError(ErrorCode.UNAUTHORIZED, "Unauthorized");
  }

  static invalidCredentials(
    message = "Invalid credentials",
    details?: Record<string, unknown>,
  ): AuthError {
    return new AuthError(ErrorCode.INVALID_CREDENTIALS, message, details);
  }

  static rateLimited(retryAfterMs: number): AuthError {
    return new AuthError(ErrorCode.RATE_LIMITED, "Too many attempts. Try again later.", {
      retry_after_ms: retryAfterMs,
    });
  }

  static principalNotFound(principalId?: string): AuthError {
    const msg = principalId ? `Principal not found: ${principalId}` : "Principal not found";
    return new AuthError(ErrorCode.PRINCIPAL_NOT_FOUND, msg);
  }

  static duplicatePrincipal(principalId: string): AuthError {
    return new AuthError(ErrorCode.DUPLICATE_PRINCIPAL, `Principal already exists: ${principalId}`);
  }

  static storeFailure(detail?: string): AuthError {
    const msg = detail ? `Store failure: ${detail}` : "Store failure";
    return new AuthError(ErrorCode.STORE_FAILURE, msg);
  }

  static storeTimeout(): AuthError {
    return new AuthError(ErrorCode.STORE_FAILURE, "Store operation timed out", { timeout: true });
  }

  static hashError(detail?: string): AuthError {
    const msg = detail ? `Hash error: ${detail}` : "Hash error";
    return new AuthError(ErrorCode.HASH_ERROR, msg);
  }

  static configError(message: string): AuthError {
    return new AuthError(ErrorCode.CONFIG_ERROR, message);
  }

  static internalError(message: string): AuthError {
    return new AuthError(ErrorCode.INTERNAL_ERROR, message);
  }
}
