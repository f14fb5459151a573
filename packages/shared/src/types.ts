// ---------------------------------------------------------------------------
// Domain enums (as const objects)
// ---------------------------------------------------------------------------

export const CredentialKind = {
  /** Short secret used to log in. */
  PIN: "pin",
  /** Longer secret rotated by the change-secret workflow. */
  PASSWORD: "password",
} as const;
export type CredentialKind = (typeof CredentialKind)[keyof typeof CredentialKind];

export const LOGIN_KIND: CredentialKind = CredentialKind.PIN;
export const ROTATING_KIND: CredentialKind = CredentialKind.PASSWORD;

export const RotationFailureReason = {
  MISSING_FIELDS: "missing_fields",
  MISMATCH: "mismatch",
  TOO_SHORT: "too_short",
  COMPLEXITY: "complexity",
  PIN: "pin",
} as const;
export type RotationFailureReason =
  (typeof RotationFailureReason)[keyof typeof RotationFailureReason];

export const AuditEventKind = {
  LOGIN_SUCCESS: "login_success",
  LOGIN_FAILURE: "login_failure",
  LOGOUT: "logout",
  PASSWORD_CHANGED: "password_changed",
  PASSWORD_CHANGE_FAILED_MISSING_FIELDS: "password_change_failed_missing_fields",
  PASSWORD_CHANGE_FAILED_MISMATCH: "password_change_failed_mismatch",
  PASSWORD_CHANGE_FAILED_TOO_SHORT: "password_change_failed_too_short",
  PASSWORD_CHANGE_FAILED_COMPLEXITY: "password_change_failed_complexity",
  PASSWORD_CHANGE_FAILED_PIN: "password_change_failed_pin",
} as const;
export type AuditEventKind = (typeof AuditEventKind)[keyof typeof AuditEventKind];

const ROTATION_FAILURE_EVENTS: Record<RotationFailureReason, AuditEventKind> = {
  [RotationFailureReason.MISSING_FIELDS]: AuditEventKind.PASSWORD_CHANGE_FAILED_MISSING_FIELDS,
  [RotationFailureReason.MISMATCH]: AuditEventKind.PASSWORD_CHANGE_FAILED_MISMATCH,
  [RotationFailureReason.TOO_SHORT]: AuditEventKind.PASSWORD_CHANGE_FAILED_TOO_SHORT,
  [RotationFailureReason.COMPLEXITY]: AuditEventKind.PASSWORD_CHANGE_FAILED_COMPLEXITY,
  [RotationFailureReason.PIN]: AuditEventKind.PASSWORD_CHANGE_FAILED_PIN,
};

export function rotationFailureEvent(reason: RotationFailureReason): AuditEventKind {
  return ROTATION_FAILURE_EVENTS[reason];
}

export const RotationState = {
  UNAUTHENTICATED: "unauthenticated",
  AUTHENTICATED: "authenticated",
  ROTATION_REJECTED: "rotation_rejected",
  ROTATION_COMMITTED: "rotation_committed",
} as const;
export type RotationState = (typeof RotationState)[keyof typeof RotationState];

export const AuthActionKind = {
  LOGIN: "login",
  LOGOUT: "logout",
  CHANGE_SECRET: "change_secret",
} as const;
export type AuthActionKind = (typeof AuthActionKind)[keyof typeof AuthActionKind];

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

// ---------------------------------------------------------------------------
// Persisted records
// ---------------------------------------------------------------------------

/** Principal record maps to the `principals` SQLite table. */
export interface Principal {
  id: string;
  created_at: number;
  updated_at: number;
}

/** Hashed credential maps to the `credentials` SQLite table. */
export interface Credential {
  principal_id: string;
  kind: CredentialKind;
  secret_hash: string;
  updated_at: number;
}

/** Audit log entry maps to the `audit_log` SQLite table. */
export interface AuditEvent {
  id: number;
  principal_id: string;
  event_kind: AuditEventKind;
  origin: string;
  user_agent: string | null;
  created_at: number;
}

/** Authenticated session maps to the `sessions` SQLite table. Only the token digest is stored. */
export interface SessionRecord {
  token_hash: string;
  session_id: string;
  principal_id: string;
  created_at: number;
  expires_at: number;
  max_expires_at: number;
}

// ---------------------------------------------------------------------------
// Workflow boundary
// ---------------------------------------------------------------------------

/** Per-request facts supplied by the HTTP layer. Both values are opaque to the core. */
export interface RequestContext {
  origin?: string;
  userAgent?: string;
}

export interface LoginAction {
  kind: typeof AuthActionKind.LOGIN;
  identity: string;
  secret: string;
  credentialKind: CredentialKind;
  /** Token the caller already holds; it is invalidated on success. */
  previousToken?: string;
}

export interface LogoutAction {
  kind: typeof AuthActionKind.LOGOUT;
  sessionToken?: string;
}

export interface ChangeSecretAction {
  kind: typeof AuthActionKind.CHANGE_SECRET;
  sessionToken?: string;
  oldSecret: string;
  newSecret: string;
  confirmSecret: string;
}

export type AuthAction = LoginAction | LogoutAction | ChangeSecretAction;

export interface LoginResult {
  kind: typeof AuthActionKind.LOGIN;
  state: typeof RotationState.AUTHENTICATED;
  principalId: string;
  sessionToken: string;
  expiresAt: number;
}

export interface LogoutResult {
  kind: typeof AuthActionKind.LOGOUT;
  state: typeof RotationState.UNAUTHENTICATED;
}

export interface ChangeSecretResult {
  kind: typeof AuthActionKind.CHANGE_SECRET;
  state: typeof RotationState.ROTATION_COMMITTED;
  principalId: string;
  rotatedAt: number;
}

export type AuthActionResult = LoginResult | LogoutResult | ChangeSecretResult;

/** Argon2id cost parameters. The salt is generated per hash and embedded in it. */
export interface HashParams {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export interface RateLimitPolicy {
  maxAttempts: number;
  windowMs: number;
}

export interface SessionPolicy {
  ttlMs: number;
  maxTtlMs: number;
}
