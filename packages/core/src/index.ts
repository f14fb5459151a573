// Crypto
export { DEFAULT_HASH_PARAMS, hashSecret, verifySecret } from "./crypto/argon2.js";
export {
  digestToken,
  generateRandomBytes,
  generateSessionToken,
  generateUUIDv7,
} from "./crypto/random.js";

// Storage
export { SqliteStore } from "./storage/sqlite-store.js";
export type { AuditFilter, FailureScope, SqliteStoreOptions } from "./storage/sqlite-store.js";

// Credentials
export { CredentialStore } from "./credentials/credential-store.js";
export type { InitialSecrets } from "./credentials/credential-store.js";

// Rate limiting
export { DEFAULT_RATE_LIMIT_POLICY, RateLimiter } from "./rate-limit/rate-limiter.js";
export type { RateLimitStatus } from "./rate-limit/rate-limiter.js";

// Session
export { DEFAULT_SESSION_POLICY, SessionManager } from "./session/session-manager.js";
export type { AuthSession, StartOptions, StartedSession } from "./session/session-manager.js";

// Audit
export { AuditLogger } from "./audit/audit-logger.js";
export type { AuditAppendOptions } from "./audit/audit-logger.js";
export { AuditQuery } from "./audit/audit-query.js";
export type { AuditQueryOptions } from "./audit/audit-query.js";

// Rotation
export { CredentialRotationWorkflow } from "./rotation/credential-rotation-workflow.js";
export type { LoginOptions, WorkflowDeps } from "./rotation/credential-rotation-workflow.js";
export { ROTATION_MESSAGES, checkRotationInput } from "./rotation/password-policy.js";
export type { RotationInput, RotationRejection } from "./rotation/password-policy.js";
export { KeyedMutex } from "./rotation/keyed-mutex.js";

// Logging
export { createLogger, createSilentLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

// Service
export { createRotationService } from "./service.js";
export type { RotationService, ServiceConfig } from "./service.js";
