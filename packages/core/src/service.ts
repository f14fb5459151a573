import type { AppConfig } from "@keyshift/shared";
import { AuditLogger } from "./audit/audit-logger.js";
import { AuditQuery } from "./audit/audit-query.js";
import { CredentialStore } from "./credentials/credential-store.js";
import type { Logger } from "./logging/logger.js";
import { RateLimiter } from "./rate-limit/rate-limiter.js";
import { CredentialRotationWorkflow } from "./rotation/credential-rotation-workflow.js";
import { SessionManager } from "./session/session-manager.js";
import { SqliteStore } from "./storage/sqlite-store.js";

export type ServiceConfig = Pick<
  AppConfig,
  "dbPath" | "rateLimit" | "session" | "storeTimeoutMs" | "hashing"
>;

export interface RotationService {
  workflow: CredentialRotationWorkflow;
  credentials: CredentialStore;
  auditQuery: AuditQuery;
  store: SqliteStore;
  close(): void;
}

/**
 * Open the store and wire every component from one configuration.
 */
export function createRotationService(config: ServiceConfig, logger: Logger): RotationService {
  const store = new SqliteStore(config.dbPath, { timeoutMs: config.storeTimeoutMs });
  const credentials = new CredentialStore(store, config.hashing);

  const workflow = new CredentialRotationWorkflow({
    store,
    credentials,
    rateLimiter: new RateLimiter(store, config.rateLimit),
    audit: new AuditLogger(store),
    sessions: new SessionManager(store, config.session),
    logger,
  });

  logger.debug({ dbPath: config.dbPath }, "credential store opened");

  return {
    workflow,
    credentials,
    auditQuery: new AuditQuery(store),
    store,
    close: () => store.close(),
  };
}
