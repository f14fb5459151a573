import type {
  AuthActionResult,
  ChangeSecretResult,
  CredentialKind,
  LoginResult,
  LogoutResult,
  Principal,
  RequestContext,
} from "@keyshift/shared";
import {
  AuditEventKind,
  AuthActionKind,
  AuthError,
  LOGIN_KIND,
  ROTATING_KIND,
  RotationFailureReason,
  RotationState,
  normalizeOrigin,
  parseAuthAction,
  rotationFailureEvent,
} from "@keyshift/shared";
import type { AuditLogger } from "../audit/audit-logger.js";
import type { CredentialStore } from "../credentials/credential-store.js";
import type { Logger } from "../logging/logger.js";
import type { RateLimiter } from "../rate-limit/rate-limiter.js";
import type { SessionManager } from "../session/session-manager.js";
import type { SqliteStore } from "../storage/sqlite-store.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { RotationInput, RotationRejection } from "./password-policy.js";
import { ROTATION_MESSAGES, checkRotationInput } from "./password-policy.js";

export interface WorkflowDeps {
  store: SqliteStore;
  credentials: CredentialStore;
  rateLimiter: RateLimiter;
  audit: AuditLogger;
  sessions: SessionManager;
  logger: Logger;
}

export interface LoginOptions {
  kind?: CredentialKind;
  /** Session token the caller already holds; ended when the login succeeds. */
  previousToken?: string;
}

interface Caller {
  origin: string;
  userAgent?: string;
}

/**
 * Login, logout and secret rotation on top of the credential, rate-limit,
 * audit and session components.
 *
 * Every outcome commits its writes in one store transaction. Login and
 * rotation are serialised per caller origin and per principal.
 */
export class CredentialRotationWorkflow {
  private readonly originMutex = new KeyedMutex();
  private readonly principalMutex = new KeyedMutex();
  private readonly logger: Logger;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger.child({ component: "workflow" });
  }

  // ---------------------------------------------------------------------------
  // login
  // ---------------------------------------------------------------------------

  async login(
    identity: string,
    secret: string,
    ctx: RequestContext = {},
    options: LoginOptions = {},
  ): Promise<LoginResult> {
    const caller = this.caller(ctx);
    const kind = options.kind ?? LOGIN_KIND;
    const principalId = identity === "" ? undefined : identity;

    const attempt = async (): Promise<LoginResult> => {
      this.assertNotBlocked(caller, principalId);

      if (principalId === undefined || secret === "") {
        throw AuthError.validation(
          RotationFailureReason.MISSING_FIELDS,
          `username and ${kind} required`,
        );
      }

      const { store, credentials, rateLimiter, audit, sessions } = this.deps;

      if (!(await credentials.verify(principalId, kind, secret))) {
        store.transaction(() => {
          rateLimiter.recordFailure(caller.origin, principalId);
          audit.append({ principalId, eventKind: AuditEventKind.LOGIN_FAILURE, ...caller });
        });
        this.logger.info(
          { principalId, origin: caller.origin, event: AuditEventKind.LOGIN_FAILURE },
          "login rejected",
        );
        throw AuthError.invalidCredentials();
      }

      const session = store.transaction(() => {
        const started = sessions.start(principalId, { replaceToken: options.previousToken });
        audit.append({ principalId, eventKind: AuditEventKind.LOGIN_SUCCESS, ...caller });
        return started;
      });
      this.logger.info(
        { principalId, origin: caller.origin, event: AuditEventKind.LOGIN_SUCCESS },
        "login succeeded",
      );

      return {
        kind: AuthActionKind.LOGIN,
        state: RotationState.AUTHENTICATED,
        principalId,
        sessionToken: session.token,
        expiresAt: session.expiresAt,
      };
    };

    return this.serialise(caller.origin, principalId, attempt);
  }

  // ---------------------------------------------------------------------------
  // logout
  // ---------------------------------------------------------------------------

  logout(sessionToken: string | undefined, ctx: RequestContext = {}): LogoutResult {
    const { store, audit, sessions } = this.deps;
    const session = sessions.current(sessionToken);

    if (session) {
      const caller = this.caller(ctx);
      store.transaction(() => {
        sessions.end(sessionToken);
        audit.append({ principalId: session.principalId, eventKind: AuditEventKind.LOGOUT, ...caller });
      });
      this.logger.info(
        { principalId: session.principalId, origin: caller.origin, event: AuditEventKind.LOGOUT },
        "logged out",
      );
    }

    return { kind: AuthActionKind.LOGOUT, state: RotationState.UNAUTHENTICATED };
  }

  // ---------------------------------------------------------------------------
  // change secret
  // ---------------------------------------------------------------------------

  /**
   * Rotate the principal's password. Checks run in a fixed order: rate limit,
   * field presence, confirmation match, length, character classes, old PIN.
   */
  async changeSecret(
    sessionToken: string | undefined,
    input: RotationInput,
    ctx: RequestContext = {},
  ): Promise<ChangeSecretResult> {
    const session = this.deps.sessions.current(sessionToken);
    if (!session) throw AuthError.unauthorized();

    const { principalId } = session;
    const caller = this.caller(ctx);

    return this.serialise(caller.origin, principalId, async () => {
      this.assertNotBlocked(caller, principalId);

      const rejection = checkRotationInput(input);
      if (rejection) {
        this.rejectRotation(principalId, caller, rejection);
        throw AuthError.validation(rejection.reason, rejection.message, {
          state: RotationState.ROTATION_REJECTED,
        });
      }

      const { store, credentials, rateLimiter, audit } = this.deps;

      if (!(await credentials.verify(principalId, LOGIN_KIND, input.oldSecret))) {
        const reason = RotationFailureReason.PIN;
        this.rejectRotation(principalId, caller, { reason, message: ROTATION_MESSAGES[reason] });
        throw AuthError.invalidCredentials(ROTATION_MESSAGES[reason], {
          reason,
          state: RotationState.ROTATION_REJECTED,
        });
      }

      const encoded = await credentials.hashSecret(input.newSecret);
      const rotatedAt = store.transaction(() => {
        credentials.replaceHash(principalId, ROTATING_KIND, encoded);
        rateLimiter.reset(principalId);
        audit.append({ principalId, eventKind: AuditEventKind.PASSWORD_CHANGED, ...caller });
        return Date.now();
      });
      this.logger.info(
        { principalId, origin: caller.origin, event: AuditEventKind.PASSWORD_CHANGED },
        "password rotated",
      );

      return {
        kind: AuthActionKind.CHANGE_SECRET,
        state: RotationState.ROTATION_COMMITTED,
        principalId,
        rotatedAt,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // queries / dispatch
  // ---------------------------------------------------------------------------

  currentPrincipal(sessionToken: string | undefined): Principal | null {
    const session = this.deps.sessions.current(sessionToken);
    if (!session) return null;
    return this.deps.credentials.getPrincipal(session.principalId) ?? null;
  }

  /** Validate an untyped action payload and run it. */
  async dispatch(input: unknown, ctx: RequestContext = {}): Promise<AuthActionResult> {
    const action = parseAuthAction(input);

    switch (action.kind) {
      case AuthActionKind.LOGIN:
        return this.login(action.identity, action.secret, ctx, {
          kind: action.credentialKind,
          previousToken: action.previousToken,
        });
      case AuthActionKind.LOGOUT:
        return this.logout(action.sessionToken, ctx);
      case AuthActionKind.CHANGE_SECRET:
        return this.changeSecret(
          action.sessionToken,
          {
            oldSecret: action.oldSecret,
            newSecret: action.newSecret,
            confirmSecret: action.confirmSecret,
          },
          ctx,
        );
      default: {
        const unhandled: never = action;
        throw AuthError.unknownAction(String(unhandled));
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private caller(ctx: RequestContext): Caller {
    return { origin: normalizeOrigin(ctx.origin), userAgent: ctx.userAgent };
  }

  /**
   * Run `fn` holding the caller's origin lock, then the principal's lock.
   * The throttle check and the failure it may record happen under both, so
   * concurrent attempts from one origin cannot all pass the check. Locks are
   * always taken origin first.
   */
  private serialise<T>(
    origin: string,
    principalId: string | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    return this.originMutex.run(origin, () =>
      principalId === undefined ? fn() : this.principalMutex.run(principalId, fn),
    );
  }

  private assertNotBlocked(caller: Caller, principalId: string | undefined): void {
    const status = this.deps.rateLimiter.check(caller.origin, principalId);
    if (status.blocked) {
      this.logger.warn(
        {
          principalId,
          origin: caller.origin,
          originFailures: status.originFailures,
          principalFailures: status.principalFailures,
        },
        "rate limited",
      );
      throw AuthError.rateLimited(status.retryAfterMs);
    }
  }

  private rejectRotation(principalId: string, caller: Caller, rejection: RotationRejection): void {
    const eventKind = rotationFailureEvent(rejection.reason);
    this.deps.store.transaction(() => {
      this.deps.rateLimiter.recordFailure(caller.origin, principalId);
      this.deps.audit.append({ principalId, eventKind, ...caller });
    });
    this.logger.info({ principalId, origin: caller.origin, event: eventKind }, "rotation rejected");
  }
}
