import fastifyCookie from "@fastify/cookie";
import Fastify from "fastify";
import type {
  FastifyBaseLogger,
  FastifyError,
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
} from "fastify";
import type { Logger, RotationService } from "@keyshift/core";
import type { AppConfig, AuthActionResult, RequestContext } from "@keyshift/shared";
import {
  AuthActionKind,
  AuthError,
  CredentialKind,
  ErrorCode,
  SESSION_COOKIE_NAME,
} from "@keyshift/shared";

export interface ServerOptions {
  service: RotationService;
  config: Pick<AppConfig, "session" | "cookieSecure">;
  logger: Logger;
}

const SUCCESS_MESSAGES: Record<AuthActionKind, string> = {
  [AuthActionKind.LOGIN]: "Logged in",
  [AuthActionKind.LOGOUT]: "Logged out",
  [AuthActionKind.CHANGE_SECRET]: "Password updated successfully.",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Translate the password-reset page's body into a workflow action payload:
 *
 *   { action: "login", username, pin }            (or `password` instead of `pin`)
 *   { action: "logout" }
 *   { action: "change_password", oldPin, newPassword, confirmPassword }
 *
 * The result is still untrusted; the workflow validates it.
 */
export function toAuthAction(body: unknown, sessionToken: string | undefined): Record<string, unknown> {
  const input: Record<string, unknown> = isRecord(body) ? body : {};

  switch (input.action) {
    case "login": {
      const byPassword = input.pin === undefined && input.password !== undefined;
      return {
        kind: AuthActionKind.LOGIN,
        identity: input.username,
        secret: byPassword ? input.password : input.pin,
        credentialKind: byPassword ? CredentialKind.PASSWORD : CredentialKind.PIN,
        previousToken: sessionToken,
      };
    }
    case "logout":
      return { kind: AuthActionKind.LOGOUT, sessionToken };
    case "change_password":
      return {
        kind: AuthActionKind.CHANGE_SECRET,
        sessionToken,
        oldSecret: input.oldPin,
        newSecret: input.newPassword,
        confirmSecret: input.confirmPassword,
      };
    default:
      return { kind: input.action };
  }
}

function requestContext(req: FastifyRequest): RequestContext {
  return { origin: req.ip, userAgent: req.headers["user-agent"] };
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { service, config } = options;
  const loggerInstance: FastifyBaseLogger = options.logger;
  const app = Fastify({ loggerInstance });

  await app.register(fastifyCookie);

  const cookieOptions = {
    httpOnly: true,
    secure: config.cookieSecure,
    sameSite: "lax" as const,
    path: "/",
  };

  function applySession(reply: FastifyReply, result: AuthActionResult): void {
    if (result.kind === AuthActionKind.LOGIN) {
      reply.setCookie(SESSION_COOKIE_NAME, result.sessionToken, {
        ...cookieOptions,
        maxAge: Math.floor(config.session.maxTtlMs / 1000), // seconds
      });
    } else if (result.kind === AuthActionKind.LOGOUT) {
      reply.clearCookie(SESSION_COOKIE_NAME, cookieOptions);
    }
  }

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    if (error instanceof AuthError) {
      if (!error.isClientError) {
        req.log.error({ err: error, code: error.code }, "request failed");
      }
      const retryAfterMs = error.details?.retry_after_ms;
      if (error.code === ErrorCode.RATE_LIMITED && typeof retryAfterMs === "number") {
        reply.header("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      }
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message, code: error.code });
    }

    req.log.error({ err: error }, "unhandled error");
    const internal = AuthError.internalError("Internal server error");
    return reply.code(internal.statusCode).send({ error: internal.message, code: internal.code });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.post("/auth", async (req, reply) => {
    const token = req.cookies[SESSION_COOKIE_NAME];
    const result = await service.workflow.dispatch(toAuthAction(req.body, token), requestContext(req));

    applySession(reply, result);
    return { success: true, message: SUCCESS_MESSAGES[result.kind] };
  });

  app.get("/auth/me", async (req, reply) => {
    const principal = service.workflow.currentPrincipal(req.cookies[SESSION_COOKIE_NAME]);
    if (!principal) {
      return reply.code(401).send({ error: "Not authenticated", code: ErrorCode.UNAUTHORIZED });
    }
    return { principal: { id: principal.id, createdAt: principal.created_at } };
  });

  return app;
}
