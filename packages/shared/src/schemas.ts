import { z } from "zod";

import { AuthError } from "./errors.js";
import type { AuthAction } from "./types.js";
import { AuditEventKind, AuthActionKind, CredentialKind } from "./types.js";

// ---------------------------------------------------------------------------
// Enum schemas (derived from const objects in types.ts)
// ---------------------------------------------------------------------------

const credentialKindValues = Object.values(CredentialKind) as [CredentialKind, ...CredentialKind[]];
export const credentialKindSchema = z.enum(credentialKindValues);

const auditEventKindValues = Object.values(AuditEventKind) as [AuditEventKind, ...AuditEventKind[]];
export const auditEventKindSchema = z.enum(auditEventKindValues);

const authActionKindValues = Object.values(AuthActionKind) as [AuthActionKind, ...AuthActionKind[]];
export const authActionKindSchema = z.enum(authActionKindValues);

// ---------------------------------------------------------------------------
// Principal identity
// ---------------------------------------------------------------------------

export const principalIdSchema = z
  .string()
  .trim()
  .min(1, "Principal id is required")
  .max(255, "Principal id is too long");

// ---------------------------------------------------------------------------
// Action schemas (closed set dispatched by the rotation workflow)
// ---------------------------------------------------------------------------

// Absent fields become "" so the workflow's own presence check reports them.
const inputField = z.string().trim().default("");
const tokenField = z.string().optional();

export const loginActionSchema = z.object({
  kind: z.literal(AuthActionKind.LOGIN),
  identity: inputField,
  secret: inputField,
  credentialKind: credentialKindSchema.default(CredentialKind.PIN),
  previousToken: tokenField,
});

export const logoutActionSchema = z.object({
  kind: z.literal(AuthActionKind.LOGOUT),
  sessionToken: tokenField,
});

export const changeSecretActionSchema = z.object({
  kind: z.literal(AuthActionKind.CHANGE_SECRET),
  sessionToken: tokenField,
  oldSecret: inputField,
  newSecret: inputField,
  confirmSecret: inputField,
});

export const authActionSchema = z.discriminatedUnion("kind", [
  loginActionSchema,
  logoutActionSchema,
  changeSecretActionSchema,
]);

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "input"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate an untrusted action payload. Kinds outside the closed set are
 * rejected with UNKNOWN_ACTION before any field is looked at.
 */
export function parseAuthAction(input: unknown): AuthAction {
  const kind = typeof input === "object" && input !== null && "kind" in input ? input.kind : undefined;

  if (!authActionKindSchema.safeParse(kind).success) {
    throw AuthError.unknownAction(typeof kind === "string" ? kind : undefined);
  }

  const result = authActionSchema.safeParse(input);
  if (!result.success) {
    throw AuthError.schemaValidation(formatZodError(result.error));
  }
  return result.data;
}
