import { createHash, randomBytes } from "node:crypto";
import { SESSION_TOKEN_BYTES } from "@keyshift/shared";

/**
 * Generate cryptographically secure random bytes.
 */
export function generateRandomBytes(length: number): Uint8Array {
  return new Uint8Array(randomBytes(length));
}

/**
 * Generate a UUIDv7 per RFC 9562: 48-bit ms timestamp + version 7 + random.
 */
export function generateUUIDv7(): string {
  const now = Date.now();

  // 48-bit millisecond timestamp
  const timeBits = new Uint8Array(6);
  timeBits[0] = (now / 2 ** 40) & 0xff;
  timeBits[1] = (now / 2 ** 32) & 0xff;
  timeBits[2] = (now / 2 ** 24) & 0xff;
  timeBits[3] = (now / 2 ** 16) & 0xff;
  timeBits[4] = (now / 2 ** 8) & 0xff;
  timeBits[5] = now & 0xff;

  const uuid = new Uint8Array(16);
  uuid.set(timeBits, 0);
  uuid.set(randomBytes(10), 6);

  // Version 7, variant 10
  uuid[6] = ((uuid[6] ?? 0) & 0x0f) | 0x70;
  uuid[8] = ((uuid[8] ?? 0) & 0x3f) | 0x80;

  const hex = Buffer.from(uuid).toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

/**
 * Opaque session token handed to the caller: 256 random bits, base64url.
 */
export function generateSessionToken(): string {
  return Buffer.from(generateRandomBytes(SESSION_TOKEN_BYTES)).toString("base64url");
}

/**
 * SHA-256 digest of a session token, the only form in which tokens are stored.
 */
export function digestToken(token: string): string {
  return createHash("sha256").update(token, "utf8").digest("hex");
}
