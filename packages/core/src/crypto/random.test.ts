import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { digestToken, generateRandomBytes, generateSessionToken, generateUUIDv7 } from "./random.js";

describe("generateRandomBytes", () => {
  it("returns the requested number of bytes", () => {
    const bytes = generateRandomBytes(32);
    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(bytes.length).toBe(32);
  });

  it("returns different values on each call", () => {
    const a = generateRandomBytes(32);
    const b = generateRandomBytes(32);
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false);
  });
});

describe("generateUUIDv7", () => {
  it("produces valid UUID format", () => {
    expect(generateUUIDv7()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("embeds a timestamp close to Date.now()", () => {
    const before = Date.now();
    const uuid = generateUUIDv7();
    const after = Date.now();

    const timestamp = parseInt(uuid.replace(/-/g, "").slice(0, 12), 16);

    expect(timestamp).toBeGreaterThanOrEqual(before);
    expect(timestamp).toBeLessThanOrEqual(after);
  });
});

describe("generateSessionToken", () => {
  it("encodes 32 random bytes as base64url", () => {
    const token = generateSessionToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(token, "base64url").length).toBe(32);
  });

  it("generates unique tokens", () => {
    const set = new Set<string>();
    for (let i = 0; i < 100; i++) {
      set.add(generateSessionToken());
    }
    expect(set.size).toBe(100);
  });
});

describe("digestToken", () => {
  it("returns the hex SHA-256 of the token", () => {
    expect(digestToken("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    expect(digestToken("token-1")).toBe(createHash("sha256").update("token-1").digest("hex"));
  });

  it("differs for different tokens", () => {
    expect(digestToken("token-1")).not.toBe(digestToken("token-2"));
  });
});
