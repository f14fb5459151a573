import { isIP } from "node:net";

import { UNKNOWN_ORIGIN } from "./constants.js";

const IPV4_MAPPED_PREFIX = "::ffff:";

export function isValidOrigin(origin: string): boolean {
  return isIP(origin) !== 0;
}

/**
 * Reduce a caller address to the key the rate limiter buckets on.
 * Missing or unparseable addresses all share the UNKNOWN_ORIGIN bucket, so a
 * caller cannot dodge throttling by sending garbage.
 */
export function normalizeOrigin(raw: string | undefined | null): string {
  if (raw === undefined || raw === null) return UNKNOWN_ORIGIN;

  let origin = raw.trim().toLowerCase();
  if (origin.startsWith("[") && origin.endsWith("]")) {
    origin = origin.slice(1, -1);
  }

  if (origin.startsWith(IPV4_MAPPED_PREFIX)) {
    const mapped = origin.slice(IPV4_MAPPED_PREFIX.length);
    if (isIP(mapped) === 4) return mapped;
  }

  return isValidOrigin(origin) ? origin : UNKNOWN_ORIGIN;
}
