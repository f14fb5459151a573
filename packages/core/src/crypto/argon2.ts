import { argon2id, hash, verify } from "argon2";
import type { HashParams } from "@keyshift/shared";
import {
  ARGON2_HASH_LENGTH,
  ARGON2_MEMORY_COST,
  ARGON2_PARALLELISM,
  ARGON2_TIME_COST,
  AuthError,
} from "@keyshift/shared";

export const DEFAULT_HASH_PARAMS: HashParams = {
  memoryCost: ARGON2_MEMORY_COST,
  timeCost: ARGON2_TIME_COST,
  parallelism: ARGON2_PARALLELISM,
};

/**
 * Hash a secret with Argon2id. The result is a PHC-format string that embeds
 * the algorithm, its cost parameters and a fresh random salt.
 */
export async function hashSecret(
  secret: string,
  params: HashParams = DEFAULT_HASH_PARAMS,
): Promise<string> {
  try {
    return await hash(secret, {
      type: argon2id,
      memoryCost: params.memoryCost,
      timeCost: params.timeCost,
      parallelism: params.parallelism,
      hashLength: ARGON2_HASH_LENGTH,
    });
  } catch (err) {
    throw AuthError.hashError(err instanceof Error ? err.message : "unknown error");
  }
}

/**
 * Check a candidate against a stored hash. The comparison inside argon2 is
 * constant-time; a wrong candidate yields false, a malformed hash throws.
 */
export async function verifySecret(encoded: string, candidate: string): Promise<boolean> {
  try {
    return await verify(encoded, candidate);
  } catch (err) {
    throw AuthError.hashError(err instanceof Error ? err.message : "unknown error");
  }
}
