import { z } from "zod";

import {
  ARGON2_MEMORY_COST,
  ARGON2_PARALLELISM,
  ARGON2_TIME_COST,
  DEFAULT_DB_PATH,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_STORE_TIMEOUT_MS,
  MAX_SESSION_TTL_MS,
  RATE_LIMIT_MAX_ATTEMPTS,
  RATE_LIMIT_WINDOW_MS,
} from "./constants.js";
import { AuthError } from "./errors.js";
import { formatZodError } from "./schemas.js";
import type { HashParams, LogLevel, RateLimitPolicy, SessionPolicy } from "./types.js";

export interface AppConfig {
  dbPath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  rateLimit: RateLimitPolicy;
  session: SessionPolicy;
  storeTimeoutMs: number;
  hashing: HashParams;
  cookieSecure: boolean;
}

const positiveInt = z.coerce.number().int().positive();

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const envSchema = z.object({
  KEYSHIFT_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  KEYSHIFT_HOST: z.string().min(1).default(DEFAULT_HOST),
  KEYSHIFT_PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  KEYSHIFT_LOG_LEVEL: logLevelSchema.default("info"),
  KEYSHIFT_RATE_LIMIT_MAX_ATTEMPTS: positiveInt.default(RATE_LIMIT_MAX_ATTEMPTS),
  KEYSHIFT_RATE_LIMIT_WINDOW_MS: positiveInt.default(RATE_LIMIT_WINDOW_MS),
  KEYSHIFT_SESSION_TTL_MS: positiveInt.default(DEFAULT_SESSION_TTL_MS),
  KEYSHIFT_SESSION_MAX_TTL_MS: positiveInt.default(MAX_SESSION_TTL_MS),
  KEYSHIFT_STORE_TIMEOUT_MS: positiveInt.default(DEFAULT_STORE_TIMEOUT_MS),
  KEYSHIFT_ARGON2_MEMORY_COST: z.coerce.number().int().min(1_024).default(ARGON2_MEMORY_COST),
  KEYSHIFT_ARGON2_TIME_COST: z.coerce.number().int().min(2).default(ARGON2_TIME_COST),
  KEYSHIFT_ARGON2_PARALLELISM: positiveInt.default(ARGON2_PARALLELISM),
  KEYSHIFT_COOKIE_SECURE: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

/**
 * Build the runtime configuration from `KEYSHIFT_*` environment variables.
 * Unset variables fall back to the defaults in constants.ts.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw AuthError.configError(`Invalid configuration: ${formatZodError(result.error)}`);
  }

  const vars = result.data;
  if (vars.KEYSHIFT_SESSION_MAX_TTL_MS < vars.KEYSHIFT_SESSION_TTL_MS) {
    throw AuthError.configError(
      "Invalid configuration: KEYSHIFT_SESSION_MAX_TTL_MS must not be shorter than KEYSHIFT_SESSION_TTL_MS",
    );
  }

  return {
    dbPath: vars.KEYSHIFT_DB_PATH,
    host: vars.KEYSHIFT_HOST,
    port: vars.KEYSHIFT_PORT,
    logLevel: vars.KEYSHIFT_LOG_LEVEL,
    rateLimit: {
      maxAttempts: vars.KEYSHIFT_RATE_LIMIT_MAX_ATTEMPTS,
      windowMs: vars.KEYSHIFT_RATE_LIMIT_WINDOW_MS,
    },
    session: {
      ttlMs: vars.KEYSHIFT_SESSION_TTL_MS,
      maxTtlMs: vars.KEYSHIFT_SESSION_MAX_TTL_MS,
    },
    storeTimeoutMs: vars.KEYSHIFT_STORE_TIMEOUT_MS,
    hashing: {
      memoryCost: vars.KEYSHIFT_ARGON2_MEMORY_COST,
      timeCost: vars.KEYSHIFT_ARGON2_TIME_COST,
      parallelism: vars.KEYSHIFT_ARGON2_PARALLELISM,
    },
    cookieSecure: vars.KEYSHIFT_COOKIE_SECURE,
  };
}
