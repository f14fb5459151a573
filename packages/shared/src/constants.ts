// ---------------------------------------------------------------------------
// Configuration constants
// ---------------------------------------------------------------------------

// -- Paths -------------------------------------------------------------------

export const DEFAULT_DB_PATH = "keyshift.db";

// -- HTTP --------------------------------------------------------------------

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 3000;
export const SESSION_COOKIE_NAME = "keyshift_session";

// -- Crypto: Argon2id --------------------------------------------------------

export const ARGON2_MEMORY_COST = 65_536; // 64 MB
export const ARGON2_TIME_COST = 3;
export const ARGON2_PARALLELISM = 4;
export const ARGON2_HASH_LENGTH = 32; // 256 bits

// -- Session -----------------------------------------------------------------

export const SESSION_TOKEN_BYTES = 32;
export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1_000; // 15 minutes
export const MAX_SESSION_TTL_MS = 24 * 60 * 60 * 1_000; // 24 hours
export const SESSION_SLIDE_INTERVAL_MS = 30 * 1_000; // 30 seconds

// -- Rate limits -------------------------------------------------------------

export const RATE_LIMIT_MAX_ATTEMPTS = 5;
export const RATE_LIMIT_WINDOW_MS = 15 * 60 * 1_000; // 15 minutes

/** Shared bucket for callers whose network origin is missing or unparseable. */
export const UNKNOWN_ORIGIN = "unknown";

// -- Password policy ---------------------------------------------------------

export const PASSWORD_MIN_LENGTH = 8;

// -- SQLite ------------------------------------------------------------------

export const DEFAULT_STORE_TIMEOUT_MS = 5_000;

export const SQLITE_PRAGMAS = {
  journal_mode: "WAL",
  foreign_keys: "ON",
  synchronous: "FULL",
} as const;

export const SCHEMA_VERSION = 1;
