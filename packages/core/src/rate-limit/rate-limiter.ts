import type { RateLimitPolicy } from "@keyshift/shared";
import { RATE_LIMIT_MAX_ATTEMPTS, RATE_LIMIT_WINDOW_MS } from "@keyshift/shared";
import type { FailureScope, SqliteStore } from "../storage/sqlite-store.js";

export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  maxAttempts: RATE_LIMIT_MAX_ATTEMPTS,
  windowMs: RATE_LIMIT_WINDOW_MS,
};

export interface RateLimitStatus {
  blocked: boolean;
  originFailures: number;
  principalFailures: number;
  /** Time until every saturated key drops below the threshold; 0 when not blocked. */
  retryAfterMs: number;
}

/**
 * Sliding-window failure counter keyed by origin and by principal. A request
 * is blocked when either key has reached the threshold inside the window.
 */
export class RateLimiter {
  constructor(
    private readonly store: SqliteStore,
    private readonly policy: RateLimitPolicy = DEFAULT_RATE_LIMIT_POLICY,
  ) {}

  check(origin: string, principalId?: string): RateLimitStatus {
    const now = Date.now();
    const since = now - this.policy.windowMs;

    const originFailures = this.store.countFailures("origin", origin, since);
    const principalFailures = principalId
      ? this.store.countFailures("principal", principalId, since)
      : 0;

    let retryAfterMs = 0;
    if (originFailures >= this.policy.maxAttempts) {
      retryAfterMs = Math.max(retryAfterMs, this.retryAfter("origin", origin, originFailures, now));
    }
    if (principalId && principalFailures >= this.policy.maxAttempts) {
      retryAfterMs = Math.max(
        retryAfterMs,
        this.retryAfter("principal", principalId, principalFailures, now),
      );
    }

    return {
      blocked: retryAfterMs > 0,
      originFailures,
      principalFailures,
      retryAfterMs,
    };
  }

  isBlocked(origin: string, principalId?: string): boolean {
    return this.check(origin, principalId).blocked;
  }

  /** Append a failure. Rows that have left the window are compacted on the way. */
  recordFailure(origin: string, principalId?: string): void {
    const now = Date.now();
    this.store.deleteFailuresBefore(now - this.policy.windowMs);
    this.store.insertFailedAttempt(origin, principalId ?? null, now);
  }

  reset(principalId: string): void {
    this.store.deleteFailuresForPrincipal(principalId);
  }

  // The key unblocks once the failure that keeps the count at the threshold expires.
  private retryAfter(scope: FailureScope, key: string, count: number, now: number): number {
    const since = now - this.policy.windowMs;
    const pivot = this.store.failureTimeAt(scope, key, since, count - this.policy.maxAttempts);
    if (pivot === undefined) return 0;
    return Math.max(1, pivot + this.policy.windowMs - now);
  }
}
