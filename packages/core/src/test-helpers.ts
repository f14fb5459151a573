import type { HashParams } from "@keyshift/shared";
import { DEFAULT_SESSION_TTL_MS, MAX_SESSION_TTL_MS } from "@keyshift/shared";
import { createSilentLogger } from "./logging/logger.js";
import type { RotationService, ServiceConfig } from "./service.js";
import { createRotationService } from "./service.js";

/** Cheapest Argon2id parameters the config accepts. */
export const TEST_HASH_PARAMS: HashParams = { memoryCost: 1024, timeCost: 2, parallelism: 1 };

export const DEMO_PRINCIPAL = "demo";
export const DEMO_PIN = "1234";
export const DEMO_PASSWORD = "OldPass123";

export const TEST_SERVICE_CONFIG: ServiceConfig = {
  dbPath: ":memory:",
  rateLimit: { maxAttempts: 5, windowMs: 900_000 },
  session: { ttlMs: DEFAULT_SESSION_TTL_MS, maxTtlMs: MAX_SESSION_TTL_MS },
  storeTimeoutMs: 1_000,
  hashing: TEST_HASH_PARAMS,
};

/** In-memory service with the demo principal already seeded. */
export async function createTestService(
  overrides: Partial<ServiceConfig> = {},
): Promise<RotationService> {
  const service = createRotationService(
    { ...TEST_SERVICE_CONFIG, ...overrides },
    createSilentLogger(),
  );
  await service.credentials.createPrincipal(DEMO_PRINCIPAL, {
    pin: DEMO_PIN,
    password: DEMO_PASSWORD,
  });
  return service;
}
