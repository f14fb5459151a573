#!/usr/bin/env node
/**
 * @fileoverview keyshift HTTP server entry point.
 *
 * Reads `KEYSHIFT_*` configuration from the environment, opens the credential
 * store and serves the auth routes until SIGINT or SIGTERM.
 */

import { createLogger, createRotationService } from "@keyshift/core";
import { loadConfig } from "@keyshift/shared";
import { buildServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const service = createRotationService(config, logger);
  const app = await buildServer({ service, config, logger });

  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "shutting down");
    app
      .close()
      .then(() => service.close())
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ host: config.host, port: config.port });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`keyshift-server: ${message}\n`);
  process.exitCode = 1;
});
