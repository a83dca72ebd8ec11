// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@main`
 * Purpose: Service entry point with graceful shutdown. Builds the container and starts the RPC server.
 * Scope: Entry point that calls serverEnv() and binds the port. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false stops work intake immediately
 * Side-effects: IO (HTTP server, process signals)
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import { buildRpcServer, type HealthState } from "@/bootstrap/http";
import { serverEnv } from "@/shared/env";
import { flushLogger, makeLogger } from "@/shared/observability";

async function main(): Promise<void> {
  // Load and validate env
  const config = serverEnv();
  const container = getContainer();
  const logger = container.log;

  const health: HealthState = { ready: false };
  const app = buildRpcServer({ ...container, health });
  await app.listen({ port: config.PORT, host: "0.0.0.0" });
  logger.info({ port: config.PORT }, "RPC server started");

  const period = container.periodState.current();
  health.ready = true;
  logger.info(
    { month: period.month, year: period.year },
    "Ready for traffic"
  );

  // Graceful shutdown
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    health.ready = false; // Stop accepting new work
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await app.close();
      logger.info({}, "Server stopped");
      flushLogger(logger);
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger(logger);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger(bootLogger);
  process.exit(1);
});
