// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Use makeLogger for app logger; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Notes: Reads logging-specific env vars directly (NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME) without serverEnv() to avoid triggering full env validation at module load time.
 * Links: Initializes redaction paths via REDACT_PATHS; used by container and entry point.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const pinoLogLevel = process.env.PINO_LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "period-pay";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: pinoLogLevel,
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, app: "period-pay", service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    // bigint amounts are not JSON-serialisable by default
    formatters: {
      log: (object: Record<string, unknown>) => stringifyBigints(object),
    },
  };

  // Sync in dev for immediate crash visibility, async in prod
  return pino(
    config,
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/**
 * Flush buffered output before process exit (async destination in production)
 */
export function flushLogger(logger: Logger): void {
  logger.flush();
}

function stringifyBigints(object: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}
