// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability entry point.
 * Scope: Unified entry point for logging utilities and request context. Does not implement logic.
 * Invariants: No imports from bootstrap or ports (structural typing only).
 * Side-effects: none
 * @public
 */

export type { RequestContext } from "./context";
export {
  CALLER_HEADER,
  createRequestContext,
  REQUEST_ID_HEADER,
} from "./context";
export type {
  Logger,
  PaymentsConfigChangedLog,
  PaymentsLogEvent,
  PaymentsPeriodChangedLog,
  PaymentsRejectedLog,
  PaymentsSettledLog,
} from "./logging";
export {
  flushLogger,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  makeLogger,
  makeNoopLogger,
} from "./logging";
