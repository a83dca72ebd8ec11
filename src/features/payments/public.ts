// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/public`
 * Purpose: Public API for the payments feature.
 * Scope: Re-exports the services and types the bootstrap layer wires. Does not export adminGate internals.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  AdminConfig,
  type AdminConfigDeps,
  type AdminConfigInit,
} from "./services/adminConfig";
export {
  EligibilityOracleClient,
  type EligibilityOracleClientDeps,
} from "./services/eligibilityOracleClient";
export {
  PaymentGateway,
  type PaymentGatewayDeps,
  type PeriodSummary,
} from "./services/paymentGateway";
export { PeriodState, type PeriodStateDeps } from "./services/periodState";
