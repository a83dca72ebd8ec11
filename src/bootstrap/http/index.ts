// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP infrastructure barrel export.
 * Scope: Re-export router types, the Fastify server and error mapping. Does not implement logic.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export { mapErrorToResponse } from "./errorMapping";
export type { HealthState, RouterDeps } from "./router";
export { buildRpcServer } from "./server";
