// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for validated environment access.
 * Scope: Re-exports server env accessor and error type. Does not read process.env itself.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export {
  EnvValidationError,
  parseServerEnv,
  resetServerEnv,
  serverEnv,
} from "./server";
