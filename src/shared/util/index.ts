// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util`
 * Purpose: Public surface for shared utilities via re-exports.
 * Scope: Re-exports public utility functions. Does not export internal helpers or types.
 * Invariants: No circular dependencies; maintains clean public API.
 * Side-effects: none
 * Notes: Changes here affect module's public API contract.
 * @public
 */

export { toAccountAddress } from "./address";
export { SerialExecutor } from "./serial-executor";
export { isTimeoutError, TimeoutError, withTimeout } from "./with-timeout";
