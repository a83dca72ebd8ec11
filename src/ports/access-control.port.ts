// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/access-control`
 * Purpose: Port for the single administrative capability check.
 * Scope: Answers "is this caller an admin". Does not model role hierarchies or grant/revoke flows.
 * Invariants: Read-only; a false answer is final for the call in progress.
 * Side-effects: none (interface definition only)
 * Links: Implemented by EnvAdminAccessControl, FakeAccessControl (test)
 * @public
 */

export interface AccessControlPort {
  /**
   * @param caller - Caller identity as received at the boundary (address string)
   */
  hasAdminCapability(caller: string): Promise<boolean>;
}
