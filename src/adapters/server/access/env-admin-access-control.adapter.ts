// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/access/env-admin-access-control`
 * Purpose: Administrative capability backed by a configured address list.
 * Scope: Implements AccessControlPort from ADMIN_ADDRESSES. Does not support runtime grants or revocations.
 * Invariants: Comparison is case-insensitive on hex addresses; the list is fixed at construction.
 * Side-effects: none
 * @public
 */

import type { AccessControlPort } from "@/ports";

export class EnvAdminAccessControl implements AccessControlPort {
  private readonly admins: ReadonlySet<string>;

  constructor(adminAddresses: readonly string[]) {
    this.admins = new Set(adminAddresses.map((a) => a.toLowerCase()));
  }

  async hasAdminCapability(caller: string): Promise<boolean> {
    return this.admins.has(caller.toLowerCase());
  }
}
