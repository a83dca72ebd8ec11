// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/access/env-admin-access-control`
 * Purpose: Unit tests for the configured admin list.
 * Scope: Membership checks. Does NOT test env parsing.
 * Invariants: Case-insensitive membership.
 * Side-effects: none
 * Links: adapters/server/access/env-admin-access-control.adapter.ts
 * @public
 */

import { ADMIN, PAYER_A } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { EnvAdminAccessControl } from "@/adapters/server";

describe("EnvAdminAccessControl", () => {
  const access = new EnvAdminAccessControl([ADMIN.toLowerCase()]);

  it("grants listed addresses regardless of casing", async () => {
    expect(await access.hasAdminCapability(ADMIN)).toBe(true);
  });

  it("refuses everyone else", async () => {
    expect(await access.hasAdminCapability(PAYER_A)).toBe(false);
    expect(await access.hasAdminCapability("")).toBe(false);
  });
});
