// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/identity-oracle`
 * Purpose: Identity oracle port - classifies an account as payer, payee or other.
 * Scope: Single read operation against an oracle identified by address. Does not check expiry or suspension.
 * Invariants: Read-only; adapters throw on transport failure and never return partial classifications.
 * Side-effects: none (interface definition only)
 * Notes: Callers wrap this with a timeout and map failures to OracleUnavailableError.
 * Links: Implemented by ViemIdentityOracleAdapter and FakeIdentityOracleAdapter (test)
 * @public
 */

import type { AccountAddress, Classification } from "@/core";

export interface IdentityOraclePort {
  /**
   * @param params.oracle - Oracle contract address from the live config
   * @param params.account - Account to classify
   */
  classify(params: {
    oracle: AccountAddress;
    account: AccountAddress;
  }): Promise<Classification>;
}
