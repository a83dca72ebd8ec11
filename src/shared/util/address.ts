// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/address`
 * Purpose: Account address normalisation at the boundary.
 * Scope: Checksum and compare EVM addresses via viem. Does not resolve ENS names.
 * Invariants: Returned addresses are EIP-55 checksummed.
 * Side-effects: none
 * Links: Used by contracts, access control and adapters
 * @public
 */

import { getAddress, isAddress } from "viem";

import type { AccountAddress } from "@/core";

/**
 * Checksummed address, or null when the input is not an address
 */
export function toAccountAddress(value: string): AccountAddress | null {
  if (!isAddress(value, { strict: false })) return null;
  return getAddress(value);
}
