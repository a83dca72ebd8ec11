// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/identity-oracle-abi`
 * Purpose: ABI fragment of the identity oracle contract.
 * Scope: The single view function the service reads. Does not include admin functions of the oracle.
 * Invariants: kind codes 1 = payer, 2 = payee, anything else = other; expiresAt in Unix seconds.
 * Side-effects: none
 * Links: Used by ViemEvmOnchainClient.readIdentity
 * @public
 */

export const IDENTITY_ORACLE_ABI = [
  {
    name: "classify",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "account", type: "address" }],
    outputs: [
      { name: "kind", type: "uint8" },
      { name: "expiresAt", type: "uint64" },
      { name: "suspended", type: "bool" },
    ],
  },
] as const;

export const ORACLE_KIND_PAYER = 1;
export const ORACLE_KIND_PAYEE = 2;
