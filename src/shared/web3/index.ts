// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3`
 * Purpose: Public surface for chain constants, ABIs and the EVM client seam.
 * Scope: Re-exports only. Does not construct clients.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export { CHAIN, PAYOUT_CONFIRMATIONS } from "./chain";
export {
  IDENTITY_ORACLE_ABI,
  ORACLE_KIND_PAYEE,
  ORACLE_KIND_PAYER,
} from "./identity-oracle-abi";
export type {
  EvmOnchainClient,
  RawIdentityTuple,
  TxReceiptStatus,
} from "./onchain/evm-onchain-client.interface";
