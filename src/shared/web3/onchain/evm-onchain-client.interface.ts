// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/onchain/evm-onchain-client.interface`
 * Purpose: Internal infra seam for EVM RPC operations (NOT a domain port).
 * Scope: Wraps the viem reads and writes the adapters need. Does not implement business logic or validation.
 * Invariants: All EVM adapters MUST use this interface (never call viem/RPC directly).
 * Side-effects: none (interface definition only)
 * Notes: Production uses ViemEvmOnchainClient; tests use FakeEvmOnchainClient.
 * @public
 */

import type { Address, Hash } from "viem";

/**
 * Raw tuple returned by the oracle's classify() view
 */
export type RawIdentityTuple = readonly [number, bigint, boolean];

export interface TxReceiptStatus {
  status: "success" | "reverted";
}

export interface EvmOnchainClient {
  /**
   * Reads classify(account) from the identity oracle contract.
   */
  readIdentity(params: {
    oracle: Address;
    account: Address;
  }): Promise<RawIdentityTuple>;

  /**
   * Signs and broadcasts a native-value transfer from the treasury signer.
   */
  sendNativeTransfer(params: { to: Address; value: bigint }): Promise<Hash>;

  /**
   * Waits until the transaction is mined with the required confirmations.
   * Resolves null if the receipt does not arrive within timeoutMs.
   */
  waitForReceipt(params: {
    hash: Hash;
    timeoutMs: number;
  }): Promise<TxReceiptStatus | null>;

  /**
   * Receipt of a transaction with the required confirmations, or null if it has none yet.
   */
  getReceipt(hash: Hash): Promise<TxReceiptStatus | null>;
}
