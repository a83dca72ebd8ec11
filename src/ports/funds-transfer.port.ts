// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/funds-transfer`
 * Purpose: Outbound value transfer primitive used for payouts.
 * Scope: Moves value from the treasury to an account and reports the outcome. Does not handle custody or settlement finality policy.
 * Invariants: SENT means the value moved; FAILED means it did not; PENDING means broadcast with no receipt yet. Thrown errors are treated as FAILED by callers.
 * Side-effects: none (interface definition only)
 * Notes: Inbound fee value arrives with the collectFee call itself, so there is no receive operation.
 * Links: Implemented by ViemFundsTransferAdapter and FakeFundsTransferAdapter (test)
 * @public
 */

import type { AccountAddress } from "@/core";

export type TransferFailureReason =
  | "TX_REVERTED"
  | "INSUFFICIENT_FUNDS"
  | "REJECTED";

export type TransferResult =
  | { status: "SENT"; txHash: string }
  | { status: "PENDING"; txHash: string }
  | {
      status: "FAILED";
      reason: TransferFailureReason;
      txHash: string | null;
    };

export type TransferStatus = TransferResult["status"];

export interface FundsTransferPort {
  send(params: { to: AccountAddress; amount: bigint }): Promise<TransferResult>;

  /**
   * Current outcome of a broadcast transfer; PENDING until it has a receipt
   */
  status(txHash: string): Promise<TransferStatus>;
}
