// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/payments/viem-funds-transfer`
 * Purpose: Payout transfers as native-value transactions from the treasury signer.
 * Scope: Implements FundsTransferPort via EvmOnchainClient. Does not decide who gets paid or how much.
 * Invariants: SENT only after a successful receipt; reverted receipt and insufficient treasury balance are FAILED; a broadcast with no receipt inside receiptTimeoutMs is PENDING; other RPC errors propagate.
 * Side-effects: IO (signs and broadcasts transactions)
 * Notes: receiptTimeoutMs must be shorter than the caller's own bound so an unconfirmed broadcast comes back as PENDING with its hash.
 * @public
 */

import { BaseError, type Hash, InsufficientFundsError, isHash } from "viem";

import type { AccountAddress } from "@/core";
import type {
  FundsTransferPort,
  TransferResult,
  TransferStatus,
} from "@/ports";
import type { EvmOnchainClient } from "@/shared/web3";

function isInsufficientFunds(error: unknown): boolean {
  if (!(error instanceof BaseError)) return false;
  return error.walk((e) => e instanceof InsufficientFundsError) !== null;
}

export class ViemFundsTransferAdapter implements FundsTransferPort {
  constructor(
    private readonly evmClient: EvmOnchainClient,
    private readonly receiptTimeoutMs: number
  ) {}

  async send(params: {
    to: AccountAddress;
    amount: bigint;
  }): Promise<TransferResult> {
    let txHash: Hash;
    try {
      txHash = await this.evmClient.sendNativeTransfer({
        to: params.to,
        value: params.amount,
      });
    } catch (error) {
      if (isInsufficientFunds(error)) {
        return { status: "FAILED", reason: "INSUFFICIENT_FUNDS", txHash: null };
      }
      throw error;
    }

    const receipt = await this.evmClient.waitForReceipt({
      hash: txHash,
      timeoutMs: this.receiptTimeoutMs,
    });

    if (receipt === null) {
      return { status: "PENDING", txHash };
    }
    if (receipt.status === "success") {
      return { status: "SENT", txHash };
    }
    return { status: "FAILED", reason: "TX_REVERTED", txHash };
  }

  async status(txHash: string): Promise<TransferStatus> {
    if (!isHash(txHash)) {
      throw new Error(`Not a transaction hash: ${txHash}`);
    }
    const receipt = await this.evmClient.getReceipt(txHash);
    if (receipt === null) return "PENDING";
    return receipt.status === "success" ? "SENT" : "FAILED";
  }
}
