// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/onchain/viem-evm-onchain-client`
 * Purpose: Production EVM on-chain client using viem for oracle reads and treasury transfers.
 * Scope: Implements EvmOnchainClient interface with real RPC calls. Does not implement business logic.
 * Invariants: Clients are built lazily on first call; the wallet client requires a treasury key.
 * Side-effects: IO (RPC calls to EVM node)
 * Notes: Used by ViemIdentityOracleAdapter and ViemFundsTransferAdapter.
 * @public
 */

import {
  type Address,
  createPublicClient,
  createWalletClient,
  type Hash,
  type Hex,
  http,
  isHex,
  TransactionReceiptNotFoundError,
  WaitForTransactionReceiptTimeoutError,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";

import {
  CHAIN,
  type EvmOnchainClient,
  IDENTITY_ORACLE_ABI,
  PAYOUT_CONFIRMATIONS,
  type RawIdentityTuple,
  type TxReceiptStatus,
} from "@/shared/web3";

export interface ViemEvmOnchainClientConfig {
  rpcUrl: string;
  /** Treasury signer; payouts are impossible without it */
  treasuryPrivateKey?: string | undefined;
}

function createReader(rpcUrl: string) {
  return createPublicClient({ chain: CHAIN, transport: http(rpcUrl) });
}

function createTreasuryWallet(rpcUrl: string, privateKey: Hex) {
  return createWalletClient({
    account: privateKeyToAccount(privateKey),
    chain: CHAIN,
    transport: http(rpcUrl),
  });
}

/**
 * Production EVM on-chain client using viem.
 */
export class ViemEvmOnchainClient implements EvmOnchainClient {
  private reader: ReturnType<typeof createReader> | null = null;
  private wallet: ReturnType<typeof createTreasuryWallet> | null = null;

  constructor(private readonly config: ViemEvmOnchainClientConfig) {}

  private getReader(): ReturnType<typeof createReader> {
    if (!this.reader) {
      this.reader = createReader(this.config.rpcUrl);
    }
    return this.reader;
  }

  private getWallet(): ReturnType<typeof createTreasuryWallet> {
    if (this.wallet) {
      return this.wallet;
    }
    const key = this.config.treasuryPrivateKey;
    if (!key || !isHex(key)) {
      throw new Error(
        "[ViemEvmOnchainClient] TREASURY_PRIVATE_KEY is required to send payouts"
      );
    }
    this.wallet = createTreasuryWallet(this.config.rpcUrl, key);
    return this.wallet;
  }

  async readIdentity(params: {
    oracle: Address;
    account: Address;
  }): Promise<RawIdentityTuple> {
    return this.getReader().readContract({
      address: params.oracle,
      abi: IDENTITY_ORACLE_ABI,
      functionName: "classify",
      args: [params.account],
    });
  }

  async sendNativeTransfer(params: {
    to: Address;
    value: bigint;
  }): Promise<Hash> {
    return this.getWallet().sendTransaction({
      to: params.to,
      value: params.value,
    });
  }

  async waitForReceipt(params: {
    hash: Hash;
    timeoutMs: number;
  }): Promise<TxReceiptStatus | null> {
    try {
      const receipt = await this.getReader().waitForTransactionReceipt({
        hash: params.hash,
        confirmations: PAYOUT_CONFIRMATIONS,
        timeout: params.timeoutMs,
      });
      return { status: receipt.status };
    } catch (error) {
      if (error instanceof WaitForTransactionReceiptTimeoutError) return null;
      throw error;
    }
  }

  async getReceipt(hash: Hash): Promise<TxReceiptStatus | null> {
    const reader = this.getReader();
    try {
      const receipt = await reader.getTransactionReceipt({ hash });
      const confirmations = await reader.getTransactionConfirmations({
        transactionReceipt: receipt,
      });
      if (confirmations < BigInt(PAYOUT_CONFIRMATIONS)) return null;
      return { status: receipt.status };
    } catch (error) {
      if (error instanceof TransactionReceiptNotFoundError) return null;
      throw error;
    }
  }
}
