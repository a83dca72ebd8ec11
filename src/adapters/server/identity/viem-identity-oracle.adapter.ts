// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/identity/viem-identity-oracle`
 * Purpose: Identity oracle adapter reading classifications from the oracle contract.
 * Scope: Implements IdentityOraclePort via EvmOnchainClient. Does not check expiry or suspension.
 * Invariants: Raw tuple validated before mapping; kind codes other than payer/payee map to OTHER; expiresAt clamped to the Date range.
 * Side-effects: IO (RPC calls via EvmOnchainClient)
 * Links: shared/web3/identity-oracle-abi.ts
 * @public
 */

import { z } from "zod";

import type {
  AccountAddress,
  Classification,
  ParticipantKind,
} from "@/core";
import type { IdentityOraclePort } from "@/ports";
import {
  type EvmOnchainClient,
  ORACLE_KIND_PAYEE,
  ORACLE_KIND_PAYER,
} from "@/shared/web3";

/** Largest millisecond value a Date can hold */
const MAX_DATE_MS = 8_640_000_000_000_000n;

const rawIdentitySchema = z.tuple([
  z.number().int().min(0).max(255),
  z.bigint().nonnegative(),
  z.boolean(),
]);

export function toParticipantKind(code: number): ParticipantKind {
  if (code === ORACLE_KIND_PAYER) return "PAYER";
  if (code === ORACLE_KIND_PAYEE) return "PAYEE";
  return "OTHER";
}

export function expiryFromSeconds(seconds: bigint): Date {
  const ms = seconds * 1000n;
  return new Date(Number(ms > MAX_DATE_MS ? MAX_DATE_MS : ms));
}

export class ViemIdentityOracleAdapter implements IdentityOraclePort {
  constructor(private readonly evmClient: EvmOnchainClient) {}

  async classify(params: {
    oracle: AccountAddress;
    account: AccountAddress;
  }): Promise<Classification> {
    const raw = await this.evmClient.readIdentity({
      oracle: params.oracle,
      account: params.account,
    });
    const [kindCode, expiresAtSeconds, suspended] =
      rawIdentitySchema.parse(raw);

    return {
      kind: toParticipantKind(kindCode),
      expiresAt: expiryFromSeconds(expiresAtSeconds),
      suspended,
    };
  }
}
