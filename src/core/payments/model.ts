// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/model`
 * Purpose: Domain entities for period-gated fee collection and payouts.
 * Scope: Pure domain types with no infrastructure dependencies. Does not handle persistence or external services.
 * Invariants: Amounts are bigint in the settlement asset's smallest unit; month is 1..12; one live period at a time.
 * Side-effects: none (pure domain logic)
 * Notes: Accounts are checksummed EVM addresses; the classification is never stored, only read per call.
 * Links: Used by ports and features, implemented by adapters
 * @public
 */

/** Checksummed EVM address (`0x` + 40 hex chars) */
export type AccountAddress = `0x${string}`;

/**
 * Participant class reported by the identity oracle.
 * PAYER collects fees (students), PAYEE receives payouts (staff).
 */
export type ParticipantKind = "PAYER" | "PAYEE" | "OTHER";

/** The two gated actions, one settlement slot each per period */
export type ActionKind = "FEE" | "PAYOUT";

/** The single administrative capability */
export type Capability = "ADMIN";

/**
 * Live accounting period.
 * Ledger entries are keyed by this pair; a new period yields fresh slots.
 */
export interface Period {
  /** 1..12 */
  month: number;
  year: number;
}

/**
 * Oracle verdict for an account, fetched fresh on every gated call.
 */
export interface Classification {
  kind: ParticipantKind;
  /** Classification is valid only while now < expiresAt */
  expiresAt: Date;
  suspended: boolean;
}

/**
 * Admin-owned scalars read by every gated call.
 */
export interface PaymentConfig {
  /** Exact amount a payer must supply per period (> 0) */
  feeAmount: bigint;
  /** Amount sent to a payee per period (> 0) */
  payoutAmount: bigint;
  /** Address of the identity oracle contract (non-zero) */
  oracleReference: AccountAddress;
}

/**
 * Composite ledger key: one boolean slot per (account, period, kind).
 */
export interface SettlementSlot {
  account: AccountAddress;
  period: Period;
  kind: ActionKind;
}

/**
 * Result of a successful gated action.
 */
export interface SettlementReceipt {
  account: AccountAddress;
  period: Period;
  kind: ActionKind;
  amount: bigint;
  /** Outbound transfer hash for payouts; null for fee collection */
  txHash: string | null;
}
