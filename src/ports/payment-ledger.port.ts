// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/payment-ledger`
 * Purpose: Settlement ledger port - one boolean per (account, period, kind).
 * Scope: Read/mark settlement flags. Does not validate eligibility or move funds.
 * Invariants:
 * - Absent entry reads as false.
 * - markSettled is idempotent in effect; there is no delete or reset.
 * - Store is sparse over an unbounded key space (never pre-sized by calendar).
 * - A pending payout blocks a fresh transfer for its slot until it is cleared or settled.
 * Side-effects: none (interface definition only)
 * Notes: Callers serialise check-then-mark; the store itself does not lock.
 * Links: Implemented by InMemoryPaymentLedger, used by PaymentGateway
 * @public
 */

import type { ActionKind, Period, SettlementSlot } from "@/core";

/**
 * Payout that left the treasury without a confirmed outcome.
 * txHash is null while the send call itself has not returned.
 */
export interface PendingPayout {
  txHash: string | null;
  amount: bigint;
}

export interface PaymentLedgerStore {
  isSettled(slot: SettlementSlot): Promise<boolean>;

  markSettled(slot: SettlementSlot): Promise<void>;

  /**
   * Number of settled slots for a period and kind (used by the period summary)
   */
  countSettled(period: Period, kind: ActionKind): Promise<number>;

  markPending(slot: SettlementSlot, payout: PendingPayout): Promise<void>;

  pendingPayout(slot: SettlementSlot): Promise<PendingPayout | null>;

  clearPending(slot: SettlementSlot): Promise<void>;
}
