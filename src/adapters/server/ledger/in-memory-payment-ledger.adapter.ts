// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/in-memory-payment-ledger`
 * Purpose: Sparse settlement ledger held in process memory.
 * Scope: Implements PaymentLedgerStore with hash maps over the composite slot key. Does not persist across restarts.
 * Invariants: Absent key reads false; markSettled never un-sets and drops any pending record; per-(period, kind) counts only grow on first mark.
 * Side-effects: none (in-memory only)
 * Notes: O(1) amortised lookup; no pre-sizing by calendar.
 * Links: core/payments/rules.settlementKey
 * @public
 */

import {
  type ActionKind,
  formatPeriod,
  type Period,
  type SettlementSlot,
  settlementKey,
} from "@/core";
import type { PaymentLedgerStore, PendingPayout } from "@/ports";

function bucketKey(period: Period, kind: ActionKind): string {
  return `${kind}:${formatPeriod(period)}`;
}

export class InMemoryPaymentLedger implements PaymentLedgerStore {
  private readonly settled = new Set<string>();
  private readonly counts = new Map<string, number>();
  private readonly pending = new Map<string, PendingPayout>();

  async isSettled(slot: SettlementSlot): Promise<boolean> {
    return this.settled.has(settlementKey(slot));
  }

  async markSettled(slot: SettlementSlot): Promise<void> {
    const key = settlementKey(slot);
    this.pending.delete(key);
    if (this.settled.has(key)) return;

    this.settled.add(key);
    const bucket = bucketKey(slot.period, slot.kind);
    this.counts.set(bucket, (this.counts.get(bucket) ?? 0) + 1);
  }

  async countSettled(period: Period, kind: ActionKind): Promise<number> {
    return this.counts.get(bucketKey(period, kind)) ?? 0;
  }

  async markPending(slot: SettlementSlot, payout: PendingPayout): Promise<void> {
    this.pending.set(settlementKey(slot), { ...payout });
  }

  async pendingPayout(slot: SettlementSlot): Promise<PendingPayout | null> {
    return this.pending.get(settlementKey(slot)) ?? null;
  }

  async clearPending(slot: SettlementSlot): Promise<void> {
    this.pending.delete(settlementKey(slot));
  }
}
