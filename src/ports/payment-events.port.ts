// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/payment-events`
 * Purpose: Change notifications for external observers.
 * Scope: Typed event union and sink interface. Does not define a wire format.
 * Invariants: Config/period events carry the full new value so observers can rebuild state without re-querying.
 * Side-effects: none (interface definition only)
 * Notes: PaymentReminder always follows CurrentMonthChanged. Settlement events are published after the ledger commit.
 * Links: Implemented by PinoPaymentEventSink; captured by FakePaymentEventSink in tests
 * @public
 */

import type { AccountAddress, Period } from "@/core";

interface EventBase {
  /** ISO 8601 timestamp from the Clock port */
  occurredAt: string;
}

export interface FeeAmountChangedEvent extends EventBase {
  type: "FeeAmountChanged";
  amount: bigint;
}

export interface PayoutAmountChangedEvent extends EventBase {
  type: "PayoutAmountChanged";
  amount: bigint;
}

export interface CurrentMonthChangedEvent extends EventBase {
  type: "CurrentMonthChanged";
  month: number;
  year: number;
}

export interface CurrentYearChangedEvent extends EventBase {
  type: "CurrentYearChanged";
  month: number;
  year: number;
}

export interface OracleReferenceChangedEvent extends EventBase {
  type: "OracleReferenceChanged";
  oracleReference: AccountAddress;
}

export interface PaymentReminderEvent extends EventBase {
  type: "PaymentReminder";
  month: number;
  year: number;
}

export interface FeeCollectedEvent extends EventBase {
  type: "FeeCollected";
  account: AccountAddress;
  period: Period;
  amount: bigint;
}

export interface PayoutDisbursedEvent extends EventBase {
  type: "PayoutDisbursed";
  account: AccountAddress;
  period: Period;
  amount: bigint;
  txHash: string;
}

export type PaymentEvent =
  | FeeAmountChangedEvent
  | PayoutAmountChangedEvent
  | CurrentMonthChangedEvent
  | CurrentYearChangedEvent
  | OracleReferenceChangedEvent
  | PaymentReminderEvent
  | FeeCollectedEvent
  | PayoutDisbursedEvent;

export type PaymentEventType = PaymentEvent["type"];

export interface PaymentEventSink {
  /**
   * Must not throw; sinks isolate observer failures themselves
   */
  publish(event: PaymentEvent): void;
}
