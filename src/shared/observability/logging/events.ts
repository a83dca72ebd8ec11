// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/events`
 * Purpose: Strict log event names and payload shapes for the payments domain.
 * Scope: Define log event types and their required/optional fields. Does not implement event creation.
 * Invariants: Every payments log line carries `event`; amounts logged as decimal strings.
 * Side-effects: none
 * Notes: Use these types to keep logs searchable and consistent across services.
 * Links: Imported by observability/logging; used by features for domain logs.
 * @public
 */

export type PaymentsLogEventName =
  | "payments.settled"
  | "payments.rejected"
  | "payments.config_changed"
  | "payments.period_changed"
  | "payments.event";

export interface PaymentsSettledLog {
  event: "payments.settled";
  account: string;
  kind: "FEE" | "PAYOUT";
  period: string;
  amount: string;
  txHash?: string | undefined;
  durationMs: number;
}

export interface PaymentsRejectedLog {
  event: "payments.rejected";
  account: string;
  kind: "FEE" | "PAYOUT";
  errorCode: string;
  durationMs: number;
}

export interface PaymentsConfigChangedLog {
  event: "payments.config_changed";
  caller: string;
  field: "feeAmount" | "payoutAmount" | "oracleReference";
  value: string;
}

export interface PaymentsPeriodChangedLog {
  event: "payments.period_changed";
  caller: string;
  period: string;
}

export type PaymentsLogEvent =
  | PaymentsSettledLog
  | PaymentsRejectedLog
  | PaymentsConfigChangedLog
  | PaymentsPeriodChangedLog;
