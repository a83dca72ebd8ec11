// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces and event types. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Notes: Features and adapters import ports from here, never from individual files
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { AccessControlPort } from "./access-control.port";
export type { Clock } from "./clock.port";
export type {
  FundsTransferPort,
  TransferFailureReason,
  TransferResult,
  TransferStatus,
} from "./funds-transfer.port";
export type { IdentityOraclePort } from "./identity-oracle.port";
export type {
  CurrentMonthChangedEvent,
  CurrentYearChangedEvent,
  FeeAmountChangedEvent,
  FeeCollectedEvent,
  OracleReferenceChangedEvent,
  PaymentEvent,
  PaymentEventSink,
  PaymentEventType,
  PaymentReminderEvent,
  PayoutAmountChangedEvent,
  PayoutDisbursedEvent,
} from "./payment-events.port";
export type { PaymentLedgerStore, PendingPayout } from "./payment-ledger.port";
