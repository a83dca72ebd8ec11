// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/public`
 * Purpose: Public API for the period-gated payment domain.
 * Scope: Barrel export for payment core domain. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Notes: This is the entry point for other layers importing payment domain logic.
 * Links: Imported by ports, features, and adapters
 * @public
 */

// Errors
export {
  AlreadySettledError,
  AttributeExpiredError,
  IncorrectAmountError,
  InvalidMonthError,
  InvalidReferenceError,
  InvalidYearError,
  isAlreadySettledError,
  isOracleUnavailableError,
  isPaymentDomainError,
  isTransferFailedError,
  isUnauthorizedError,
  OracleUnavailableError,
  PAYMENT_ERROR_CATEGORY,
  type PaymentDomainError,
  type PaymentErrorCategory,
  type PaymentErrorCode,
  PayoutPendingError,
  SuspendedParticipantError,
  TransferFailedError,
  UnauthorizedError,
  WrongParticipantClassError,
  ZeroAmountError,
} from "./errors";
// Model types
export type {
  AccountAddress,
  ActionKind,
  Capability,
  Classification,
  ParticipantKind,
  PaymentConfig,
  Period,
  SettlementReceipt,
  SettlementSlot,
} from "./model";

// Rules and validation
export {
  callerClassMatchesRequired,
  DEFAULT_YEAR_FLOOR,
  formatPeriod,
  isClassificationExpired,
  isExactFee,
  isNonZeroAmount,
  isValidMonth,
  isValidOracleReference,
  isValidYear,
  MAX_MONTH,
  MIN_MONTH,
  requiredKindFor,
  settlementKey,
} from "./rules";
