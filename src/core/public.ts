// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features via \@/core alias
 * @public
 */

export type {
  AccountAddress,
  ActionKind,
  Capability,
  Classification,
  ParticipantKind,
  PaymentConfig,
  PaymentDomainError,
  PaymentErrorCategory,
  PaymentErrorCode,
  Period,
  SettlementReceipt,
  SettlementSlot,
} from "./payments/public";
export {
  AlreadySettledError,
  AttributeExpiredError,
  callerClassMatchesRequired,
  DEFAULT_YEAR_FLOOR,
  formatPeriod,
  IncorrectAmountError,
  InvalidMonthError,
  InvalidReferenceError,
  InvalidYearError,
  isAlreadySettledError,
  isClassificationExpired,
  isExactFee,
  isNonZeroAmount,
  isOracleUnavailableError,
  isPaymentDomainError,
  isTransferFailedError,
  isUnauthorizedError,
  isValidMonth,
  isValidOracleReference,
  isValidYear,
  MAX_MONTH,
  MIN_MONTH,
  OracleUnavailableError,
  PAYMENT_ERROR_CATEGORY,
  PayoutPendingError,
  requiredKindFor,
  settlementKey,
  SuspendedParticipantError,
  TransferFailedError,
  UnauthorizedError,
  WrongParticipantClassError,
  ZeroAmountError,
} from "./payments/public";
