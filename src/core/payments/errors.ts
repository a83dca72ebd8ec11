// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/errors`
 * Purpose: Domain errors for gated fee collection, payouts and admin configuration.
 * Scope: Pure error types with no infrastructure dependencies. Does not handle HTTP status codes.
 * Invariants: Every error carries a readonly `code` literal and structured fields; every code maps to exactly one category.
 * Side-effects: none (error definitions only)
 * Notes: RPC layer translates codes to HTTP responses. Nothing here is retried by the core.
 * Links: Used by feature services, handled by bootstrap/http router
 * @public
 */

import type {
  AccountAddress,
  ActionKind,
  Capability,
  ParticipantKind,
  Period,
} from "./model";
import { formatPeriod } from "./rules";

// ============================================================================
// Authorization
// ============================================================================

/**
 * Caller lacks the capability an admin setter requires
 */
export class UnauthorizedError extends Error {
  public readonly code = "UNAUTHORIZED" as const;

  constructor(
    /** Capability the operation requires */
    public readonly capability: Capability,
    /** Caller that was refused */
    public readonly caller: string
  ) {
    super(`Caller ${caller} lacks required capability ${capability}`);
    this.name = "UnauthorizedError";
  }
}

/**
 * Oracle classification does not match the class the action requires
 */
export class WrongParticipantClassError extends Error {
  public readonly code = "WRONG_PARTICIPANT_CLASS" as const;

  constructor(
    public readonly account: AccountAddress,
    public readonly expected: ParticipantKind,
    public readonly actual: ParticipantKind
  ) {
    super(
      `Account ${account} is classified ${actual}; this action requires ${expected}`
    );
    this.name = "WrongParticipantClassError";
  }
}

export class SuspendedParticipantError extends Error {
  public readonly code = "SUSPENDED_PARTICIPANT" as const;

  constructor(public readonly account: AccountAddress) {
    super(`Account ${account} is suspended`);
    this.name = "SuspendedParticipantError";
  }
}

// ============================================================================
// Validation
// ============================================================================

export class ZeroAmountError extends Error {
  public readonly code = "ZERO_AMOUNT" as const;

  constructor(
    /** Which setting was being changed */
    public readonly field: "feeAmount" | "payoutAmount",
    public readonly amount: bigint
  ) {
    super(`${field} must be greater than zero (got ${amount})`);
    this.name = "ZeroAmountError";
  }
}

export class InvalidReferenceError extends Error {
  public readonly code = "INVALID_REFERENCE" as const;

  constructor(public readonly reference: string) {
    super(
      `Oracle reference ${reference === "" ? "<empty>" : reference} is not a usable contract address`
    );
    this.name = "InvalidReferenceError";
  }
}

export class InvalidMonthError extends Error {
  public readonly code = "INVALID_MONTH" as const;

  constructor(public readonly month: number) {
    super(`Month must be an integer between 1 and 12 (got ${month})`);
    this.name = "InvalidMonthError";
  }
}

export class InvalidYearError extends Error {
  public readonly code = "INVALID_YEAR" as const;

  constructor(
    public readonly year: number,
    /** Year must be strictly greater than this */
    public readonly floor: number
  ) {
    super(`Year must be an integer greater than ${floor} (got ${year})`);
    this.name = "InvalidYearError";
  }
}

/**
 * Supplied fee does not exactly equal the configured fee
 * No change-making and no partial credit
 */
export class IncorrectAmountError extends Error {
  public readonly code = "INCORRECT_AMOUNT" as const;

  constructor(
    public readonly expected: bigint,
    public readonly received: bigint
  ) {
    super(`Expected exactly ${expected}, received ${received}`);
    this.name = "IncorrectAmountError";
  }
}

// ============================================================================
// State conflict
// ============================================================================

/**
 * The (account, period, kind) slot is already settled
 */
export class AlreadySettledError extends Error {
  public readonly code = "ALREADY_SETTLED" as const;

  constructor(
    public readonly account: AccountAddress,
    public readonly period: Period,
    public readonly kind: ActionKind
  ) {
    super(
      `${kind} for ${account} already settled in period ${formatPeriod(period)}`
    );
    this.name = "AlreadySettledError";
  }
}

/**
 * A payout for the slot was broadcast and its outcome is not known yet
 */
export class PayoutPendingError extends Error {
  public readonly code = "PAYOUT_PENDING" as const;

  constructor(
    public readonly account: AccountAddress,
    public readonly period: Period,
    /** Hash of the unconfirmed transfer, null while the send has not returned */
    public readonly txHash: string | null
  ) {
    super(
      `Payout for ${account} in period ${formatPeriod(period)} is awaiting confirmation${txHash === null ? "" : ` (${txHash})`}`
    );
    this.name = "PayoutPendingError";
  }
}

// ============================================================================
// Dependency failure
// ============================================================================

export class OracleUnavailableError extends Error {
  public readonly code = "ORACLE_UNAVAILABLE" as const;

  constructor(
    public readonly account: AccountAddress,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Identity oracle unavailable for ${account}: ${reason}`, options);
    this.name = "OracleUnavailableError";
  }
}

export class AttributeExpiredError extends Error {
  public readonly code = "ATTRIBUTE_EXPIRED" as const;

  constructor(
    public readonly account: AccountAddress,
    /** Expiry reported by the oracle */
    public readonly expiresAt: Date,
    /** Timestamp when the check occurred */
    public readonly now: Date
  ) {
    super(
      `Classification for ${account} expired at ${expiresAt.toISOString()} (checked at ${now.toISOString()})`
    );
    this.name = "AttributeExpiredError";
  }
}

/**
 * Outbound transfer did not complete; the ledger slot stays unsettled
 */
export class TransferFailedError extends Error {
  public readonly code = "TRANSFER_FAILED" as const;

  constructor(
    public readonly account: AccountAddress,
    public readonly amount: bigint,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Transfer of ${amount} to ${account} failed: ${reason}`, options);
    this.name = "TransferFailedError";
  }
}

// ============================================================================
// Classification
// ============================================================================

export type PaymentDomainError =
  | UnauthorizedError
  | WrongParticipantClassError
  | SuspendedParticipantError
  | ZeroAmountError
  | InvalidReferenceError
  | InvalidMonthError
  | InvalidYearError
  | IncorrectAmountError
  | AlreadySettledError
  | PayoutPendingError
  | OracleUnavailableError
  | AttributeExpiredError
  | TransferFailedError;

export type PaymentErrorCode = PaymentDomainError["code"];

export type PaymentErrorCategory =
  | "authorization"
  | "validation"
  | "state_conflict"
  | "dependency";

export const PAYMENT_ERROR_CATEGORY: Readonly<
  Record<PaymentErrorCode, PaymentErrorCategory>
> = {
  UNAUTHORIZED: "authorization",
  WRONG_PARTICIPANT_CLASS: "authorization",
  SUSPENDED_PARTICIPANT: "authorization",
  ZERO_AMOUNT: "validation",
  INVALID_REFERENCE: "validation",
  INVALID_MONTH: "validation",
  INVALID_YEAR: "validation",
  INCORRECT_AMOUNT: "validation",
  ALREADY_SETTLED: "state_conflict",
  PAYOUT_PENDING: "state_conflict",
  ORACLE_UNAVAILABLE: "dependency",
  ATTRIBUTE_EXPIRED: "dependency",
  TRANSFER_FAILED: "dependency",
};

/**
 * Type guard for any payment domain error
 */
export function isPaymentDomainError(
  error: unknown
): error is PaymentDomainError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    Object.hasOwn(PAYMENT_ERROR_CATEGORY, error.code)
  );
}

export function isUnauthorizedError(
  error: unknown
): error is UnauthorizedError {
  return error instanceof Error && error.name === "UnauthorizedError";
}

export function isAlreadySettledError(
  error: unknown
): error is AlreadySettledError {
  return error instanceof Error && error.name === "AlreadySettledError";
}

export function isTransferFailedError(
  error: unknown
): error is TransferFailedError {
  return error instanceof Error && error.name === "TransferFailedError";
}

export function isOracleUnavailableError(
  error: unknown
): error is OracleUnavailableError {
  return error instanceof Error && error.name === "OracleUnavailableError";
}
