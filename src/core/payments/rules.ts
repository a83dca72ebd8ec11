// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/rules`
 * Purpose: Business rules for period-gated payments: eligibility predicates, period and config validation, ledger keys.
 * Scope: Pure validation functions and constants with no side effects. Does not perform I/O or state mutations.
 * Invariants: Classification valid only while now < expiresAt; month 1..12; year > floor; amounts > 0; oracle reference non-zero.
 * Side-effects: none (pure functions)
 * Notes: callerClassMatchesRequired is the single place the class check lives: the caller's class must equal the class the action requires.
 * Links: Used by feature services for validation
 * @public
 */

import { isAddress, zeroAddress } from "viem";

import type {
  ActionKind,
  Classification,
  ParticipantKind,
  Period,
  SettlementSlot,
} from "./model";

/** Default floor for year validation; setYear requires year > floor */
export const DEFAULT_YEAR_FLOOR = 2000;

/** First and last valid month */
export const MIN_MONTH = 1;
export const MAX_MONTH = 12;

/**
 * Participant class each action requires
 */
export function requiredKindFor(action: ActionKind): ParticipantKind {
  switch (action) {
    case "FEE":
      return "PAYER";
    case "PAYOUT":
      return "PAYEE";
  }
}

/**
 * Class gate: the caller's class must equal the class the action requires.
 */
export function callerClassMatchesRequired(
  actual: ParticipantKind,
  required: ParticipantKind
): boolean {
  return actual === required;
}

/**
 * Expired when now has reached expiresAt (boundary counts as expired)
 */
export function isClassificationExpired(
  classification: Classification,
  now: Date
): boolean {
  return classification.expiresAt.getTime() <= now.getTime();
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= MIN_MONTH && month <= MAX_MONTH;
}

/**
 * @param floor - Fixed at deployment; the year must be strictly greater
 */
export function isValidYear(year: number, floor: number): boolean {
  return Number.isInteger(year) && year > floor;
}

/**
 * Amounts are unsigned; zero and negative values are rejected alike
 */
export function isNonZeroAmount(amount: bigint): boolean {
  return amount > 0n;
}

/**
 * Oracle reference must be a well-formed, non-zero address
 */
export function isValidOracleReference(reference: string): boolean {
  if (reference.length === 0) return false;
  if (!isAddress(reference, { strict: false })) return false;
  return reference.toLowerCase() !== zeroAddress;
}

/**
 * Fee must match exactly: no change-making, no partial credit
 */
export function isExactFee(value: bigint, feeAmount: bigint): boolean {
  return value === feeAmount;
}

/**
 * Canonical `YYYY-MM` label for a period
 */
export function formatPeriod(period: Period): string {
  return `${period.year}-${String(period.month).padStart(2, "0")}`;
}

/**
 * Composite key for the sparse ledger store.
 * Accounts are lowercased so checksum casing never splits a slot.
 */
export function settlementKey(slot: SettlementSlot): string {
  return `${slot.kind}:${formatPeriod(slot.period)}:${slot.account.toLowerCase()}`;
}
