// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for expiry checks and event timestamps.
 * Scope: Provides current time in ISO format. Does not handle timezone conversion or date arithmetic.
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * Notes: Tests drive classification expiry through FakeClock
 * Links: Implemented by SystemClock, used by EligibilityOracleClient and event publishing
 * @public
 */

export interface Clock {
  /**
   * Get current time as ISO 8601 string
   */
  now(): string;
}
