// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/eligibilityOracleClient`
 * Purpose: Fetch and expiry-check the identity oracle's classification of an account.
 * Scope: Wraps IdentityOraclePort with the live oracle reference, a timeout and error mapping. Does not judge class or suspension.
 * Invariants: Every call reads the oracle fresh; any failure or timeout becomes OracleUnavailableError; expiresAt <= now is expired.
 * Side-effects: IO (oracle read via port)
 * Links: ports/identity-oracle.port.ts
 * @public
 */

import {
  type AccountAddress,
  AttributeExpiredError,
  type Classification,
  isClassificationExpired,
  OracleUnavailableError,
  type PaymentConfig,
} from "@/core";
import type { Clock, IdentityOraclePort } from "@/ports";
import { isTimeoutError, withTimeout } from "@/shared/util";

export interface EligibilityOracleClientDeps {
  oracle: IdentityOraclePort;
  config: { snapshot(): PaymentConfig };
  clock: Clock;
  timeoutMs: number;
}

export class EligibilityOracleClient {
  constructor(private readonly deps: EligibilityOracleClientDeps) {}

  async classify(account: AccountAddress): Promise<Classification> {
    const { oracleReference } = this.deps.config.snapshot();
    try {
      return await withTimeout(
        this.deps.oracle.classify({ oracle: oracleReference, account }),
        this.deps.timeoutMs,
        "identity oracle"
      );
    } catch (error) {
      const reason = isTimeoutError(error)
        ? "TIMEOUT"
        : error instanceof Error
          ? error.message
          : String(error);
      throw new OracleUnavailableError(account, reason, { cause: error });
    }
  }

  assertNotExpired(account: AccountAddress, classification: Classification): void {
    const now = new Date(this.deps.clock.now());
    if (isClassificationExpired(classification, now)) {
      throw new AttributeExpiredError(account, classification.expiresAt, now);
    }
  }
}
