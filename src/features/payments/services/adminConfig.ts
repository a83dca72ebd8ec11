// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/adminConfig`
 * Purpose: Owns fee amount, payout amount and oracle reference, with admin-only setters.
 * Scope: Validated mutation plus change notifications. Does not read the oracle or move funds.
 * Invariants: feeAmount > 0; payoutAmount > 0; oracleReference is a checksummed non-zero address; authorization precedes validation.
 * Side-effects: IO (access control, event sink, logging)
 * Links: core/payments/rules, adminGate
 * @public
 */

import {
  type AccountAddress,
  InvalidReferenceError,
  isNonZeroAmount,
  isPaymentDomainError,
  isValidOracleReference,
  type PaymentConfig,
  ZeroAmountError,
} from "@/core";
import type { AccessControlPort, Clock, PaymentEventSink } from "@/ports";
import type {
  Logger,
  PaymentsConfigChangedLog,
} from "@/shared/observability";
import { type SerialExecutor, toAccountAddress } from "@/shared/util";

import { publishStamped, requireAdmin } from "./adminGate";

export interface AdminConfigDeps {
  accessControl: AccessControlPort;
  events: PaymentEventSink;
  clock: Clock;
  executor: SerialExecutor;
  log: Logger;
}

export interface AdminConfigInit {
  feeAmount: bigint;
  payoutAmount: bigint;
  oracleReference: string;
}

function normalizeReference(reference: string): AccountAddress {
  const normalized = isValidOracleReference(reference)
    ? toAccountAddress(reference)
    : null;
  if (!normalized) {
    throw new InvalidReferenceError(reference);
  }
  return normalized;
}

export class AdminConfig {
  private config: PaymentConfig;

  constructor(
    initial: AdminConfigInit,
    private readonly deps: AdminConfigDeps
  ) {
    if (!isNonZeroAmount(initial.feeAmount)) {
      throw new ZeroAmountError("feeAmount", initial.feeAmount);
    }
    if (!isNonZeroAmount(initial.payoutAmount)) {
      throw new ZeroAmountError("payoutAmount", initial.payoutAmount);
    }
    this.config = {
      feeAmount: initial.feeAmount,
      payoutAmount: initial.payoutAmount,
      oracleReference: normalizeReference(initial.oracleReference),
    };
  }

  snapshot(): PaymentConfig {
    return { ...this.config };
  }

  setFee(caller: string, amount: bigint): Promise<PaymentConfig> {
    return this.mutate("setFee", caller, async () => {
      if (!isNonZeroAmount(amount)) {
        throw new ZeroAmountError("feeAmount", amount);
      }
      this.config = { ...this.config, feeAmount: amount };
      this.logChange(caller, "feeAmount", amount.toString());
      publishStamped(this.deps.events, this.deps.clock, {
        type: "FeeAmountChanged",
        amount,
      });
    });
  }

  setPayout(caller: string, amount: bigint): Promise<PaymentConfig> {
    return this.mutate("setPayout", caller, async () => {
      if (!isNonZeroAmount(amount)) {
        throw new ZeroAmountError("payoutAmount", amount);
      }
      this.config = { ...this.config, payoutAmount: amount };
      this.logChange(caller, "payoutAmount", amount.toString());
      publishStamped(this.deps.events, this.deps.clock, {
        type: "PayoutAmountChanged",
        amount,
      });
    });
  }

  setOracleReference(
    caller: string,
    reference: string
  ): Promise<PaymentConfig> {
    return this.mutate("setOracleReference", caller, async () => {
      const oracleReference = normalizeReference(reference);
      this.config = { ...this.config, oracleReference };
      this.logChange(caller, "oracleReference", oracleReference);
      publishStamped(this.deps.events, this.deps.clock, {
        type: "OracleReferenceChanged",
        oracleReference,
      });
    });
  }

  /**
   * Runs an admin mutation on the shared executor after the capability check
   */
  private mutate(
    op: string,
    caller: string,
    apply: () => Promise<void>
  ): Promise<PaymentConfig> {
    return this.deps.executor.run(async () => {
      try {
        await requireAdmin(this.deps.accessControl, caller);
        await apply();
        return this.snapshot();
      } catch (error) {
        const errorCode = isPaymentDomainError(error) ? error.code : "UNKNOWN";
        this.deps.log.warn({ op, caller, errorCode }, "config change rejected");
        throw error;
      }
    });
  }

  private logChange(
    caller: string,
    field: PaymentsConfigChangedLog["field"],
    value: string
  ): void {
    const changedEvent: PaymentsConfigChangedLog = {
      event: "payments.config_changed",
      caller,
      field,
      value,
    };
    this.deps.log.info(changedEvent, "config changed");
  }
}
