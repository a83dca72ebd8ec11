// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/payments/payment-builders`
 * Purpose: Deterministic accounts, classifications and a fully wired payments graph over fakes.
 * Scope: Test fixture utilities. Does NOT perform I/O or interact with external dependencies.
 * Invariants: Each harness owns independent state (ledger, config, period, executor); defaults are fee=100, payout=500, period 3/2024.
 * Side-effects: none (pure data builders)
 * Links: core/payments/model, features/payments
 * @public
 */

import {
  FakeFundsTransferAdapter,
  FakeIdentityOracleAdapter,
} from "@/adapters/test";
import { InMemoryPaymentLedger } from "@/adapters/server";
import type { AccountAddress, Classification, Period } from "@/core";
import {
  AdminConfig,
  EligibilityOracleClient,
  PaymentGateway,
  PeriodState,
} from "@/features/payments/public";
import { makeNoopLogger } from "@/shared/observability";
import { SerialExecutor } from "@/shared/util";

import { FakeClock } from "../fake-clock";
import { FakeAccessControl, FakePaymentEventSink } from "./fakes";

export const ADMIN: AccountAddress = "0x00000000000000000000000000000000000000A1";
export const PAYER_A: AccountAddress =
  "0x0000000000000000000000000000000000000A0A";
export const PAYER_C: AccountAddress =
  "0x0000000000000000000000000000000000000C0C";
export const PAYEE_B: AccountAddress =
  "0x0000000000000000000000000000000000000B0B";
export const OUTSIDER: AccountAddress =
  "0x0000000000000000000000000000000000000D0D";
export const ORACLE: AccountAddress =
  "0x00000000000000000000000000000000000000C1";

/** Harness clock start */
export const NOW = "2024-03-15T12:00:00.000Z";

export function buildClassification(
  overrides: Partial<Classification> = {}
): Classification {
  return {
    kind: "PAYER",
    expiresAt: new Date("2030-01-01T00:00:00.000Z"),
    suspended: false,
    ...overrides,
  };
}

export interface PaymentsHarnessOptions {
  feeAmount?: bigint;
  payoutAmount?: bigint;
  period?: Period;
  yearFloor?: number;
  oracleTimeoutMs?: number;
  transferTimeoutMs?: number;
}

export function makePaymentsHarness(options: PaymentsHarnessOptions = {}) {
  const clock = new FakeClock(NOW);
  const accessControl = new FakeAccessControl([ADMIN]);
  const events = new FakePaymentEventSink();
  const oracle = new FakeIdentityOracleAdapter();
  const transfer = new FakeFundsTransferAdapter();
  const ledger = new InMemoryPaymentLedger();
  const executor = new SerialExecutor();
  const log = makeNoopLogger();

  const adminConfig = new AdminConfig(
    {
      feeAmount: options.feeAmount ?? 100n,
      payoutAmount: options.payoutAmount ?? 500n,
      oracleReference: ORACLE,
    },
    { accessControl, events, clock, executor, log }
  );
  const periodState = new PeriodState(
    options.period ?? { month: 3, year: 2024 },
    {
      accessControl,
      events,
      clock,
      executor,
      log,
      yearFloor: options.yearFloor ?? 2000,
    }
  );
  const eligibility = new EligibilityOracleClient({
    oracle,
    config: adminConfig,
    clock,
    timeoutMs: options.oracleTimeoutMs ?? 1_000,
  });
  const gateway = new PaymentGateway({
    eligibility,
    periodState,
    adminConfig,
    ledger,
    transfer,
    events,
    clock,
    executor,
    log,
    transferTimeoutMs: options.transferTimeoutMs ?? 1_000,
  });

  // Standard cast: A and C pay, B is paid
  oracle.setClassification(PAYER_A, buildClassification({ kind: "PAYER" }));
  oracle.setClassification(PAYER_C, buildClassification({ kind: "PAYER" }));
  oracle.setClassification(PAYEE_B, buildClassification({ kind: "PAYEE" }));

  return {
    clock,
    accessControl,
    events,
    oracle,
    transfer,
    ledger,
    executor,
    adminConfig,
    periodState,
    eligibility,
    gateway,
  };
}

export type PaymentsHarness = ReturnType<typeof makePaymentsHarness>;
