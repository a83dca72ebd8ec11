// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.payout.disburse.v1.contract`
 * Purpose: External API contract for a payee's per-period payout.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version.
 * Side-effects: none
 * Notes: No body; the payout amount is the configured one.
 * Links: POST /v1/payments/payout
 * @internal
 */

import type { z } from "zod";

import { settlementReceiptOutputSchema } from "./payments.schemas.v1";

export const paymentsPayoutDisburseOperation = {
  id: "payments.payout.disburse.v1",
  summary: "Receive the period payout",
  description:
    "Payee receives the configured payout for the live period; at most once per period",
  input: null,
  output: settlementReceiptOutputSchema,
} as const;

export type PaymentsPayoutDisburseOutput = z.infer<
  typeof paymentsPayoutDisburseOperation.output
>;
