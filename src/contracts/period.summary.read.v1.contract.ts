// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/period.summary.read.v1.contract`
 * Purpose: Contract for the live period, current configuration and settlement counts.
 * Scope: Edge IO definition. Does not contain business logic.
 * Invariants: Amounts as decimal wei strings.
 * Side-effects: none
 * Links: GET /v1/period
 * @internal
 */

import { z } from "zod";

import { periodOutputSchema } from "./payments.schemas.v1";

export const periodSummaryReadOperation = {
  id: "period.summary.read.v1",
  summary: "Live period summary",
  description:
    "Current period, fee and payout amounts, oracle reference and how many settlements of each kind it holds",
  input: null,
  output: z.object({
    period: periodOutputSchema,
    feeAmount: z.string(),
    payoutAmount: z.string(),
    oracleReference: z.string(),
    feesCollected: z.number().int().nonnegative(),
    payoutsDisbursed: z.number().int().nonnegative(),
  }),
} as const;

export type PeriodSummaryReadOutput = z.infer<
  typeof periodSummaryReadOperation.output
>;
