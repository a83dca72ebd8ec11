// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.status.read.v1.contract`
 * Purpose: Contract for reading an account's settlement flags in the live period.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Only the live period is queryable.
 * Side-effects: none
 * Notes: `account` query parameter defaults to the caller.
 * Links: GET /v1/payments/status
 * @internal
 */

import { z } from "zod";

import {
  accountAddressSchema,
  periodOutputSchema,
} from "./payments.schemas.v1";

export const paymentsStatusReadOperation = {
  id: "payments.status.read.v1",
  summary: "Settlement status for the live period",
  description: "Whether the account has paid its fee and received its payout",
  input: z.object({
    account: accountAddressSchema,
  }),
  output: z.object({
    account: z.string(),
    period: periodOutputSchema,
    feeSettled: z.boolean(),
    payoutSettled: z.boolean(),
  }),
} as const;

export type PaymentsStatusReadInput = z.infer<
  typeof paymentsStatusReadOperation.input
>;
export type PaymentsStatusReadOutput = z.infer<
  typeof paymentsStatusReadOperation.output
>;
