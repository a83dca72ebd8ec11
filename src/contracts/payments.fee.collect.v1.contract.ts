// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.fee.collect.v1.contract`
 * Purpose: External API contract for a payer's per-period fee payment.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version.
 * Side-effects: none
 * Notes: Caller identity comes from the x-caller-address header, not the body.
 * Links: POST /v1/payments/fee
 * @internal
 */

import { z } from "zod";

import {
  settlementReceiptOutputSchema,
  weiInputSchema,
} from "./payments.schemas.v1";

export const paymentsFeeCollectOperation = {
  id: "payments.fee.collect.v1",
  summary: "Pay the period fee",
  description:
    "Payer supplies exactly the configured fee for the live period; at most once per period",
  input: z.object({
    value: weiInputSchema,
  }),
  output: settlementReceiptOutputSchema,
} as const;

export type PaymentsFeeCollectInput = z.infer<
  typeof paymentsFeeCollectOperation.input
>;
export type PaymentsFeeCollectOutput = z.infer<
  typeof paymentsFeeCollectOperation.output
>;
