// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.schemas.v1`
 * Purpose: Shared zod building blocks for the payments RPC contracts.
 * Scope: Address, wei amount, period and receipt schemas. Does not contain business logic.
 * Invariants: Addresses leave the schema checksummed; bigint amounts travel as decimal strings.
 * Side-effects: none
 * @internal
 */

import { z } from "zod";

import { toAccountAddress } from "@/shared/util";

export const accountAddressSchema = z.string().transform((value, ctx) => {
  const address = toAccountAddress(value);
  if (!address) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Must be a 0x-prefixed 20-byte hex address",
    });
    return z.NEVER;
  }
  return address;
});

/** Unsigned decimal wei string */
export const weiInputSchema = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative decimal integer string")
  .transform((value) => BigInt(value));

/**
 * Signed decimal wei string; sign and zero are left for the domain to reject
 */
export const signedWeiInputSchema = z
  .string()
  .regex(/^-?\d+$/, "Must be a decimal integer string")
  .transform((value) => BigInt(value));

export const periodOutputSchema = z.object({
  month: z.number().int(),
  year: z.number().int(),
});

export const settlementReceiptOutputSchema = z.object({
  account: z.string(),
  period: periodOutputSchema,
  kind: z.enum(["FEE", "PAYOUT"]),
  amount: z.string(),
  txHash: z.string().nullable(),
});

export type SettlementReceiptOutput = z.infer<
  typeof settlementReceiptOutputSchema
>;
