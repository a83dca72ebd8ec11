// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/admin.commands.v1.contract`
 * Purpose: External API contract for administrative configuration commands.
 * Scope: Edge IO definition with schema validation. Does not check ranges; the domain does.
 * Invariants: Contract remains stable; breaking changes require new version.
 * Side-effects: none
 * Notes: Admin-only. Range and zero checks stay in the domain so authorization runs first.
 * Links: POST /v1/admin/commands
 * @internal
 */

import { z } from "zod";

import {
  periodOutputSchema,
  signedWeiInputSchema,
} from "./payments.schemas.v1";

export const adminCommandSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("set-fee"), amount: signedWeiInputSchema }),
  z.object({ command: z.literal("set-payout"), amount: signedWeiInputSchema }),
  z.object({ command: z.literal("set-month"), month: z.number() }),
  z.object({ command: z.literal("set-year"), year: z.number() }),
  z.object({ command: z.literal("set-oracle"), oracleReference: z.string() }),
]);

export const adminCommandsOperation = {
  id: "admin.commands.v1",
  summary: "Change payment configuration",
  description:
    "Set fee, payout, month, year or oracle reference (admin capability required)",
  input: adminCommandSchema,
  output: z.object({
    period: periodOutputSchema,
    feeAmount: z.string(),
    payoutAmount: z.string(),
    oracleReference: z.string(),
  }),
} as const;

export type AdminCommand = z.infer<typeof adminCommandsOperation.input>;
export type AdminCommandsOutput = z.infer<
  typeof adminCommandsOperation.output
>;
