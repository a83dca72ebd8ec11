// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/admin/services/adminCommands`
 * Purpose: Dispatch a validated admin command to the owning setter and report the resulting state.
 * Scope: Routes set-fee/set-payout/set-oracle to AdminConfig and set-month/set-year to PeriodState. Does not validate ranges.
 * Invariants: Exactly one setter runs per command; the result reflects state after that setter.
 * Side-effects: IO (via setters)
 * Links: contracts/admin.commands.v1.contract.ts
 * @public
 */

import type { Period, PaymentConfig } from "@/core";
import type { AdminConfig, PeriodState } from "@/features/payments/public";

export type AdminCommandInput =
  | { command: "set-fee"; amount: bigint }
  | { command: "set-payout"; amount: bigint }
  | { command: "set-month"; month: number }
  | { command: "set-year"; year: number }
  | { command: "set-oracle"; oracleReference: string };

export interface AdminCommandResult extends PaymentConfig {
  period: Period;
}

export async function executeAdminCommand(
  deps: { adminConfig: AdminConfig; periodState: PeriodState },
  caller: string,
  input: AdminCommandInput
): Promise<AdminCommandResult> {
  switch (input.command) {
    case "set-fee":
      await deps.adminConfig.setFee(caller, input.amount);
      break;
    case "set-payout":
      await deps.adminConfig.setPayout(caller, input.amount);
      break;
    case "set-oracle":
      await deps.adminConfig.setOracleReference(caller, input.oracleReference);
      break;
    case "set-month":
      await deps.periodState.setMonth(caller, input.month);
      break;
    case "set-year":
      await deps.periodState.setYear(caller, input.year);
      break;
  }

  return {
    period: deps.periodState.current(),
    ...deps.adminConfig.snapshot(),
  };
}
