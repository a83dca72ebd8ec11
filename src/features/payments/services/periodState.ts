// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/periodState`
 * Purpose: Owns the live accounting period (month, year) and its admin setters.
 * Scope: Validated mutation plus change notifications. Does not touch the ledger; a new period simply yields fresh slots.
 * Invariants: month in 1..12; year > yearFloor (fixed at construction); setters serialised on the shared executor.
 * Side-effects: IO (access control, event sink, logging)
 * Notes: setMonth emits CurrentMonthChanged followed by PaymentReminder.
 * Links: core/payments/rules, adminGate
 * @public
 */

import {
  DEFAULT_YEAR_FLOOR,
  formatPeriod,
  InvalidMonthError,
  InvalidYearError,
  isPaymentDomainError,
  isValidMonth,
  isValidYear,
  type Period,
} from "@/core";
import type { AccessControlPort, Clock, PaymentEventSink } from "@/ports";
import type {
  Logger,
  PaymentsPeriodChangedLog,
} from "@/shared/observability";
import type { SerialExecutor } from "@/shared/util";

import { publishStamped, requireAdmin } from "./adminGate";

export interface PeriodStateDeps {
  accessControl: AccessControlPort;
  events: PaymentEventSink;
  clock: Clock;
  executor: SerialExecutor;
  log: Logger;
  /** Year must be strictly greater; defaults to DEFAULT_YEAR_FLOOR */
  yearFloor?: number;
}

export class PeriodState {
  private period: Period;
  private readonly yearFloor: number;

  constructor(
    initial: Period,
    private readonly deps: PeriodStateDeps
  ) {
    this.yearFloor = deps.yearFloor ?? DEFAULT_YEAR_FLOOR;
    if (!isValidMonth(initial.month)) {
      throw new InvalidMonthError(initial.month);
    }
    if (!isValidYear(initial.year, this.yearFloor)) {
      throw new InvalidYearError(initial.year, this.yearFloor);
    }
    this.period = { month: initial.month, year: initial.year };
  }

  current(): Period {
    return { ...this.period };
  }

  setMonth(caller: string, month: number): Promise<Period> {
    return this.deps.executor.run(async () => {
      try {
        await requireAdmin(this.deps.accessControl, caller);
        if (!isValidMonth(month)) {
          throw new InvalidMonthError(month);
        }

        this.period = { ...this.period, month };
        this.logChange(caller);
        const { year } = this.period;
        publishStamped(this.deps.events, this.deps.clock, {
          type: "CurrentMonthChanged",
          month,
          year,
        });
        publishStamped(this.deps.events, this.deps.clock, {
          type: "PaymentReminder",
          month,
          year,
        });
        return this.current();
      } catch (error) {
        this.logRejected("setMonth", caller, error);
        throw error;
      }
    });
  }

  setYear(caller: string, year: number): Promise<Period> {
    return this.deps.executor.run(async () => {
      try {
        await requireAdmin(this.deps.accessControl, caller);
        if (!isValidYear(year, this.yearFloor)) {
          throw new InvalidYearError(year, this.yearFloor);
        }

        this.period = { ...this.period, year };
        this.logChange(caller);
        publishStamped(this.deps.events, this.deps.clock, {
          type: "CurrentYearChanged",
          month: this.period.month,
          year,
        });
        return this.current();
      } catch (error) {
        this.logRejected("setYear", caller, error);
        throw error;
      }
    });
  }

  private logChange(caller: string): void {
    const changedEvent: PaymentsPeriodChangedLog = {
      event: "payments.period_changed",
      caller,
      period: formatPeriod(this.period),
    };
    this.deps.log.info(changedEvent, "period changed");
  }

  private logRejected(op: string, caller: string, error: unknown): void {
    const errorCode = isPaymentDomainError(error) ? error.code : "UNKNOWN";
    this.deps.log.warn({ op, caller, errorCode }, "period change rejected");
  }
}
