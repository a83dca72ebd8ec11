// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/pino-payment-event-sink`
 * Purpose: Publishes payment notifications as structured log lines and to in-process subscribers.
 * Scope: Implements PaymentEventSink. Does not deliver events over the network.
 * Invariants: publish never throws; a failing subscriber is logged and skipped; bigint amounts serialised as decimal strings.
 * Side-effects: IO (logging)
 * @public
 */

import { formatPeriod } from "@/core";
import type { PaymentEvent, PaymentEventSink } from "@/ports";
import type { Logger } from "@/shared/observability";

export type PaymentEventListener = (event: PaymentEvent) => void;

/**
 * Flatten an event into log-safe fields
 */
export function serializePaymentEvent(
  event: PaymentEvent
): Record<string, string | number> {
  switch (event.type) {
    case "FeeAmountChanged":
    case "PayoutAmountChanged":
      return {
        type: event.type,
        occurredAt: event.occurredAt,
        amount: event.amount.toString(),
      };
    case "CurrentMonthChanged":
    case "CurrentYearChanged":
    case "PaymentReminder":
      return {
        type: event.type,
        occurredAt: event.occurredAt,
        month: event.month,
        year: event.year,
      };
    case "OracleReferenceChanged":
      return {
        type: event.type,
        occurredAt: event.occurredAt,
        oracleReference: event.oracleReference,
      };
    case "FeeCollected":
      return {
        type: event.type,
        occurredAt: event.occurredAt,
        account: event.account,
        period: formatPeriod(event.period),
        amount: event.amount.toString(),
      };
    case "PayoutDisbursed":
      return {
        type: event.type,
        occurredAt: event.occurredAt,
        account: event.account,
        period: formatPeriod(event.period),
        amount: event.amount.toString(),
        txHash: event.txHash,
      };
  }
}

export class PinoPaymentEventSink implements PaymentEventSink {
  private readonly listeners = new Set<PaymentEventListener>();

  constructor(private readonly log: Logger) {}

  /**
   * @returns unsubscribe function
   */
  subscribe(listener: PaymentEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: PaymentEvent): void {
    this.log.info(
      { event: "payments.event", payload: serializePaymentEvent(event) },
      event.type
    );

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error(
          { err, type: event.type },
          "payment event listener failed"
        );
      }
    }
  }
}
