// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/payments/fakes`
 * Purpose: In-memory fakes for the access-control and event-sink ports.
 * Scope: Deterministic test doubles that record calls. Does NOT perform I/O.
 * Invariants: Admin set is explicit; every published event is kept in order.
 * Side-effects: none
 * Links: ports/access-control.port.ts, ports/payment-events.port.ts
 * @public
 */

import type {
  AccessControlPort,
  PaymentEvent,
  PaymentEventSink,
  PaymentEventType,
} from "@/ports";

export class FakeAccessControl implements AccessControlPort {
  private readonly admins = new Set<string>();
  public checks: string[] = [];

  constructor(admins: readonly string[] = []) {
    for (const admin of admins) this.grant(admin);
  }

  grant(address: string): void {
    this.admins.add(address.toLowerCase());
  }

  revoke(address: string): void {
    this.admins.delete(address.toLowerCase());
  }

  async hasAdminCapability(caller: string): Promise<boolean> {
    this.checks.push(caller);
    return this.admins.has(caller.toLowerCase());
  }
}

export class FakePaymentEventSink implements PaymentEventSink {
  public events: PaymentEvent[] = [];

  publish(event: PaymentEvent): void {
    this.events.push(event);
  }

  types(): PaymentEventType[] {
    return this.events.map((e) => e.type);
  }

  clear(): void {
    this.events = [];
  }
}
