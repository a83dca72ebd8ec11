// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/adminGate`
 * Purpose: Shared helpers for admin setters: capability check and event stamping.
 * Scope: Feature-internal; used by AdminConfig and PeriodState. Does not validate values.
 * Invariants: Capability is checked before any validation or mutation.
 * Side-effects: IO (access-control lookup)
 * @internal
 */

import { UnauthorizedError } from "@/core";
import type {
  AccessControlPort,
  Clock,
  PaymentEvent,
  PaymentEventSink,
} from "@/ports";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** Event as produced by a service, before the clock stamps it */
export type UnstampedPaymentEvent = DistributiveOmit<PaymentEvent, "occurredAt">;

export async function requireAdmin(
  accessControl: AccessControlPort,
  caller: string
): Promise<void> {
  if (!(await accessControl.hasAdminCapability(caller))) {
    throw new UnauthorizedError("ADMIN", caller);
  }
}

export function publishStamped(
  sink: PaymentEventSink,
  clock: Clock,
  event: UnstampedPaymentEvent
): void {
  sink.publish({ ...event, occurredAt: clock.now() });
}
