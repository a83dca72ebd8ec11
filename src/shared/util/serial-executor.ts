// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/serial-executor`
 * Purpose: Single-lane async executor; tasks run one at a time in submission order.
 * Scope: Bottleneck limiter with one concurrent slot. Does not provide cross-process locking.
 * Invariants: At most one task in flight; a rejected task never blocks later tasks; each caller sees its own task's outcome.
 * Side-effects: none
 * Notes: Shared by PaymentGateway and the admin setters so config/period never change mid-pipeline.
 * Links: features/payments/services
 * @public
 */

import Bottleneck from "bottleneck";

export class SerialExecutor {
  private readonly limiter = new Bottleneck({ maxConcurrent: 1 });

  /**
   * Queue a task behind every previously submitted task.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(task);
  }
}
