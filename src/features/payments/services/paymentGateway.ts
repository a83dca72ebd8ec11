// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/paymentGateway`
 * Purpose: Gated fee collection and payout disbursement, at most once per account, period and kind.
 * Scope: Orchestrates oracle, ledger, config, period and transfer ports. Does not expose HTTP handling.
 * Invariants: Checks run in fixed order and stop at the first failure; the ledger is marked only after the funds step; config and period are snapshotted once per pipeline; a payout slot with an unconfirmed transfer never starts a second one.
 * Side-effects: IO (oracle read, outbound transfer, ledger write, events, logging)
 * Notes: Pipelines share the SerialExecutor with the admin setters, so check-transfer-mark is atomic per process. A transfer that outlives transferTimeoutMs is followed to completion and settles the slot when it lands.
 * Links: core/payments/rules, eligibilityOracleClient, adminConfig, periodState
 * @public
 */

import {
  type AccountAddress,
  type ActionKind,
  AlreadySettledError,
  callerClassMatchesRequired,
  formatPeriod,
  IncorrectAmountError,
  isExactFee,
  isPaymentDomainError,
  PayoutPendingError,
  type Period,
  requiredKindFor,
  type SettlementReceipt,
  type SettlementSlot,
  SuspendedParticipantError,
  TransferFailedError,
  WrongParticipantClassError,
} from "@/core";
import type {
  Clock,
  FundsTransferPort,
  PaymentEventSink,
  PaymentLedgerStore,
  TransferResult,
  TransferStatus,
} from "@/ports";
import type {
  Logger,
  PaymentsRejectedLog,
  PaymentsSettledLog,
} from "@/shared/observability";
import { isTimeoutError, type SerialExecutor, withTimeout } from "@/shared/util";

import type { AdminConfig } from "./adminConfig";
import { publishStamped } from "./adminGate";
import type { EligibilityOracleClient } from "./eligibilityOracleClient";
import type { PeriodState } from "./periodState";

// ============================================================================
// Public Types
// ============================================================================

export interface PaymentGatewayDeps {
  eligibility: EligibilityOracleClient;
  periodState: PeriodState;
  adminConfig: AdminConfig;
  ledger: PaymentLedgerStore;
  transfer: FundsTransferPort;
  events: PaymentEventSink;
  clock: Clock;
  executor: SerialExecutor;
  log: Logger;
  transferTimeoutMs: number;
}

export interface PeriodSummary {
  period: Period;
  feeAmount: bigint;
  payoutAmount: bigint;
  oracleReference: AccountAddress;
  feesCollected: number;
  payoutsDisbursed: number;
}

interface LandedPayout {
  txHash: string;
  amount: bigint;
}

function failureReason(error: unknown): string {
  if (isTimeoutError(error)) return "TIMEOUT";
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Gateway
// ============================================================================

export class PaymentGateway {
  constructor(private readonly deps: PaymentGatewayDeps) {}

  /**
   * Payer pays the configured fee for the live period.
   * @param value - Amount supplied with the call; must equal feeAmount exactly
   */
  collectFee(caller: AccountAddress, value: bigint): Promise<SettlementReceipt> {
    return this.deps.executor.run(() => this.runPipeline(caller, "FEE", value));
  }

  /**
   * Payee receives the configured payout for the live period.
   */
  disburse(caller: AccountAddress): Promise<SettlementReceipt> {
    return this.deps.executor.run(() =>
      this.runPipeline(caller, "PAYOUT", null)
    );
  }

  async hasSettled(account: AccountAddress, kind: ActionKind): Promise<boolean> {
    return this.deps.ledger.isSettled({
      account,
      period: this.deps.periodState.current(),
      kind,
    });
  }

  async periodSummary(): Promise<PeriodSummary> {
    const period = this.deps.periodState.current();
    const config = this.deps.adminConfig.snapshot();
    const [feesCollected, payoutsDisbursed] = await Promise.all([
      this.deps.ledger.countSettled(period, "FEE"),
      this.deps.ledger.countSettled(period, "PAYOUT"),
    ]);
    return { period, ...config, feesCollected, payoutsDisbursed };
  }

  private async runPipeline(
    caller: AccountAddress,
    kind: ActionKind,
    value: bigint | null
  ): Promise<SettlementReceipt> {
    const startedAt = Date.now();

    try {
      const receipt = await this.settle(caller, kind, value);
      const settledEvent: PaymentsSettledLog = {
        event: "payments.settled",
        account: caller,
        kind,
        period: formatPeriod(receipt.period),
        amount: receipt.amount.toString(),
        txHash: receipt.txHash ?? undefined,
        durationMs: Date.now() - startedAt,
      };
      this.deps.log.info(settledEvent, "settlement committed");
      return receipt;
    } catch (error) {
      if (isPaymentDomainError(error)) {
        const rejectedEvent: PaymentsRejectedLog = {
          event: "payments.rejected",
          account: caller,
          kind,
          errorCode: error.code,
          durationMs: Date.now() - startedAt,
        };
        this.deps.log.warn(rejectedEvent, error.message);
      } else {
        this.deps.log.error(
          { err: error, account: caller, kind },
          "settlement pipeline failed"
        );
      }
      throw error;
    }
  }

  private async settle(
    caller: AccountAddress,
    kind: ActionKind,
    value: bigint | null
  ): Promise<SettlementReceipt> {
    const period = this.deps.periodState.current();
    const config = this.deps.adminConfig.snapshot();

    const classification = await this.deps.eligibility.classify(caller);
    this.deps.eligibility.assertNotExpired(caller, classification);

    const required = requiredKindFor(kind);
    if (!callerClassMatchesRequired(classification.kind, required)) {
      throw new WrongParticipantClassError(caller, required, classification.kind);
    }

    if (classification.suspended) {
      throw new SuspendedParticipantError(caller);
    }

    const slot: SettlementSlot = { account: caller, period, kind };
    if (await this.deps.ledger.isSettled(slot)) {
      throw new AlreadySettledError(caller, period, kind);
    }

    if (kind === "FEE") {
      const received = value ?? 0n;
      if (!isExactFee(received, config.feeAmount)) {
        throw new IncorrectAmountError(config.feeAmount, received);
      }
      return this.commitFee(slot, config.feeAmount);
    }

    const landed = await this.reconcilePending(slot);
    if (landed !== null) {
      return this.commitPayout(slot, landed);
    }

    const amount = config.payoutAmount;
    const txHash = await this.sendPayout(slot, amount);
    return this.commitPayout(slot, { txHash, amount });
  }

  private async commitFee(
    slot: SettlementSlot,
    amount: bigint
  ): Promise<SettlementReceipt> {
    await this.deps.ledger.markSettled(slot);
    publishStamped(this.deps.events, this.deps.clock, {
      type: "FeeCollected",
      account: slot.account,
      period: slot.period,
      amount,
    });
    return { ...slot, amount, txHash: null };
  }

  private async commitPayout(
    slot: SettlementSlot,
    payout: LandedPayout
  ): Promise<SettlementReceipt> {
    await this.deps.ledger.markSettled(slot);
    publishStamped(this.deps.events, this.deps.clock, {
      type: "PayoutDisbursed",
      account: slot.account,
      period: slot.period,
      amount: payout.amount,
      txHash: payout.txHash,
    });
    return { ...slot, amount: payout.amount, txHash: payout.txHash };
  }

  /**
   * Resolves a payout left unconfirmed by an earlier call.
   * @returns the landed transfer, or null when the slot is free for a fresh send
   * @throws PayoutPendingError while the earlier transfer has no outcome
   */
  private async reconcilePending(
    slot: SettlementSlot
  ): Promise<LandedPayout | null> {
    const pending = await this.deps.ledger.pendingPayout(slot);
    if (pending === null) return null;
    if (pending.txHash === null) {
      throw new PayoutPendingError(slot.account, slot.period, null);
    }

    let status: TransferStatus;
    try {
      status = await withTimeout(
        this.deps.transfer.status(pending.txHash),
        this.deps.transferTimeoutMs,
        "transfer status"
      );
    } catch (error) {
      throw new TransferFailedError(
        slot.account,
        pending.amount,
        failureReason(error),
        { cause: error }
      );
    }

    this.deps.log.info(
      { account: slot.account, txHash: pending.txHash, status },
      "pending payout checked"
    );
    switch (status) {
      case "SENT":
        return { txHash: pending.txHash, amount: pending.amount };
      case "FAILED":
        await this.deps.ledger.clearPending(slot);
        return null;
      case "PENDING":
        throw new PayoutPendingError(slot.account, slot.period, pending.txHash);
    }
  }

  /**
   * @returns transaction hash of the completed transfer
   */
  private async sendPayout(
    slot: SettlementSlot,
    amount: bigint
  ): Promise<string> {
    const sending = this.deps.transfer.send({ to: slot.account, amount });

    let result: TransferResult;
    try {
      result = await withTimeout(
        sending,
        this.deps.transferTimeoutMs,
        "funds transfer"
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        await this.deps.ledger.markPending(slot, { txHash: null, amount });
        this.followLateTransfer(slot, amount, sending);
      }
      throw new TransferFailedError(
        slot.account,
        amount,
        failureReason(error),
        { cause: error }
      );
    }

    switch (result.status) {
      case "SENT":
        return result.txHash;
      case "PENDING":
        await this.deps.ledger.markPending(slot, {
          txHash: result.txHash,
          amount,
        });
        throw new PayoutPendingError(slot.account, slot.period, result.txHash);
      case "FAILED":
        throw new TransferFailedError(slot.account, amount, result.reason);
    }
  }

  /**
   * Settles or releases the slot once a timed-out send finally returns.
   */
  private followLateTransfer(
    slot: SettlementSlot,
    amount: bigint,
    sending: Promise<TransferResult>
  ): void {
    void sending
      .then(
        (result) =>
          this.deps.executor.run(() => this.settleLate(slot, amount, result)),
        (error: unknown) =>
          this.deps.executor.run(async () => {
            this.deps.log.warn(
              { err: error, account: slot.account },
              "timed-out payout failed"
            );
            await this.deps.ledger.clearPending(slot);
          })
      )
      .catch((error: unknown) => {
        this.deps.log.error(
          { err: error, account: slot.account },
          "late payout reconciliation failed"
        );
      });
  }

  private async settleLate(
    slot: SettlementSlot,
    amount: bigint,
    result: TransferResult
  ): Promise<void> {
    switch (result.status) {
      case "SENT":
        await this.commitPayout(slot, { txHash: result.txHash, amount });
        this.deps.log.info(
          { account: slot.account, txHash: result.txHash },
          "late payout settled"
        );
        return;
      case "PENDING":
        await this.deps.ledger.markPending(slot, {
          txHash: result.txHash,
          amount,
        });
        return;
      case "FAILED":
        await this.deps.ledger.clearPending(slot);
        return;
    }
  }
}
