// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the payments object graph. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process via getContainer(); one SerialExecutor shared by gateway and setters.
 * Side-effects: IO (initializes logger and emits startup log on creation)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire the fake oracle and transfer singletons.
 * Links: Used by bootstrap/http and src/main.ts
 * @public
 */

import type { Logger } from "pino";

import {
  EnvAdminAccessControl,
  InMemoryPaymentLedger,
  PinoPaymentEventSink,
  SystemClock,
  ViemEvmOnchainClient,
  ViemFundsTransferAdapter,
  ViemIdentityOracleAdapter,
} from "@/adapters/server";
import { getTestFundsTransfer, getTestIdentityOracle } from "@/adapters/test";
import {
  AdminConfig,
  EligibilityOracleClient,
  PaymentGateway,
  PeriodState,
} from "@/features/payments/public";
import type {
  AccessControlPort,
  Clock,
  FundsTransferPort,
  IdentityOraclePort,
  PaymentLedgerStore,
} from "@/ports";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";
import { SerialExecutor } from "@/shared/util";

export interface Container {
  log: Logger;
  clock: Clock;
  accessControl: AccessControlPort;
  oracle: IdentityOraclePort;
  transfer: FundsTransferPort;
  ledger: PaymentLedgerStore;
  events: PinoPaymentEventSink;
  adminConfig: AdminConfig;
  periodState: PeriodState;
  gateway: PaymentGateway;
}

/**
 * Replace individual collaborators (tests and embedding)
 */
export interface ContainerOverrides {
  log?: Logger;
  clock?: Clock;
  oracle?: IdentityOraclePort;
  transfer?: FundsTransferPort;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer(serverEnv());
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

/**
 * Receipt wait for on-chain payouts; ends a quarter before the gateway gives up
 * so an unconfirmed broadcast reaches the gateway as PENDING with its hash.
 */
export function receiptTimeoutFor(transferTimeoutMs: number): number {
  return Math.floor((transferTimeoutMs * 3) / 4);
}

function createChainAdapters(env: ServerEnv): {
  oracle: IdentityOraclePort;
  transfer: FundsTransferPort;
} {
  if (env.isTestMode) {
    return { oracle: getTestIdentityOracle(), transfer: getTestFundsTransfer() };
  }
  if (!env.EVM_RPC_URL) {
    throw new Error("[container] EVM_RPC_URL is required outside test mode");
  }
  const evmClient = new ViemEvmOnchainClient({
    rpcUrl: env.EVM_RPC_URL,
    treasuryPrivateKey: env.TREASURY_PRIVATE_KEY,
  });
  return {
    oracle: new ViemIdentityOracleAdapter(evmClient),
    transfer: new ViemFundsTransferAdapter(
      evmClient,
      receiptTimeoutFor(env.TRANSFER_TIMEOUT_MS)
    ),
  };
}

export function createContainer(
  env: ServerEnv,
  overrides: ContainerOverrides = {}
): Container {
  const log = overrides.log ?? makeLogger();

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      admins: env.ADMIN_ADDRESSES.length,
    },
    "container initialized"
  );

  const chain = createChainAdapters(env);
  const oracle = overrides.oracle ?? chain.oracle;
  const transfer = overrides.transfer ?? chain.transfer;
  const clock = overrides.clock ?? new SystemClock();

  const accessControl = new EnvAdminAccessControl(env.ADMIN_ADDRESSES);
  const ledger = new InMemoryPaymentLedger();
  const events = new PinoPaymentEventSink(log.child({ component: "events" }));
  const executor = new SerialExecutor();

  const adminConfig = new AdminConfig(
    {
      feeAmount: env.FEE_AMOUNT_WEI,
      payoutAmount: env.PAYOUT_AMOUNT_WEI,
      oracleReference: env.ORACLE_ADDRESS,
    },
    {
      accessControl,
      events,
      clock,
      executor,
      log: log.child({ component: "adminConfig" }),
    }
  );

  const periodState = new PeriodState(
    { month: env.PERIOD_MONTH, year: env.PERIOD_YEAR },
    {
      accessControl,
      events,
      clock,
      executor,
      log: log.child({ component: "periodState" }),
      yearFloor: env.PERIOD_YEAR_FLOOR,
    }
  );

  const eligibility = new EligibilityOracleClient({
    oracle,
    config: adminConfig,
    clock,
    timeoutMs: env.ORACLE_TIMEOUT_MS,
  });

  const gateway = new PaymentGateway({
    eligibility,
    periodState,
    adminConfig,
    ledger,
    transfer,
    events,
    clock,
    executor,
    log: log.child({ component: "gateway" }),
    transferTimeoutMs: env.TRANSFER_TIMEOUT_MS,
  });

  return {
    log,
    clock,
    accessControl,
    oracle,
    transfer,
    ledger,
    events,
    adminConfig,
    periodState,
    gateway,
  };
}
