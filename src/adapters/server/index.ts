// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { EnvAdminAccessControl } from "./access/env-admin-access-control.adapter";
export {
  type PaymentEventListener,
  PinoPaymentEventSink,
  serializePaymentEvent,
} from "./events/pino-payment-event-sink.adapter";
export {
  expiryFromSeconds,
  toParticipantKind,
  ViemIdentityOracleAdapter,
} from "./identity/viem-identity-oracle.adapter";
export { InMemoryPaymentLedger } from "./ledger/in-memory-payment-ledger.adapter";
export {
  ViemEvmOnchainClient,
  type ViemEvmOnchainClientConfig,
} from "./onchain/viem-evm-onchain-client.adapter";
export { ViemFundsTransferAdapter } from "./payments/viem-funds-transfer.adapter";
export { SystemClock } from "./time/system.adapter";
