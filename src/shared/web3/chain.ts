// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/chain`
 * Purpose: Canonical blockchain network configuration for the deployment.
 * Scope: Exports chain object and payout confirmation constants; does not perform network calls. EVM-only.
 * Invariants: Single active chain per deployment; all viem clients import CHAIN from here.
 * Side-effects: none
 * @public
 */

import { sepolia } from "viem/chains";

/** viem chain object for the active network. */
export const CHAIN = sepolia;

/**
 * Confirmations a payout transaction needs before it counts as SENT.
 */
export const PAYOUT_CONFIRMATIONS = 1;
