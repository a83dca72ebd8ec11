// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup for deterministic, isolated unit tests.
 * Scope: Sets env vars and resets shared singletons between tests. Does NOT mock specific services or ports.
 * Invariants: Tests run in isolation; cached env, container and test adapter singletons reset between tests.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { afterEach, beforeAll } from "vitest";

import {
  resetTestFundsTransfer,
  resetTestIdentityOracle,
} from "@/adapters/test";
import { resetContainer } from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

/**
 * Unit tests: no I/O, no real time, no network (use _fakes)
 */
beforeAll(() => {
  Object.assign(process.env, {
    NODE_ENV: "test",
    APP_ENV: "test",
    ADMIN_ADDRESSES: "0x00000000000000000000000000000000000000a1",
    ORACLE_ADDRESS: "0x00000000000000000000000000000000000000c1",
    FEE_AMOUNT_WEI: "100",
    PAYOUT_AMOUNT_WEI: "500",
    PERIOD_MONTH: "3",
    PERIOD_YEAR: "2024",
  });
});

afterEach(() => {
  resetServerEnv();
  resetContainer();
  resetTestIdentityOracle();
  resetTestFundsTransfer();
});
