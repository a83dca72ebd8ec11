// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Unit tests for dependency injection container environment-based adapter wiring.
 * Scope: Tests adapter selection based on APP_ENV; singleton lifecycle; strict env validation. Does NOT test adapter implementations.
 * Invariants: Module cache reset between tests; clean env state; container wiring matches expected adapter types.
 * Side-effects: process.env
 * Notes: Uses vi.resetModules() to force fresh imports; production wiring builds viem clients lazily so no RPC is contacted.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = process.env;

const BASE_ENV = {
  NODE_ENV: "test",
  ADMIN_ADDRESSES: "0x00000000000000000000000000000000000000a1",
  ORACLE_ADDRESS: "0x00000000000000000000000000000000000000c1",
  FEE_AMOUNT_WEI: "100",
  PAYOUT_AMOUNT_WEI: "500",
  PERIOD_MONTH: "3",
  PERIOD_YEAR: "2024",
};

describe("bootstrap container DI wiring", () => {
  beforeEach(() => {
    vi.resetModules(); // ensure fresh module evaluation
    process.env = { ...ORIGINAL_ENV }; // clean env copy
    delete process.env.EVM_RPC_URL;
    delete process.env.TREASURY_PRIVATE_KEY;
  });

  afterEach(async () => {
    const { resetContainer } = await import("@/bootstrap/container");
    resetContainer();
    const { resetServerEnv } = await import("@/shared/env");
    resetServerEnv();
    process.env = ORIGINAL_ENV; // restore
  });

  describe("getContainer adapter selection", () => {
    it("wires the fake oracle and transfer singletons when APP_ENV=test", async () => {
      Object.assign(process.env, { ...BASE_ENV, APP_ENV: "test" });

      const { getContainer } = await import("@/bootstrap/container");
      const { getTestFundsTransfer, getTestIdentityOracle } = await import(
        "@/adapters/test"
      );
      const container = getContainer();

      expect(container.oracle).toBe(getTestIdentityOracle());
      expect(container.transfer).toBe(getTestFundsTransfer());
    });

    it("wires viem adapters when APP_ENV=production", async () => {
      Object.assign(process.env, {
        ...BASE_ENV,
        APP_ENV: "production",
        EVM_RPC_URL: "http://127.0.0.1:8545",
        TREASURY_PRIVATE_KEY: `0x${"1".repeat(64)}`,
      });

      const { getContainer } = await import("@/bootstrap/container");
      const { ViemFundsTransferAdapter, ViemIdentityOracleAdapter } =
        await import("@/adapters/server");
      const container = getContainer();

      expect(container.oracle).toBeInstanceOf(ViemIdentityOracleAdapter);
      expect(container.transfer).toBeInstanceOf(ViemFundsTransferAdapter);
    });

    it("fails env validation in production without chain settings", async () => {
      Object.assign(process.env, { ...BASE_ENV, APP_ENV: "production" });

      const { getContainer } = await import("@/bootstrap/container");

      expect(() => getContainer()).toThrow(/EVM_RPC_URL/);
    });
  });

  describe("singleton lifecycle", () => {
    it("returns the same instance until reset", async () => {
      Object.assign(process.env, { ...BASE_ENV, APP_ENV: "test" });

      const { getContainer, resetContainer } = await import(
        "@/bootstrap/container"
      );
      const first = getContainer();

      expect(getContainer()).toBe(first);
      resetContainer();
      expect(getContainer()).not.toBe(first);
    });
  });

  describe("receiptTimeoutFor", () => {
    it("ends the receipt wait before the gateway's transfer bound", async () => {
      const { receiptTimeoutFor } = await import("@/bootstrap/container");

      expect(receiptTimeoutFor(60_000)).toBe(45_000);
      expect(receiptTimeoutFor(1_000)).toBe(750);
      expect(receiptTimeoutFor(1_001)).toBeLessThan(1_001);
    });
  });

  describe("createContainer", () => {
    it("seeds config and period from env and honours overrides", async () => {
      Object.assign(process.env, { ...BASE_ENV, APP_ENV: "test" });

      const { createContainer } = await import("@/bootstrap/container");
      const { parseServerEnv } = await import("@/shared/env");
      const { FakeIdentityOracleAdapter } = await import("@/adapters/test");
      const oracle = new FakeIdentityOracleAdapter();

      const container = createContainer(parseServerEnv(process.env), {
        oracle,
      });

      expect(container.oracle).toBe(oracle);
      expect(container.periodState.current()).toEqual({ month: 3, year: 2024 });
      expect(container.adminConfig.snapshot()).toMatchObject({
        feeAmount: 100n,
        payoutAmount: 500n,
      });
    });

    it("rejects an initial period outside the allowed range", async () => {
      Object.assign(process.env, {
        ...BASE_ENV,
        APP_ENV: "test",
        PERIOD_MONTH: "13",
      });

      const { createContainer } = await import("@/bootstrap/container");
      const { parseServerEnv } = await import("@/shared/env");
      const { InvalidMonthError } = await import("@/core");

      expect(() => createContainer(parseServerEnv(process.env))).toThrow(
        InvalidMonthError
      );
    });
  });
});
