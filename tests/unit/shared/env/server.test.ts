// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Unit tests for server env parsing, defaults and the production guard.
 * Scope: parseServerEnv over explicit records. Does NOT read process.env except via serverEnv().
 * Invariants: Missing vs invalid keys are reported separately; wei amounts parse to bigint.
 * Side-effects: none
 * Links: shared/env/server
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  EnvValidationError,
  type EnvValidationMeta,
  parseServerEnv,
  serverEnv,
} from "@/shared/env";

const BASE = {
  APP_ENV: "test",
  ADMIN_ADDRESSES:
    "0x00000000000000000000000000000000000000a1, 0x00000000000000000000000000000000000000a2",
  ORACLE_ADDRESS: "0x00000000000000000000000000000000000000c1",
  FEE_AMOUNT_WEI: "100",
  PAYOUT_AMOUNT_WEI: "500",
  PERIOD_MONTH: "3",
  PERIOD_YEAR: "2024",
};

function captureEnvError(
  source: Record<string, string | undefined>
): EnvValidationMeta {
  try {
    parseServerEnv(source);
  } catch (error) {
    if (error instanceof EnvValidationError) return error.meta;
    throw error;
  }
  throw new Error("expected EnvValidationError");
}

describe("shared/env/server", () => {
  it("parses a complete test env with defaults", () => {
    const env = parseServerEnv(BASE);

    expect(env.isTestMode).toBe(true);
    expect(env.NODE_ENV).toBe("development");
    expect(env.SERVICE_NAME).toBe("period-pay");
    expect(env.PORT).toBe(3000);
    expect(env.FEE_AMOUNT_WEI).toBe(100n);
    expect(env.PAYOUT_AMOUNT_WEI).toBe(500n);
    expect(env.PERIOD_MONTH).toBe(3);
    expect(env.PERIOD_YEAR).toBe(2024);
    expect(env.PERIOD_YEAR_FLOOR).toBe(2000);
    expect(env.ORACLE_TIMEOUT_MS).toBe(5000);
    expect(env.TRANSFER_TIMEOUT_MS).toBe(60000);
    expect(env.ADMIN_ADDRESSES).toEqual([
      "0x00000000000000000000000000000000000000a1",
      "0x00000000000000000000000000000000000000a2",
    ]);
  });

  it("reports absent required keys as missing", () => {
    const meta = captureEnvError({ ...BASE, ORACLE_ADDRESS: undefined });
    expect(meta.missing).toEqual(["ORACLE_ADDRESS"]);
    expect(meta.invalid).toEqual([]);
  });

  it("reports malformed values as invalid", () => {
    const meta = captureEnvError({ ...BASE, FEE_AMOUNT_WEI: "1.5" });
    expect(meta.invalid).toEqual(["FEE_AMOUNT_WEI"]);
    expect(meta.missing).toEqual([]);
  });

  it("reports a non-address oracle as invalid", () => {
    const meta = captureEnvError({ ...BASE, ORACLE_ADDRESS: "0x1234" });
    expect(meta.invalid).toEqual(["ORACLE_ADDRESS"]);
    expect(meta.missing).toEqual([]);
  });

  it("rejects a transfer bound under one second", () => {
    const meta = captureEnvError({ ...BASE, TRANSFER_TIMEOUT_MS: "500" });
    expect(meta.invalid).toEqual(["TRANSFER_TIMEOUT_MS"]);
  });

  it("requires chain settings in production", () => {
    const meta = captureEnvError({ ...BASE, APP_ENV: "production" });
    expect(meta.missing).toEqual(["EVM_RPC_URL", "TREASURY_PRIVATE_KEY"]);
  });

  it("accepts a production env with chain settings", () => {
    const env = parseServerEnv({
      ...BASE,
      APP_ENV: "production",
      EVM_RPC_URL: "http://localhost:8545",
      TREASURY_PRIVATE_KEY: `0x${"1".repeat(64)}`,
    });
    expect(env.isTestMode).toBe(false);
    expect(env.EVM_RPC_URL).toBe("http://localhost:8545");
  });

  it("serverEnv reads the process env prepared by test setup", () => {
    const env = serverEnv();
    expect(env.APP_ENV).toBe("test");
    expect(env.FEE_AMOUNT_WEI).toBe(100n);
  });
});
