// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/router`
 * Purpose: Unit tests for RPC routing, contract validation and error mapping.
 * Scope: Injects requests into the Fastify server over a test-mode container. Does NOT open sockets.
 * Invariants: Domain errors map to fixed statuses; responses are JSON-safe; body and path errors never reach a service.
 * Side-effects: none
 * Links: src/bootstrap/http/router.ts, src/bootstrap/http/server.ts, src/bootstrap/http/errorMapping.ts
 * @public
 */

import {
  ADMIN,
  buildClassification,
  FakeClock,
  NOW,
  ORACLE,
  PAYEE_B,
  PAYER_A,
} from "@tests/_fakes";
import type { FastifyInstance } from "fastify";
import { getAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { getTestFundsTransfer, getTestIdentityOracle } from "@/adapters/test";
import { type Container, createContainer } from "@/bootstrap/container";
import { buildRpcServer, type RouterDeps } from "@/bootstrap/http";
import { serverEnv } from "@/shared/env";
import { makeNoopLogger } from "@/shared/observability";

const FIRST_HASH = `0x${"1".padStart(64, "0")}`;

interface CallOptions {
  caller?: string;
  body?: Record<string, unknown>;
}

describe("bootstrap/http/router", () => {
  let container: Container;
  let deps: RouterDeps;
  let app: FastifyInstance;

  async function call(
    method: "GET" | "POST",
    url: string,
    options: CallOptions = {}
  ): Promise<{ status: number; body: unknown }> {
    const response = await app.inject({
      method,
      url,
      headers:
        options.caller === undefined
          ? {}
          : { "x-caller-address": options.caller },
      ...(options.body === undefined ? {} : { payload: options.body }),
    });
    return { status: response.statusCode, body: response.json<unknown>() };
  }

  beforeEach(() => {
    container = createContainer(serverEnv(), {
      log: makeNoopLogger(),
      clock: new FakeClock(NOW),
    });
    deps = { ...container, health: { ready: true } };
    app = buildRpcServer(deps);

    const oracle = getTestIdentityOracle();
    oracle.setClassification(PAYER_A, buildClassification({ kind: "PAYER" }));
    oracle.setClassification(PAYEE_B, buildClassification({ kind: "PAYEE" }));
  });

  afterEach(async () => {
    await app.close();
  });


  describe("health checks", () => {
    it("reports liveness", async () => {
      await expect(call("GET", "/livez")).resolves.toEqual({
        status: 200,
        body: { status: "alive", timestamp: NOW },
      });
    });

    it("reports readiness from health state", async () => {
      deps.health.ready = false;
      await expect(call("GET", "/readyz")).resolves.toEqual({
        status: 503,
        body: { status: "not_ready", timestamp: NOW },
      });

      deps.health.ready = true;
      const ready = await call("GET", "/readyz");
      expect(ready.status).toBe(200);
    });
  });

  describe("POST /v1/payments/fee", () => {
    it("returns the receipt with decimal amounts", async () => {
      const response = await call("POST", "/v1/payments/fee", {
        caller: PAYER_A.toLowerCase(),
        body: { value: "100" },
      });

      expect(response).toEqual({
        status: 200,
        body: {
          account: getAddress(PAYER_A),
          period: { month: 3, year: 2024 },
          kind: "FEE",
          amount: "100",
          txHash: null,
        },
      });
    });

    it("maps a repeat payment to 409", async () => {
      const pay = { caller: PAYER_A, body: { value: "100" } };
      await call("POST", "/v1/payments/fee", pay);

      const response = await call("POST", "/v1/payments/fee", pay);
      expect(response.status).toBe(409);
      expect(response.body).toMatchObject({
        error: { code: "ALREADY_SETTLED" },
      });
    });

    it("maps a wrong amount to 400", async () => {
      const response = await call("POST", "/v1/payments/fee", {
        caller: PAYER_A,
        body: { value: "99" },
      });
      expect(response).toEqual({
        status: 400,
        body: {
          error: {
            code: "INCORRECT_AMOUNT",
            message: "Expected exactly 100, received 99",
          },
        },
      });
    });

    it("rejects a malformed value before reaching the gateway", async () => {
      const response = await call("POST", "/v1/payments/fee", {
        caller: PAYER_A,
        body: { value: "1e3" },
      });
      expect(response).toEqual({
        status: 400,
        body: {
          error: {
            code: "VALIDATION_ERROR",
            message: "value: Must be a non-negative decimal integer string",
          },
        },
      });
      expect(getTestIdentityOracle().calls).toEqual([]);
    });

    it("requires a caller address", async () => {
      for (const caller of [undefined, "not-an-address"]) {
        const response = await call("POST", "/v1/payments/fee", {
          ...(caller === undefined ? {} : { caller }),
          body: { value: "100" },
        });
        expect(response.status).toBe(400);
        expect(response.body).toMatchObject({
          error: { code: "INVALID_CALLER" },
        });
      }
    });

    it("maps an oracle failure to 502", async () => {
      getTestIdentityOracle().setFailure(new Error("rpc down"));
      const response = await call("POST", "/v1/payments/fee", {
        caller: PAYER_A,
        body: { value: "100" },
      });
      expect(response.status).toBe(502);
      expect(response.body).toMatchObject({
        error: { code: "ORACLE_UNAVAILABLE" },
      });
    });
  });

  describe("POST /v1/payments/payout", () => {
    it("disburses to a payee", async () => {
      const response = await call("POST", "/v1/payments/payout", {
        caller: PAYEE_B,
      });
      expect(response).toEqual({
        status: 200,
        body: {
          account: getAddress(PAYEE_B),
          period: { month: 3, year: 2024 },
          kind: "PAYOUT",
          amount: "500",
          txHash: FIRST_HASH,
        },
      });
      expect(getTestFundsTransfer().sent).toHaveLength(1);
    });

    it("maps a payer asking for a payout to 403", async () => {
      const response = await call("POST", "/v1/payments/payout", {
        caller: PAYER_A,
      });
      expect(response.status).toBe(403);
      expect(response.body).toMatchObject({
        error: { code: "WRONG_PARTICIPANT_CLASS" },
      });
    });

    it("maps a failed transfer to 502", async () => {
      getTestFundsTransfer().setOutcome({
        kind: "FAILED",
        reason: "INSUFFICIENT_FUNDS",
      });
      const response = await call("POST", "/v1/payments/payout", {
        caller: PAYEE_B,
      });
      expect(response.status).toBe(502);
      expect(response.body).toMatchObject({
        error: { code: "TRANSFER_FAILED" },
      });
    });

    it("maps an unconfirmed payout to 409 on every retry", async () => {
      const transfer = getTestFundsTransfer();
      transfer.setOutcome({ kind: "PENDING" });

      for (let attempt = 0; attempt < 2; attempt += 1) {
        const response = await call("POST", "/v1/payments/payout", {
          caller: PAYEE_B,
        });
        expect(response.status).toBe(409);
        expect(response.body).toMatchObject({
          error: { code: "PAYOUT_PENDING" },
        });
      }
      expect(transfer.calls).toHaveLength(1);
    });
  });

  describe("reads", () => {
    it("reports settlement status for a queried account", async () => {
      await call("POST", "/v1/payments/fee", {
        caller: PAYER_A,
        body: { value: "100" },
      });

      const response = await call(
        "GET",
        `/v1/payments/status?account=${PAYER_A.toLowerCase()}`
      );
      expect(response).toEqual({
        status: 200,
        body: {
          account: getAddress(PAYER_A),
          period: { month: 3, year: 2024 },
          feeSettled: true,
          payoutSettled: false,
        },
      });
    });

    it("falls back to the caller for status", async () => {
      const response = await call("GET", "/v1/payments/status", {
        caller: PAYEE_B,
      });
      expect(response.body).toMatchObject({ account: getAddress(PAYEE_B) });
    });

    it("summarises the live period", async () => {
      await call("POST", "/v1/payments/payout", { caller: PAYEE_B });

      await expect(call("GET", "/v1/period")).resolves.toEqual({
        status: 200,
        body: {
          period: { month: 3, year: 2024 },
          feeAmount: "100",
          payoutAmount: "500",
          oracleReference: getAddress(ORACLE),
          feesCollected: 0,
          payoutsDisbursed: 1,
        },
      });
    });
  });

  describe("POST /v1/admin/commands", () => {
    it("applies a command for an admin", async () => {
      const response = await call("POST", "/v1/admin/commands", {
        caller: ADMIN,
        body: { command: "set-fee", amount: "250" },
      });
      expect(response).toEqual({
        status: 200,
        body: {
          period: { month: 3, year: 2024 },
          feeAmount: "250",
          payoutAmount: "500",
          oracleReference: getAddress(ORACLE),
        },
      });
    });

    it("refuses a non-admin before validating the value", async () => {
      const response = await call("POST", "/v1/admin/commands", {
        caller: PAYER_A,
        body: { command: "set-fee", amount: "-1" },
      });
      expect(response.status).toBe(403);
      expect(response.body).toMatchObject({ error: { code: "UNAUTHORIZED" } });
    });

    it("maps domain validation to 400", async () => {
      const cases: Array<[Record<string, unknown>, string]> = [
        [{ command: "set-payout", amount: "0" }, "ZERO_AMOUNT"],
        [{ command: "set-month", month: 13 }, "INVALID_MONTH"],
        [{ command: "set-year", year: 1999 }, "INVALID_YEAR"],
        [{ command: "set-oracle", oracleReference: "" }, "INVALID_REFERENCE"],
        [{ command: "set-color", value: "red" }, "VALIDATION_ERROR"],
      ];
      for (const [body, code] of cases) {
        const response = await call("POST", "/v1/admin/commands", {
          caller: ADMIN,
          body,
        });
        expect(response.status).toBe(400);
        expect(response.body).toMatchObject({ error: { code } });
      }
    });
  });

  describe("dispatch", () => {
    it("returns 404 for an unknown path", async () => {
      await expect(call("GET", "/v2/nope")).resolves.toEqual({
        status: 404,
        body: { error: { code: "NOT_FOUND", message: "No route for /v2/nope" } },
      });
    });

    it("returns 404 for a path made only of slashes", async () => {
      await expect(call("GET", "//")).resolves.toEqual({
        status: 404,
        body: { error: { code: "NOT_FOUND", message: "No route for //" } },
      });
    });

    it("returns 405 for a known path with the wrong method", async () => {
      await expect(call("GET", "/v1/payments/fee")).resolves.toEqual({
        status: 405,
        body: {
          error: { code: "METHOD_NOT_ALLOWED", message: "GET not allowed" },
        },
      });
    });

    it("hides unexpected errors behind a 500", async () => {
      vi.spyOn(container.gateway, "periodSummary").mockRejectedValue(
        new Error("ledger offline")
      );

      await expect(call("GET", "/v1/period")).resolves.toEqual({
        status: 500,
        body: {
          error: { code: "INTERNAL_ERROR", message: "Internal server error" },
        },
      });
    });
  });

  describe("request bodies", () => {
    it("answers 400 INVALID_JSON for a body that does not parse", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/v1/payments/fee",
        headers: {
          "content-type": "application/json",
          "x-caller-address": PAYER_A,
        },
        payload: "{bad",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<unknown>()).toEqual({
        error: {
          code: "INVALID_JSON",
          message: "Request body is not valid JSON",
        },
      });
      expect(getTestIdentityOracle().calls).toEqual([]);
    });

    it("answers 413 for a body over 64 KiB", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/v1/payments/fee",
        headers: {
          "content-type": "application/json",
          "x-caller-address": PAYER_A,
        },
        payload: JSON.stringify({ value: "1".repeat(70_000) }),
      });

      expect(response.statusCode).toBe(413);
      expect(response.json<unknown>()).toEqual({
        error: {
          code: "PAYLOAD_TOO_LARGE",
          message: "Request body is too large",
        },
      });
    });

    it("answers 415 for a body type it cannot parse", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/v1/payments/fee",
        headers: {
          "content-type": "application/xml",
          "x-caller-address": PAYER_A,
        },
        payload: "<value>100</value>",
      });

      expect(response.statusCode).toBe(415);
      expect(response.json<unknown>()).toMatchObject({
        error: { code: "UNSUPPORTED_MEDIA_TYPE" },
      });
    });
  });
});
