// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/router`
 * Purpose: RPC route table registered on Fastify: validates with the zod contract, calls the service, shapes the response.
 * Scope: Request envelope logging, caller extraction and error mapping per route. Does not own sockets or body parsing.
 * Invariants: logRequestStart/End run exactly once per matched request; every response body is JSON; bigints leave as decimal strings.
 * Side-effects: IO (service calls, logging)
 * Notes: Caller identity is the x-caller-address header, authenticated upstream.
 * Links: contracts/*.v1.contract.ts, bootstrap/http/server.ts
 * @public
 */

import type { FastifyInstance } from "fastify";

import type { AccountAddress, SettlementReceipt } from "@/core";
import { adminCommandsOperation } from "@/contracts/admin.commands.v1.contract";
import { metaLivezOperation } from "@/contracts/meta.livez.read.v1.contract";
import { metaReadyzOperation } from "@/contracts/meta.readyz.read.v1.contract";
import { paymentsFeeCollectOperation } from "@/contracts/payments.fee.collect.v1.contract";
import { paymentsPayoutDisburseOperation } from "@/contracts/payments.payout.disburse.v1.contract";
import type { SettlementReceiptOutput } from "@/contracts/payments.schemas.v1";
import { paymentsStatusReadOperation } from "@/contracts/payments.status.read.v1.contract";
import { periodSummaryReadOperation } from "@/contracts/period.summary.read.v1.contract";
import { executeAdminCommand } from "@/features/admin/services/adminCommands";
import {
  createRequestContext,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  type RequestContext,
} from "@/shared/observability";
import { toAccountAddress } from "@/shared/util";

import type { Container } from "../container";
import { mapErrorToResponse, RpcRequestError } from "./errorMapping";

interface RpcResponse {
  status: number;
  body: unknown;
}

export interface HealthState {
  ready: boolean;
}

export type RouterDeps = Pick<
  Container,
  "log" | "clock" | "gateway" | "adminConfig" | "periodState"
> & { health: HealthState };

interface Route {
  method: "GET" | "POST";
  path: string;
  routeId: string;
  /** Health checks skip request envelope logging */
  quiet?: boolean;
  handle: (
    deps: RouterDeps,
    ctx: RequestContext,
    request: { query: unknown; body: unknown }
  ) => Promise<RpcResponse>;
}

function toReceiptOutput(receipt: SettlementReceipt): SettlementReceiptOutput {
  return {
    account: receipt.account,
    period: receipt.period,
    kind: receipt.kind,
    amount: receipt.amount.toString(),
    txHash: receipt.txHash,
  };
}

function accountQuery(query: unknown): string | undefined {
  if (
    typeof query === "object" &&
    query !== null &&
    "account" in query &&
    typeof query.account === "string"
  ) {
    return query.account;
  }
  return undefined;
}

function requireCaller(ctx: RequestContext): AccountAddress {
  const caller = ctx.caller ? toAccountAddress(ctx.caller) : null;
  if (!caller) {
    throw new RpcRequestError(
      400,
      "INVALID_CALLER",
      "x-caller-address header must carry the caller's address"
    );
  }
  return caller;
}

const ROUTES: readonly Route[] = [
  {
    method: "GET",
    path: "/livez",
    routeId: "meta.livez",
    quiet: true,
    handle: async (deps) => {
      const body = metaLivezOperation.output.parse({
        status: "alive",
        timestamp: deps.clock.now(),
      });
      return { status: 200, body };
    },
  },
  {
    method: "GET",
    path: "/readyz",
    routeId: "meta.readyz",
    quiet: true,
    handle: async (deps) => {
      const body = metaReadyzOperation.output.parse({
        status: deps.health.ready ? "healthy" : "not_ready",
        timestamp: deps.clock.now(),
      });
      return { status: deps.health.ready ? 200 : 503, body };
    },
  },
  {
    method: "POST",
    path: "/v1/payments/fee",
    routeId: "payments.fee",
    handle: async (deps, ctx, request) => {
      const caller = requireCaller(ctx);
      const input = paymentsFeeCollectOperation.input.parse(request.body);
      const receipt = await deps.gateway.collectFee(caller, input.value);
      return {
        status: 200,
        body: paymentsFeeCollectOperation.output.parse(toReceiptOutput(receipt)),
      };
    },
  },
  {
    method: "POST",
    path: "/v1/payments/payout",
    routeId: "payments.payout",
    handle: async (deps, ctx) => {
      const caller = requireCaller(ctx);
      const receipt = await deps.gateway.disburse(caller);
      return {
        status: 200,
        body: paymentsPayoutDisburseOperation.output.parse(
          toReceiptOutput(receipt)
        ),
      };
    },
  },
  {
    method: "GET",
    path: "/v1/payments/status",
    routeId: "payments.status",
    handle: async (deps, ctx, request) => {
      const input = paymentsStatusReadOperation.input.parse({
        account: accountQuery(request.query) ?? requireCaller(ctx),
      });
      const [feeSettled, payoutSettled] = await Promise.all([
        deps.gateway.hasSettled(input.account, "FEE"),
        deps.gateway.hasSettled(input.account, "PAYOUT"),
      ]);
      return {
        status: 200,
        body: paymentsStatusReadOperation.output.parse({
          account: input.account,
          period: deps.periodState.current(),
          feeSettled,
          payoutSettled,
        }),
      };
    },
  },
  {
    method: "GET",
    path: "/v1/period",
    routeId: "period.summary",
    handle: async (deps) => {
      const summary = await deps.gateway.periodSummary();
      return {
        status: 200,
        body: periodSummaryReadOperation.output.parse({
          ...summary,
          feeAmount: summary.feeAmount.toString(),
          payoutAmount: summary.payoutAmount.toString(),
        }),
      };
    },
  },
  {
    method: "POST",
    path: "/v1/admin/commands",
    routeId: "admin.commands",
    handle: async (deps, ctx, request) => {
      const caller = requireCaller(ctx);
      const input = adminCommandsOperation.input.parse(request.body);
      const result = await executeAdminCommand(deps, caller, input);
      return {
        status: 200,
        body: adminCommandsOperation.output.parse({
          ...result,
          feeAmount: result.feeAmount.toString(),
          payoutAmount: result.payoutAmount.toString(),
        }),
      };
    },
  },
];

export function isKnownPath(path: string): boolean {
  return ROUTES.some((r) => r.path === path);
}

/**
 * Register every route. Handlers never throw; failures become error responses.
 */
export function registerRoutes(app: FastifyInstance, deps: RouterDeps): void {
  for (const route of ROUTES) {
    app.route({
      method: route.method,
      url: route.path,
      handler: async (request, reply) => {
        const ctx = createRequestContext(
          { baseLog: deps.log, clock: deps.clock },
          request,
          { routeId: route.routeId }
        );

        if (!route.quiet) logRequestStart(ctx.log);
        const start = performance.now();
        let response: RpcResponse;

        try {
          response = await route.handle(deps, ctx, {
            query: request.query,
            body: request.body,
          });
        } catch (error) {
          const mapped = mapErrorToResponse(error);
          if (mapped.status >= 500) {
            logRequestError(ctx.log, error, mapped.body.error.code);
          }
          response = { status: mapped.status, body: mapped.body };
        }

        if (!route.quiet) {
          logRequestEnd(ctx.log, {
            status: response.status,
            durationMs: performance.now() - start,
          });
        }
        return reply.status(response.status).send(response.body);
      },
    });
  }
}
