// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/errorMapping`
 * Purpose: Translate thrown errors into RPC status codes and the `{ error: { code, message } }` body.
 * Scope: Pure mapping. Does not log.
 * Invariants: Every PaymentErrorCode has a status; zod failures are 400; Fastify body errors keep their 4xx status; anything unrecognised is 500 with a generic message.
 * Side-effects: none
 * Links: core/payments/errors.ts
 * @public
 */

import { ZodError } from "zod";

import { isPaymentDomainError, type PaymentErrorCode } from "@/core";

export interface RpcErrorBody {
  error: { code: string; message: string };
}

export interface MappedError {
  status: number;
  body: RpcErrorBody;
}

const STATUS_BY_CODE: Readonly<Record<PaymentErrorCode, number>> = {
  UNAUTHORIZED: 403,
  WRONG_PARTICIPANT_CLASS: 403,
  SUSPENDED_PARTICIPANT: 403,
  ATTRIBUTE_EXPIRED: 403,
  ZERO_AMOUNT: 400,
  INVALID_REFERENCE: 400,
  INVALID_MONTH: 400,
  INVALID_YEAR: 400,
  INCORRECT_AMOUNT: 400,
  ALREADY_SETTLED: 409,
  PAYOUT_PENDING: 409,
  ORACLE_UNAVAILABLE: 502,
  TRANSFER_FAILED: 502,
};

/**
 * Errors raised by the router itself before reaching a service
 */
export class RpcRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "RpcRequestError";
  }
}

export function errorBody(code: string, message: string): RpcErrorBody {
  return { error: { code, message } };
}

/**
 * 4xx status Fastify attaches to body parsing and size errors
 */
function clientStatusOf(error: unknown): number | null {
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return null;
}

const JSON_BODY_ERROR_CODES: ReadonlySet<unknown> = new Set([
  "FST_ERR_CTP_EMPTY_JSON_BODY",
  "FST_ERR_CTP_INVALID_JSON_BODY",
]);

function isJsonBodyError(error: Error): boolean {
  if (error instanceof SyntaxError) return true;
  return "code" in error && JSON_BODY_ERROR_CODES.has(error.code);
}

export function mapErrorToResponse(error: unknown): MappedError {
  if (isPaymentDomainError(error)) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: errorBody(error.code, error.message),
    };
  }
  if (error instanceof RpcRequestError) {
    return { status: error.status, body: errorBody(error.code, error.message) };
  }
  if (error instanceof ZodError) {
    const message = error.errors
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
      .join("; ");
    return { status: 400, body: errorBody("VALIDATION_ERROR", message) };
  }
  const clientStatus = clientStatusOf(error);
  if (clientStatus !== null && error instanceof Error) {
    if (clientStatus === 413) {
      return {
        status: 413,
        body: errorBody("PAYLOAD_TOO_LARGE", "Request body is too large"),
      };
    }
    if (clientStatus === 415) {
      return {
        status: 415,
        body: errorBody("UNSUPPORTED_MEDIA_TYPE", error.message),
      };
    }
    if (isJsonBodyError(error)) {
      return {
        status: 400,
        body: errorBody("INVALID_JSON", "Request body is not valid JSON"),
      };
    }
    return {
      status: clientStatus,
      body: errorBody("BAD_REQUEST", error.message),
    };
  }
  return {
    status: 500,
    body: errorBody("INTERNAL_ERROR", "Internal server error"),
  };
}
