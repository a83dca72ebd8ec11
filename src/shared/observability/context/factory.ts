// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for creating request-scoped context with sanitized reqId.
 * Scope: Build RequestContext from request headers. Does not authenticate the caller.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-); routeId is stable identifier.
 * Side-effects: none
 * Links: Used by bootstrap/http router
 * @public
 */

import { randomUUID } from "node:crypto";

import type { Logger } from "pino";

import type { Clock, RequestContext } from "./types";

export const REQUEST_ID_HEADER = "x-request-id";
export const CALLER_HEADER = "x-caller-address";
const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Sanitize incoming x-request-id header to prevent injection attacks.
 * Max 64 chars, alphanumeric + _- only.
 */
function sanitizeReqId(incoming: string | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Create request-scoped context with child logger.
 *
 * @param deps - Dependencies: baseLog (root logger), clock (time provider)
 * @param request - Method and lowercased headers of the incoming request; repeated headers keep the first value
 * @param meta - Request metadata (routeId)
 * @returns RequestContext with child logger (reqId, route, method bound)
 */
export function createRequestContext(
  deps: { baseLog: Logger; clock: Clock },
  request: {
    method: string;
    headers: Record<string, string | string[] | undefined>;
  },
  meta: { routeId: string }
): RequestContext {
  const reqId = sanitizeReqId(firstValue(request.headers[REQUEST_ID_HEADER]));

  return {
    log: deps.baseLog.child({
      reqId,
      route: meta.routeId,
      method: request.method,
    }),
    reqId,
    caller: firstValue(request.headers[CALLER_HEADER]),
    clock: deps.clock,
  };
}
