// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/server`
 * Purpose: Fastify instance for the RPC router.
 * Scope: Body limit, error and not-found handlers, route registration. Does not validate or call services.
 * Invariants: Bodies over MAX_BODY_BYTES are refused with 413; unparseable JSON is 400; every response is application/json.
 * Side-effects: none until the caller listens
 * Links: bootstrap/http/router.ts, bootstrap/http/errorMapping.ts
 * @internal
 */

import Fastify, { type FastifyInstance } from "fastify";

import { errorBody, mapErrorToResponse } from "./errorMapping";
import { isKnownPath, registerRoutes, type RouterDeps } from "./router";

const MAX_BODY_BYTES = 64 * 1024;

export function buildRpcServer(deps: RouterDeps): FastifyInstance {
  const app = Fastify({ logger: false, bodyLimit: MAX_BODY_BYTES });

  app.setErrorHandler((err, request, reply) => {
    const mapped = mapErrorToResponse(err);
    if (mapped.status >= 500) {
      deps.log.error(
        { err, method: request.method, url: request.url },
        "request handling failed"
      );
    }
    return reply.status(mapped.status).send(mapped.body);
  });

  app.setNotFoundHandler((request, reply) => {
    const path = request.url.split("?")[0] ?? request.url;
    if (isKnownPath(path)) {
      return reply
        .status(405)
        .send(
          errorBody("METHOD_NOT_ALLOWED", `${request.method} not allowed`)
        );
    }
    return reply
      .status(404)
      .send(errorBody("NOT_FOUND", `No route for ${path}`));
  });

  registerRoutes(app, deps);
  return app;
}
