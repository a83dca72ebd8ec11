// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.readyz.read.v1.contract`
 * Purpose: Contract for readiness check endpoint.
 * Scope: Readiness check - container built and server not draining. Does not contact the RPC node.
 * Invariants: Binary readiness; HTTP status is primary truth: 200 = ready, 503 = not ready.
 * Side-effects: none
 * Notes: Orchestrators rely on HTTP status codes, not response body.
 * Links: /readyz endpoint
 * @internal
 */

import { z } from "zod";

export const readyzStatusSchema = z.enum(["healthy", "not_ready"]);

export const metaReadyzOutputSchema = z.object({
  status: readyzStatusSchema,
  timestamp: z.string(), // RFC3339/ISO-8601 format
  version: z.string().optional(),
});

// Protocol-neutral operation metadata.
export const metaReadyzOperation = {
  id: "meta.readyz.read.v1",
  summary: "Readiness check - full validation",
  description:
    "Readiness check: env validated, object graph built, not shutting down. HTTP status: 200 = ready, 503 = not ready.",
  input: null,
  output: metaReadyzOutputSchema,
} as const;

export type MetaReadyzOutput = z.infer<typeof metaReadyzOutputSchema>;
