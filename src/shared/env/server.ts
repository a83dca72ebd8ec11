// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the service runtime; provides lazy server environment access. Does not construct clients.
 * Invariants: All required env vars validated on first access; RPC URL and treasury key required when APP_ENV=production; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring (test = in-memory oracle/transfer). Lazy init keeps imports side-effect free.
 * Links: Environment configuration specification
 * @public
 */

import { isAddress } from "viem";
import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const address = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "must be an EVM address");

const weiAmount = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer (wei)")
  .transform((v) => BigInt(v));

const serverSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Application environment (controls adapter wiring)
    APP_ENV: z.enum(["test", "production"]),

    SERVICE_NAME: z.string().default("period-pay"),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    PINO_LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error"])
      .default("info"),

    // Chain access (production wiring only)
    EVM_RPC_URL: z.string().url().optional(),
    /** Treasury signer for payouts (treat as secret - never log) */
    TREASURY_PRIVATE_KEY: z
      .string()
      .regex(/^0x[0-9a-fA-F]{64}$/, "must be a 32-byte hex key")
      .optional(),

    // Access control
    ADMIN_ADDRESSES: z
      .string()
      .min(1)
      .transform((v) =>
        v
          .split(",")
          .map((s) => s.trim())
          .filter(Boolean)
      )
      .pipe(z.array(address).min(1)),

    // Initial configuration
    ORACLE_ADDRESS: address,
    FEE_AMOUNT_WEI: weiAmount,
    PAYOUT_AMOUNT_WEI: weiAmount,
    PERIOD_MONTH: z.coerce.number().int(),
    PERIOD_YEAR: z.coerce.number().int(),
    PERIOD_YEAR_FLOOR: z.coerce.number().int().default(2000),

    // External call bounds
    ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    TRANSFER_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(60_000),
  })
  .superRefine((env, ctx) => {
    if (env.APP_ENV !== "production") return;
    if (!env.EVM_RPC_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EVM_RPC_URL"],
        message: "EVM_RPC_URL is required when APP_ENV=production",
        params: { missing: true },
      });
    }
    if (!env.TREASURY_PRIVATE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TREASURY_PRIVATE_KEY"],
        message: "TREASURY_PRIVATE_KEY is required when APP_ENV=production",
        params: { missing: true },
      });
    }
  });

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

/**
 * Parse an env record without caching (used by serverEnv and tests)
 */
export function parseServerEnv(
  source: Record<string, string | undefined>
): ServerEnv {
  try {
    const parsed = serverSchema.parse(source);
    return {
      ...parsed,
      isDev: parsed.NODE_ENV === "development",
      isTest: parsed.NODE_ENV === "test",
      isProd: parsed.NODE_ENV === "production",
      isTestMode: parsed.APP_ENV === "test",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        // Treat all invalid_type as missing, plus production-only requirements
        if (
          issue.code === "invalid_type" ||
          (issue.code === "custom" && issue.params?.["missing"] === true)
        ) {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }

    throw error;
  }
}

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    ENV = parseServerEnv(process.env);
  }
  return ENV;
}

/**
 * Drop the cached env (tests only)
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
