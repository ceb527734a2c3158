// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the runtime; provides lazy environment access. Does not read config files.
 * Invariants: All required env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring; SERVICE_TOKEN_ADDRESS + SERVICE_ACTION_ID identify the reward service activity.
 *        Lazy init keeps module import free of env access.
 * @public
 */

import { getAddress, isAddress } from "viem";
import { ZodError, z } from "zod";

import { DEFAULT_MAX_RECIPIENTS } from "@/core";

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

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("group-action-rewards"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Reward service activity
  SERVICE_TOKEN_ADDRESS: z
    .string()
    .refine((v) => isAddress(v), { message: "not an EVM address" })
    .transform((v) => getAddress(v)),
  SERVICE_ACTION_ID: z.coerce.bigint().nonnegative(),

  MAX_RECIPIENTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_RECIPIENTS),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
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

          // Treat all invalid_type as missing (undefined input)
          if (issue.code === "invalid_type") {
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
  return ENV;
}

/** For tests only - forces re-validation on next access */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
