// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction; reads process.env and nothing else.
 * Invariants:
 * - CARVE_PRIVATE_KEY is a secret (never log)
 * - Host rules default to EVM mainnet values
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: src/bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

const emptyToUndefined = z.literal("").transform(() => undefined);

const EnvSchema = z.object({
  /** Engine identity used in every derivation (required by address/verify/parity/carve) */
  CARVE_ENGINE_ADDRESS: z
    .string()
    .regex(
      /^0x[0-9a-fA-F]{40}$/,
      "CARVE_ENGINE_ADDRESS must be a 20-byte hex address"
    )
    .optional()
    .or(emptyToUndefined),

  /** JSON-RPC endpoint (required by chain commands) */
  CARVE_RPC_URL: z
    .string()
    .url("CARVE_RPC_URL must be a valid URL")
    .optional()
    .or(emptyToUndefined),

  /** Chain id the RPC must report (required by chain commands) */
  CARVE_CHAIN_ID: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .or(emptyToUndefined),

  /** Signer for on-chain carve (treat as secret - never log) */
  CARVE_PRIVATE_KEY: z
    .string()
    .regex(
      /^0x[0-9a-fA-F]{64}$/,
      "CARVE_PRIVATE_KEY must be a 32-byte hex key"
    )
    .optional()
    .or(emptyToUndefined),

  /** Host maximum artifact size in bytes (default: 24576) */
  CARVE_MAX_CODE_SIZE: z.coerce.number().int().positive().default(24_576),

  /** Host reserved first byte (default: 0xef) */
  CARVE_FORBIDDEN_FIRST_BYTE: z.coerce
    .number()
    .int()
    .min(0)
    .max(255)
    .default(0xef),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: carve-cli) */
  SERVICE_NAME: z.string().default("carve-cli"),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parse an environment record. Throws on invalid config listing every bad variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
