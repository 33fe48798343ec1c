// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/observability/logger`
 * Purpose: Pino logger factory - JSON-only emission on stderr.
 * Scope: Create configured pino loggers. Does not format output.
 * Invariants: JSON lines on fd 2 so stdout carries only command results. Silenced under Vitest / NODE_ENV=test.
 * Side-effects: none
 * Notes: Use makeLogger in main; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: src/main.ts, src/observability/redact.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level: string;
  readonly serviceName: string;
  readonly bindings?: Record<string, unknown>;
}

export function makeLogger(options: LoggerOptions): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isTestTooling = isVitest || process.env.NODE_ENV === "test";

  return pino(
    {
      level: options.level,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: {
        ...options.bindings,
        app: "bytecarve",
        service: options.serviceName,
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
