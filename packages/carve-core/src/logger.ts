// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/logger`
 * Purpose: Structural logger contract so library code can log without depending on pino.
 * Scope: Interface and no-op implementation only. Does not configure transports.
 * Invariants: Compatible with pino's Logger type.
 * Side-effects: none
 * Links: services/carve-cli/src/observability/logger.ts
 * @public
 */

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
}

const noop = (): void => {};

export const NOOP_LOGGER: LoggerLike = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
