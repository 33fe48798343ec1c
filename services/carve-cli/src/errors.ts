// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/errors`
 * Purpose: CLI-level error for bad invocations and missing configuration.
 * Scope: Error definition and type guard. Does not print or exit.
 * Invariants: `code` discriminant for type guards.
 * Side-effects: none
 * Links: src/main.ts
 * @internal
 */

export class UsageError extends Error {
  public readonly code = "USAGE" as const;
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof Error && error.name === "UsageError";
}
