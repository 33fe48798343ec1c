// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/host-sim/errors`
 * Purpose: Refusals raised by the simulated host when a placement cannot happen.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards. Raising one never mutates the ledger.
 * Side-effects: none
 * Links: src/memory-ledger.ts, src/init-code.ts
 * @public
 */

export class PlacementCollisionError extends Error {
  public readonly code = "PLACEMENT_COLLISION" as const;
  constructor(public readonly handle: string) {
    super(`Handle ${handle} is already occupied`);
    this.name = "PlacementCollisionError";
  }
}

export class InitCodeExecutionError extends Error {
  public readonly code = "INIT_CODE_EXECUTION" as const;
  constructor(
    message: string,
    public readonly pc: number
  ) {
    super(`Init code failed at pc=${pc}: ${message}`);
    this.name = "InitCodeExecutionError";
  }
}

export type HostRule = "forbidden_first_byte" | "max_code_size";

export class HostRuleViolationError extends Error {
  public readonly code = "HOST_RULE_VIOLATION" as const;
  constructor(
    public readonly rule: HostRule,
    detail: string
  ) {
    super(`Host refused returned code (${rule}): ${detail}`);
    this.name = "HostRuleViolationError";
  }
}

// Type guards

export function isPlacementCollisionError(
  error: unknown
): error is PlacementCollisionError {
  return error instanceof Error && error.name === "PlacementCollisionError";
}

export function isInitCodeExecutionError(
  error: unknown
): error is InitCodeExecutionError {
  return error instanceof Error && error.name === "InitCodeExecutionError";
}

export function isHostRuleViolationError(
  error: unknown
): error is HostRuleViolationError {
  return error instanceof Error && error.name === "HostRuleViolationError";
}
