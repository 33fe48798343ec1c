// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/errors`
 * Purpose: The single failure kind surfaced by carving.
 * Scope: Error definition and type guard. Does not perform I/O or contain business logic.
 * Invariants:
 * - Every carve failure (bad input, collision, post-commit mismatch) is a DeploymentFailedError
 * - Callers get no reason discriminant; the original failure is only kept as `cause`
 * Side-effects: none
 * Links: src/carver.ts
 * @public
 */

export class DeploymentFailedError extends Error {
  public readonly code = "DEPLOYMENT_FAILED" as const;
  constructor(options?: { cause?: unknown }) {
    super("Deployment failed", options);
    this.name = "DeploymentFailedError";
  }
}

export function isDeploymentFailedError(
  error: unknown
): error is DeploymentFailedError {
  return error instanceof Error && error.name === "DeploymentFailedError";
}
