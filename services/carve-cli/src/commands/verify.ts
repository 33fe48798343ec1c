// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/verify`
 * Purpose: `verify <address>`: check that chain code at an address re-derives to it.
 * Scope: Reads chain code and the engine's own isCarved view; derivation is local.
 * Invariants: A non-verifying artifact is a result (`carved: false`), not a failure.
 * Side-effects: IO (RPC)
 * Links: packages/carve-core/src/verify.ts
 * @internal
 */

import { UsageError } from "../errors.js";
import type { Command } from "./types.js";

export const verifyCommand: Command = async ({ args }, deps) => {
  const handle = args[0];
  if (!handle) {
    throw new UsageError("Missing address to verify");
  }
  const carver = deps.container.onchain();
  const [carved, engineReportsCarved] = await Promise.all([
    carver.isCarved(handle),
    carver.engineReportsCarved(handle),
  ]);
  return { handle, carved, engineReportsCarved };
};
