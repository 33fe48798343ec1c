// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/carve`
 * Purpose: `carve <payload>`: submit an on-chain carve and report the handle.
 * Scope: Delegates to OnchainCarver. Does not retry.
 * Invariants: Fails with DeploymentFailedError for every carve failure.
 * Side-effects: IO (RPC transaction, reads @file payloads)
 * Links: packages/carve-evm/src/onchain-carver.ts
 * @internal
 */

import { resolvePayload } from "../payload.js";
import type { Command } from "./types.js";

export const carveCommand: Command = async ({ args }, deps) => {
  const runtime = await resolvePayload(args[0], deps.readText);
  const carver = deps.container.onchain();
  deps.container.logger.info(
    { predicted: carver.addressOf(runtime) },
    "submitting carve"
  );
  const { handle, txHash } = await carver.carve(runtime);
  return { handle, txHash };
};
