// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/parity`
 * Purpose: `parity <payload>`: compare the engine contract's addressOf with the local derivation.
 * Scope: One contract read.
 * Invariants: none
 * Side-effects: IO (RPC, reads @file payloads)
 * Links: packages/carve-evm/src/onchain-carver.ts
 * @internal
 */

import { resolvePayload } from "../payload.js";
import type { Command } from "./types.js";

export const parityCommand: Command = async ({ args }, deps) => {
  const runtime = await resolvePayload(args[0], deps.readText);
  const report = await deps.container.onchain().checkParity(runtime);
  if (!report.match) {
    deps.container.logger.warn(
      { local: report.local, remote: report.remote },
      "engine addressOf disagrees with local derivation"
    );
  }
  return { ...report };
};
