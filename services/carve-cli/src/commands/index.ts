// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands`
 * Purpose: Command registry and dispatcher.
 * Scope: Maps command names to handlers. Does not parse argv or print.
 * Invariants: Unknown or missing command names are UsageErrors.
 * Side-effects: none beyond the dispatched command
 * Links: src/main.ts
 * @internal
 */

import { UsageError } from "../errors.js";
import { addressCommand } from "./address.js";
import { anchorCommand } from "./anchor.js";
import { carveCommand } from "./carve.js";
import { parityCommand } from "./parity.js";
import type { Command, CommandDeps, CommandInput, CommandResult } from "./types.js";
import { verifyCommand } from "./verify.js";

export type { Command, CommandDeps, CommandInput, CommandResult } from "./types.js";

export const COMMANDS: Readonly<Record<string, Command>> = {
  address: addressCommand,
  anchor: anchorCommand,
  carve: carveCommand,
  parity: parityCommand,
  verify: verifyCommand,
};

export const USAGE = `Usage: carve-cli <command> [args]

Commands:
  address <payload>                     handle the payload is carved at
  verify <address>                      does chain code at <address> re-derive to it
  parity <payload>                      compare engine addressOf with local derivation
  carve <payload>                       carve on-chain (needs CARVE_PRIVATE_KEY)
  anchor <init-code> [--salt] [--factory]  predict the anchored engine identity

<payload> is 0x-prefixed hex or @path to a file of hex text.`;

export function runCommand(
  name: string | undefined,
  input: CommandInput,
  deps: CommandDeps
): Promise<CommandResult> {
  const command = name === undefined ? undefined : COMMANDS[name];
  if (!command) {
    throw new UsageError(
      name === undefined ? "Missing command" : `Unknown command: ${name}`
    );
  }
  return command(input, deps);
}
