// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/types`
 * Purpose: Shared command signature for the CLI.
 * Scope: Type definitions only; does not contain runtime code.
 * Invariants: Commands return a JSON-serializable record; they never print or exit.
 * Side-effects: none
 * Links: src/commands/index.ts
 * @internal
 */

import type { CarveContainer } from "../bootstrap/container.js";
import type { ReadText } from "../payload.js";

export interface CommandInput {
  readonly args: readonly string[];
  readonly options: {
    readonly salt?: string | undefined;
    readonly factory?: string | undefined;
  };
}

export interface CommandDeps {
  readonly container: CarveContainer;
  readonly readText: ReadText;
}

export type CommandResult = Record<string, string | number | boolean>;

export type Command = (
  input: CommandInput,
  deps: CommandDeps
) => Promise<CommandResult>;
