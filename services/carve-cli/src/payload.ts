// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/payload`
 * Purpose: Turn a payload argument (`0x…` or `@file`) into runtime bytecode hex.
 * Scope: Argument parsing and file reading through an injected reader. Does not validate deployability.
 * Invariants: File contents are hex text; surrounding whitespace and a missing 0x prefix are tolerated.
 * Side-effects: IO (via readText, for @file arguments)
 * Links: src/commands/index.ts
 * @internal
 */

import { toRuntimeHex } from "@bytecarve/carve-core";
import { type Hex, isHex } from "viem";

import { UsageError } from "./errors.js";

export type ReadText = (path: string) => Promise<string>;

export async function resolvePayload(
  arg: string | undefined,
  readText: ReadText
): Promise<Hex> {
  if (arg === undefined || arg === "") {
    throw new UsageError("Missing payload: pass 0x-prefixed hex or @path");
  }

  let text = arg;
  if (arg.startsWith("@")) {
    text = (await readText(arg.slice(1))).trim();
    if (!text.startsWith("0x")) {
      text = `0x${text}`;
    }
  }

  if (!isHex(text, { strict: true }) || text.length % 2 !== 0) {
    throw new UsageError(`Payload is not byte hex: ${arg}`);
  }
  return toRuntimeHex(text);
}
