// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/address`
 * Purpose: `address <payload>`: print the handle a payload is carved at.
 * Scope: Offline; local derivation only.
 * Invariants: Defined for empty payloads ("0x").
 * Side-effects: IO (reads @file payloads)
 * Links: packages/carve-core/src/derivation.ts
 * @internal
 */

import { deriveHandle } from "@bytecarve/carve-core";
import { size } from "viem";

import { resolvePayload } from "../payload.js";
import type { Command } from "./types.js";

export const addressCommand: Command = async ({ args }, deps) => {
  const runtime = await resolvePayload(args[0], deps.readText);
  const handle = deriveHandle(runtime, deps.container.engine());
  return { handle, length: size(runtime) };
};
