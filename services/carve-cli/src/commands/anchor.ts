// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/commands/anchor`
 * Purpose: `anchor <engine-init-code> [--salt] [--factory]`: predict the engine identity a deterministic-deployment factory yields.
 * Scope: Offline; pure prediction.
 * Invariants: --salt must be exactly 32 bytes of hex.
 * Side-effects: IO (reads @file payloads)
 * Links: packages/carve-core/src/anchor.ts
 * @internal
 */

import {
  CARVE_SALT,
  DETERMINISTIC_DEPLOYMENT_PROXY,
  predictAnchoredIdentity,
} from "@bytecarve/carve-core";
import { type Hex, isHex } from "viem";

import { UsageError } from "../errors.js";
import { resolvePayload } from "../payload.js";
import type { Command } from "./types.js";

function parseSalt(raw: string | undefined): Hex {
  if (raw === undefined) {
    return CARVE_SALT;
  }
  if (!isHex(raw, { strict: true }) || raw.length !== 66) {
    throw new UsageError(`--salt must be 32 bytes of 0x-prefixed hex: ${raw}`);
  }
  return raw;
}

export const anchorCommand: Command = async ({ args, options }, deps) => {
  const initCode = await resolvePayload(args[0], deps.readText);
  const salt = parseSalt(options.salt);
  const factory = options.factory ?? DETERMINISTIC_DEPLOYMENT_PROXY;
  const identity = predictAnchoredIdentity({ initCode, salt, factory });
  return { identity, factory, salt };
};
