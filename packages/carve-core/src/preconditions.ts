// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/preconditions`
 * Purpose: Local checks a runtime bytecode must pass before any placement is attempted.
 * Scope: Pure validation against injected host rules. Does not throw; callers decide how to fail.
 * Invariants: Rejects empty input, the host's forbidden first byte, and oversize input.
 * Side-effects: none
 * Links: src/carver.ts, packages/carve-evm/src/onchain-carver.ts
 * @public
 */

import { type Hex, hexToNumber, size, slice } from "viem";

import { toRuntimeHex } from "./derivation.js";
import type { HostRules, RuntimeBytecode } from "./types.js";

export type CarveRejection =
  | "invalid_bytes"
  | "empty"
  | "forbidden_first_byte"
  | "oversize";

export type PreconditionResult =
  | { readonly ok: true; readonly runtime: Hex; readonly length: number }
  | {
      readonly ok: false;
      readonly reason: CarveRejection;
      readonly cause?: unknown;
    };

export function checkCarvePreconditions(
  code: RuntimeBytecode,
  rules: HostRules
): PreconditionResult {
  let runtime: Hex;
  try {
    runtime = toRuntimeHex(code);
  } catch (error) {
    return { ok: false, reason: "invalid_bytes", cause: error };
  }

  const length = size(runtime);
  if (length === 0) {
    return { ok: false, reason: "empty" };
  }
  if (hexToNumber(slice(runtime, 0, 1)) === rules.forbiddenFirstByte) {
    return { ok: false, reason: "forbidden_first_byte" };
  }
  if (length > rules.maxCodeSize) {
    return { ok: false, reason: "oversize" };
  }
  return { ok: true, runtime, length };
}
