// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/types`
 * Purpose: Shared value types for carving: runtime bytecode, engine identity, host rules.
 * Scope: Type definitions and the engine identity boundary constructor. Does not hash or perform I/O.
 * Invariants:
 * - toEngineIdentity() is the single entry point for creating an EngineIdentity (validated, EIP-55 checksummed)
 * - Hex values are viem-compatible template literal types
 * Side-effects: none
 * Links: src/derivation.ts, src/carver.ts
 * @public
 */

import type { Tagged } from "type-fest";
import {
  type Address,
  type ByteArray,
  getAddress,
  type Hex,
  isAddress,
} from "viem";

export type { Address, ByteArray, Hex } from "viem";

/** Opaque payload meant to persist as the stored artifact. */
export type RuntimeBytecode = Hex | ByteArray;

/** Checksummed address of the engine instance, fixed for its lifetime. */
export type EngineIdentity = Tagged<Address, "EngineIdentity">;

/** Platform limits enforced on stored artifacts. */
export interface HostRules {
  /** First byte a stored artifact may never start with */
  readonly forbiddenFirstByte: number;
  /** Maximum stored artifact length in bytes */
  readonly maxCodeSize: number;
}

/** Validate and brand a raw address as EngineIdentity. Boundary constructor; call at edges only. */
export function toEngineIdentity(raw: string): EngineIdentity {
  if (!isAddress(raw, { strict: false })) {
    throw new Error(
      `Invalid EngineIdentity (expected 20-byte hex address): ${raw}`
    );
  }
  return getAddress(raw) as EngineIdentity;
}
