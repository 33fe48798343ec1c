// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/verify`
 * Purpose: Integrity predicate certifying that the code stored at a handle re-derives to that handle.
 * Scope: One read through a CodeReader plus pure derivation. Does not judge what the stored bytes do.
 * Invariants:
 * - Never throws for any candidate string; malformed addresses are simply not carved
 * - Unoccupied handles are checked as zero-length code, not special-cased
 * - Reader infrastructure failures propagate; they are not verification outcomes
 * Side-effects: IO (one read through the reader)
 * Links: src/derivation.ts, src/carver.ts
 * @public
 */

import { type Address, isAddress, isAddressEqual } from "viem";

import { deriveHandle } from "./derivation.js";
import type { CodeReader } from "./ports/code-reader.port.js";

export async function verifyCarved(
  reader: CodeReader,
  engine: Address,
  handle: string
): Promise<boolean> {
  if (!isAddress(handle, { strict: false })) {
    return false;
  }
  const observed = await reader.readCode(handle);
  return isAddressEqual(deriveHandle(observed, engine), handle);
}
