// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/ports/code-reader`
 * Purpose: Read-side port over whatever stores artifacts (in-process ledger, EVM chain).
 * Scope: Interface only. Does not contain implementations.
 * Invariants: Unoccupied handles read as "0x" with size 0; never throws for absence.
 * Side-effects: none
 * Links: src/verify.ts
 * @public
 */

import type { Address, Hex } from "viem";

export interface CodeReader {
  /** Byte length of the stored artifact, 0 if unoccupied. */
  sizeOf(handle: Address): Promise<number>;
  /** Stored artifact bytes, "0x" if unoccupied. */
  readCode(handle: Address): Promise<Hex>;
}
