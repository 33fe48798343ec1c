// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/ports/placement-ledger`
 * Purpose: Write-side port for the external placement collaborator that owns every artifact.
 * Scope: Interface only. Does not contain implementations.
 * Invariants:
 * - CREATE_ONCE: place() refuses an occupied handle without altering it
 * - ATOMIC_SCOPE: a transaction whose work rejects leaves no placement behind
 * - Reads on the ledger itself see committed state only; reads on a scope also see its own placements
 * Side-effects: none
 * Links: packages/host-sim/src/memory-ledger.ts
 * @public
 */

import type { Address, Hex } from "viem";

import type { CodeReader } from "./code-reader.port.js";

export interface PlacementRequest {
  /** Identity of the placing caller; first CREATE2 input */
  readonly deployer: Address;
  /** 32-byte salt */
  readonly salt: Hex;
  /** Self-describing init code; the artifact is whatever it returns */
  readonly initCode: Hex;
}

export interface PlacementScope extends CodeReader {
  /**
   * Run `initCode` and store its output at the CREATE2 handle of the request.
   * @throws if the handle is occupied, the init code fails, or the host refuses the output
   */
  place(request: PlacementRequest): Promise<Address>;
}

export interface PlacementLedger extends CodeReader {
  transaction<T>(work: (scope: PlacementScope) => Promise<T>): Promise<T>;
}
