// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm/evm/evm-carver-client.interface`
 * Purpose: Internal infra seam for the RPC operations carving needs (NOT a domain port).
 * Scope: Wraps code reads and engine contract calls. Does not implement validation or derivation.
 * Invariants: All EVM carving code MUST go through this interface (never call viem/RPC directly).
 * Side-effects: none (interface definition only)
 * Notes: Production uses ViemEvmCarverClient; tests use FakeEvmCarverClient.
 * Links: src/onchain-carver.ts
 * @public
 */

import type { Address, Hex } from "viem";

export interface CarveSubmission {
  /** Handle returned by the engine's carve() */
  readonly handle: Address;
  readonly txHash: Hex;
}

export interface EvmCarverClient {
  /**
   * Deployed code at an address; "0x" when there is none.
   */
  getCode(address: Address): Promise<Hex>;

  /** Engine's own addressOf(code) view. */
  readAddressOf(engine: Address, code: Hex): Promise<Address>;

  /** Engine's own isCarved(handle) view. */
  readIsCarved(engine: Address, handle: Address): Promise<boolean>;

  /**
   * Send engine.carve(code) and wait for it to be mined.
   * @throws DeploymentFailedError when the engine reverts or the transaction fails
   */
  submitCarve(engine: Address, code: Hex): Promise<CarveSubmission>;
}
