// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm/evm/chain-code-reader`
 * Purpose: CodeReader over deployed chain code.
 * Scope: Adapts EvmCarverClient.getCode to the carve-core read port. Does not cache.
 * Invariants: Addresses without code read as "0x" / 0.
 * Side-effects: IO (RPC via the client)
 * Links: packages/carve-core/src/ports/code-reader.port.ts
 * @public
 */

import type { CodeReader } from "@bytecarve/carve-core";
import { type Address, type Hex, size } from "viem";

import type { EvmCarverClient } from "./evm-carver-client.interface.js";

export class ChainCodeReader implements CodeReader {
  constructor(private readonly client: EvmCarverClient) {}

  readCode(handle: Address): Promise<Hex> {
    return this.client.getCode(handle);
  }

  async sizeOf(handle: Address): Promise<number> {
    return size(await this.client.getCode(handle));
  }
}
