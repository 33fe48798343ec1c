// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm`
 * Purpose: Package entry point for EVM chain carving adapters.
 * Scope: Re-exports only; does not contain implementation logic.
 * Invariants: All public APIs exported from this barrel file.
 * Side-effects: none
 * Links: src/onchain-carver.ts
 * @public
 */

export * from "./evm/abi.js";
export * from "./evm/chain-code-reader.js";
export type * from "./evm/evm-carver-client.interface.js";
export * from "./evm/viem-evm-carver-client.js";
export * from "./onchain-carver.js";
