// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm/evm/abi`
 * Purpose: ABI of a deployed carving engine contract.
 * Scope: ABI constant only; does not include bytecode or addresses.
 * Invariants: Function and error names match the engine contract; DeploymentFailed is its only custom error.
 * Side-effects: none
 * Links: src/evm/viem-evm-carver-client.ts
 * @public
 */

export const CARVER_ABI = [
  {
    type: "function",
    name: "carve",
    inputs: [{ name: "runtimeCode", type: "bytes", internalType: "bytes" }],
    outputs: [{ name: "", type: "address", internalType: "address" }],
    stateMutability: "nonpayable",
  },
  {
    type: "function",
    name: "addressOf",
    inputs: [{ name: "runtimeCode", type: "bytes", internalType: "bytes" }],
    outputs: [{ name: "", type: "address", internalType: "address" }],
    stateMutability: "view",
  },
  {
    type: "function",
    name: "isCarved",
    inputs: [{ name: "handle", type: "address", internalType: "address" }],
    outputs: [{ name: "", type: "bool", internalType: "bool" }],
    stateMutability: "view",
  },
  {
    type: "error",
    name: "DeploymentFailed",
    inputs: [],
  },
] as const;
