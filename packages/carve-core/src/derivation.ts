// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/derivation`
 * Purpose: Content-addressed handle derivation (CREATE2 over the bootstrap prefix and runtime bytecode).
 * Scope: Pure hashing and byte normalization. Does not validate deployability or perform I/O.
 * Invariants:
 * - Deterministic: same (runtime, engine) -> same handle, before, during or after any deployment
 * - Salt is the fixed CARVE_SALT; no public operation accepts a caller salt for carving
 * - Zero-length runtime bytecode yields a defined handle
 * - Coupled to keccak-256; a different hash changes every handle
 * Side-effects: none
 * Links: src/bootstrap-prefix.ts, src/verify.ts
 * @public
 */

import {
  type Address,
  bytesToHex,
  concat,
  getAddress,
  type Hex,
  hexToBytes,
  isHex,
  keccak256,
  pad,
  size,
  slice,
} from "viem";

import { composeInitCode } from "./bootstrap-prefix.js";
import type { RuntimeBytecode } from "./types.js";

/** 32 zero bytes. */
export const CARVE_SALT: Hex = pad("0x", { size: 32 });

const CREATE2_MARKER = "0xff" as const;

export interface Create2Params {
  readonly deployer: Address;
  /** Exactly 32 bytes */
  readonly salt: Hex;
  readonly initCode: Hex;
}

/**
 * Normalize caller bytes to lowercase, even-length hex.
 * Throws on strings that are not hex byte sequences.
 */
export function toRuntimeHex(code: RuntimeBytecode): Hex {
  if (typeof code !== "string") {
    return bytesToHex(code);
  }
  if (!isHex(code, { strict: true }) || code.length % 2 !== 0) {
    throw new Error(
      `Invalid runtime bytecode (expected 0x-prefixed byte hex): ${code.slice(0, 18)}`
    );
  }
  return bytesToHex(hexToBytes(code));
}

export function initCodeHash(initCode: Hex): Hex {
  return keccak256(initCode);
}

/**
 * `keccak256(0xff || deployer || salt || keccak256(initCode))[12:]`, checksummed.
 */
export function computeCreate2Address(params: Create2Params): Address {
  if (size(params.salt) !== 32) {
    throw new Error(`CREATE2 salt must be 32 bytes, got ${size(params.salt)}`);
  }
  const buffer = concat([
    CREATE2_MARKER,
    params.deployer,
    params.salt,
    initCodeHash(params.initCode),
  ]);
  return getAddress(slice(keccak256(buffer), 12));
}

/**
 * Handle at which `runtime` is carved by `engine`.
 */
export function deriveHandle(
  runtime: RuntimeBytecode,
  engine: Address
): Address {
  return computeCreate2Address({
    deployer: engine,
    salt: CARVE_SALT,
    initCode: composeInitCode(toRuntimeHex(runtime)),
  });
}
