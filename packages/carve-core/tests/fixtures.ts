// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/tests/fixtures`
 * Purpose: Known derivation vectors shared by carve-core tests.
 * Scope: Constants only. Handles were computed independently of this codebase.
 * Invariants: Every handle below is derived under ENGINE with CARVE_SALT.
 * Side-effects: none
 * Links: src/derivation.ts
 * @internal
 */

import type { Address, Hex } from "viem";

import { toEngineIdentity } from "../src/types.js";

export const ENGINE = toEngineIdentity(
  "0x5FbDB2315678afecb367f032d93F642f64180aa3"
);

export const OTHER_ENGINE = toEngineIdentity(
  "0x2222222222222222222222222222222222222222"
);

/** Stores a 32-byte word holding 42 and returns it */
export const RETURN_42: Hex = "0x602a60005260206000f3";

/** Bytes 0x01 through 0x20 */
export const COUNTING_32: Hex =
  "0x0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20";

export const COUNTING_64: Hex = `${COUNTING_32}${COUNTING_32.slice(2)}`;

export const HANDLES = {
  empty: "0x6Bc72233d9386e3148fdcA1796efD8BD13aB4daA",
  return42: "0x1948446719E5292888e2f8a66f4d71a340E86F3a",
  counting32: "0xfA050CFCde5eE2C346941976891b38026F230E51",
  counting64: "0x15EA6424FBA43CeAcb5d38D707CAadA1e7bC0ec7",
  return42OtherEngine: "0x9FF79d6acF7Af684d3F632C36C406Fe6b0d76445",
  fourBytes: "0x4BA98B190B90A8A7D5D6d09dadCD46bCd07524e2",
} as const satisfies Record<string, Address>;

export const INIT_CODE_HASHES = {
  empty: "0x0be11342a833826cafedf8bf4daaafc60e294827d476d0fc5d791baeb4a92f51",
  return42:
    "0x624cba59e7ac67f75ca9d6f54713f0fa64d884bfd7bec42e7f13afecf49d419f",
} as const satisfies Record<string, Hex>;
