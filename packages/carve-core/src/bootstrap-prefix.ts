// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/bootstrap-prefix`
 * Purpose: Constant init code that returns everything appended after it, and the helper that composes it with a payload.
 * Scope: Pure constants and concatenation. Does not execute code.
 * Invariants: Prefix is exactly 11 bytes and identical for every derivation and deployment.
 * Side-effects: none
 * Links: packages/host-sim/src/init-code.ts (executes it)
 * @public
 */

import { concat, type Hex } from "viem";

/**
 * Init code, opcode by opcode:
 *
 *   60 0b  PUSH1 11      [11]
 *   59     MSIZE         [0, 11]
 *   81     DUP2          [11, 0, 11]
 *   38     CODESIZE      [cs, 11, 0, 11]
 *   03     SUB           [cs-11, 0, 11]
 *   80     DUP1          [cs-11, cs-11, 0, 11]
 *   92     SWAP3         [11, cs-11, 0, cs-11]
 *   59     MSIZE         [0, 11, cs-11, 0, cs-11]
 *   39     CODECOPY      [0, cs-11]      mem[0..] = code[11..]
 *   f3     RETURN        -> mem[0 .. cs-11]
 */
export const BOOTSTRAP_PREFIX = "0x600b5981380380925939f3" as const;

export const BOOTSTRAP_PREFIX_LENGTH = 11;

/** `BOOTSTRAP_PREFIX || runtime`, the init code handed to the host. */
export function composeInitCode(runtime: Hex): Hex {
  return concat([BOOTSTRAP_PREFIX, runtime]);
}
