// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/host-rules`
 * Purpose: Platform limits on stored artifacts, injected rather than hard-coded in the orchestrator.
 * Scope: Constants and a merge helper. Does not enforce anything itself.
 * Invariants: Defaults mirror EVM mainnet rules (EIP-3541 reserved 0xEF prefix, EIP-170 code size cap).
 * Side-effects: none
 * Links: src/carver.ts, packages/host-sim/src/memory-ledger.ts
 * @public
 */

import type { HostRules } from "./types.js";

export const EVM_HOST_RULES: HostRules = {
  forbiddenFirstByte: 0xef,
  maxCodeSize: 24_576,
};

export function resolveHostRules(overrides?: Partial<HostRules>): HostRules {
  const rules = { ...EVM_HOST_RULES, ...overrides };
  if (
    !Number.isInteger(rules.forbiddenFirstByte) ||
    rules.forbiddenFirstByte < 0 ||
    rules.forbiddenFirstByte > 0xff
  ) {
    throw new RangeError(
      `forbiddenFirstByte must be a single byte, got ${rules.forbiddenFirstByte}`
    );
  }
  if (!Number.isInteger(rules.maxCodeSize) || rules.maxCodeSize < 1) {
    throw new RangeError(
      `maxCodeSize must be a positive integer, got ${rules.maxCodeSize}`
    );
  }
  return rules;
}
