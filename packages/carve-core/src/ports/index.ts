// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/ports`
 * Purpose: Collaborator port interfaces barrel file.
 * Scope: Re-exports only; does not contain implementation logic.
 * Invariants: none
 * Side-effects: none
 * Links: src/carver.ts
 * @public
 */

export type { CodeReader } from "./code-reader.port.js";
export type {
  PlacementLedger,
  PlacementRequest,
  PlacementScope,
} from "./placement-ledger.port.js";
