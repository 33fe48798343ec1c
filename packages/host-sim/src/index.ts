// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/host-sim`
 * Purpose: Package entry point for the in-process placement host.
 * Scope: Re-exports only; does not contain implementation logic.
 * Invariants: All public APIs exported from this barrel file.
 * Side-effects: none
 * Links: src/memory-ledger.ts
 * @public
 */

export * from "./errors.js";
export * from "./init-code.js";
export * from "./memory-ledger.js";
