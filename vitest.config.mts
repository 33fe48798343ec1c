// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for root cross-package tests.
 * Scope: tests/** only; package-local suites have their own configs.
 * Invariants: No network; every ledger is the in-process host simulator.
 * Side-effects: none
 * Notes: Uses vite-tsconfig-paths so @bytecarve/* resolve to package sources.
 * Links: vitest.workspace.ts
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineProject } from "vitest/config";

export default defineProject({
  plugins: [tsconfigPaths()],
  test: {
    name: "root",
    globals: true,
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
