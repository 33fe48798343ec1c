// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/main`
 * Purpose: Process entry point: loads env, builds the logger, runs the CLI and sets the exit code.
 * Scope: Entry point only. Does not contain command logic.
 * Invariants: Reads config from env (no hardcoded values); never calls process.exit so pino can drain.
 * Side-effects: IO (process.env, stdout/stderr, filesystem for @file payloads)
 * Links: src/cli.ts
 * @public
 */

import { readFile } from "node:fs/promises";

import { env } from "./bootstrap/env.js";
import { EXIT_FAILURE, runCli } from "./cli.js";
import { makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger({
    level: config.LOG_LEVEL,
    serviceName: config.SERVICE_NAME,
  });

  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    logger,
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
      readText: (path) => readFile(path, "utf8"),
    },
  });
}

const bootLogger = makeLogger({
  level: "info",
  serviceName: "carve-cli",
  bindings: { phase: "boot" },
});

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  process.exitCode = EXIT_FAILURE;
});
