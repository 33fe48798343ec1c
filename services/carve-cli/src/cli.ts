// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/cli`
 * Purpose: Parse argv, run one command, and write its JSON result.
 * Scope: Everything between process boundary and commands. Does not read process.env or exit the process.
 * Invariants:
 * - stdout carries exactly one JSON document on success and nothing on failure
 * - Returns the exit code: 0 success, 1 failure, 2 usage error
 * - DeploymentFailedError is reported with its message only
 * Side-effects: IO (writes to the injected output streams)
 * Links: src/main.ts, src/commands/index.ts
 * @internal
 */

import { parseArgs } from "node:util";

import { isDeploymentFailedError } from "@bytecarve/carve-core";

import {
  type ContainerOverrides,
  createCarveContainer,
} from "./bootstrap/container.js";
import type { Env } from "./bootstrap/env.js";
import { runCommand, USAGE } from "./commands/index.js";
import { isUsageError } from "./errors.js";
import type { Logger } from "./observability/logger.js";
import type { ReadText } from "./payload.js";

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readText: ReadText;
}

export interface CliContext {
  readonly config: Env;
  readonly logger: Logger;
  readonly io: CliIo;
  readonly overrides?: ContainerOverrides;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export async function runCli(
  argv: readonly string[],
  ctx: CliContext
): Promise<number> {
  const { io, logger } = ctx;

  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    io.stderr(`${messageOf(error)}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (parsed.values.help) {
    io.stdout(`${USAGE}\n`);
    return EXIT_OK;
  }

  const [name, ...args] = parsed.positionals;
  const container = createCarveContainer(ctx.config, logger, ctx.overrides);

  try {
    const result = await runCommand(
      name,
      {
        args,
        options: { salt: parsed.values.salt, factory: parsed.values.factory },
      },
      { container, readText: io.readText }
    );
    io.stdout(`${JSON.stringify(result, null, 2)}\n`);
    return EXIT_OK;
  } catch (error) {
    if (isUsageError(error)) {
      io.stderr(`${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    if (isDeploymentFailedError(error)) {
      logger.warn({ command: name, err: error.cause }, "deployment failed");
      io.stderr(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    logger.error({ command: name, err: error }, "command failed");
    io.stderr(`${messageOf(error)}\n`);
    return EXIT_FAILURE;
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      salt: { type: "string" },
      factory: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
