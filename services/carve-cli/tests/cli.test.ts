// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/tests/cli`
 * Purpose: Command tests through runCli with a mocked engine client.
 * Scope: Argument parsing, dispatch, output and exit codes. Does not require network or filesystem.
 * Invariants: stdout holds one JSON document on success and nothing on failure.
 * Side-effects: none
 * Links: src/cli.ts, src/commands/index.ts
 * @internal
 */

import {
  type Address,
  DeploymentFailedError,
  type Hex,
} from "@bytecarve/carve-core";
import type { CarveSubmission } from "@bytecarve/carve-evm";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { parseEnv } from "../src/bootstrap/env.js";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from "../src/cli.js";
import { USAGE } from "../src/commands/index.js";
import { makeNoopLogger } from "../src/observability/logger.js";

const ENGINE = "0x5FbDB2315678afecb367f032d93F642f64180aa3";
const RETURN_42: Hex = "0x602a60005260206000f3";
const RETURN_42_HANDLE = "0x1948446719E5292888e2f8a66f4d71a340E86F3a";
const EMPTY_HANDLE = "0x6Bc72233d9386e3148fdcA1796efD8BD13aB4daA";
const TX_HASH: Hex = `0x${"ab".repeat(32)}`;

function createMockClient() {
  return {
    getCode: vi.fn<(address: Address) => Promise<Hex>>(async () => "0x"),
    readAddressOf: vi.fn<(engine: Address, code: Hex) => Promise<Address>>(),
    readIsCarved: vi.fn<(engine: Address, handle: Address) => Promise<boolean>>(
      async () => false
    ),
    submitCarve:
      vi.fn<(engine: Address, code: Hex) => Promise<CarveSubmission>>(),
  };
}

describe("runCli", () => {
  let stdout: string[];
  let stderr: string[];
  let files: Map<string, string>;
  let client: ReturnType<typeof createMockClient>;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    files = new Map();
    client = createMockClient();
  });

  function run(argv: string[], env: Record<string, string> = {}) {
    return runCli(argv, {
      config: parseEnv({ CARVE_ENGINE_ADDRESS: ENGINE, ...env }),
      logger: makeNoopLogger(),
      io: {
        stdout: (text) => stdout.push(text),
        stderr: (text) => stderr.push(text),
        readText: async (path) => {
          const text = files.get(path);
          if (text === undefined) {
            throw new Error(`ENOENT: ${path}`);
          }
          return text;
        },
      },
      overrides: { client },
    });
  }

  function output(): unknown {
    return JSON.parse(stdout.join(""));
  }

  describe("dispatch", () => {
    it("prints usage for --help", async () => {
      await expect(run(["--help"])).resolves.toBe(EXIT_OK);
      expect(stdout).toEqual([`${USAGE}\n`]);
    });

    it("rejects a missing command", async () => {
      await expect(run([])).resolves.toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(`Missing command\n\n${USAGE}\n`);
      expect(stdout).toEqual([]);
    });

    it("rejects an unknown command", async () => {
      await expect(run(["frobnicate"])).resolves.toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(`Unknown command: frobnicate\n\n${USAGE}\n`);
    });

    it("rejects unknown options", async () => {
      await expect(run(["address", "0x01", "--nope"])).resolves.toBe(
        EXIT_USAGE
      );
      expect(stdout).toEqual([]);
    });
  });

  describe("address", () => {
    it("prints the derived handle", async () => {
      await expect(run(["address", RETURN_42])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({ handle: RETURN_42_HANDLE, length: 10 });
      expect(client.getCode).not.toHaveBeenCalled();
    });

    it("is defined for the empty payload", async () => {
      await expect(run(["address", "0x"])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({ handle: EMPTY_HANDLE, length: 0 });
    });

    it("reads @file payloads", async () => {
      files.set("return42.hex", "602a60005260206000f3\n");

      await expect(run(["address", "@return42.hex"])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({ handle: RETURN_42_HANDLE, length: 10 });
    });

    it("requires an engine address", async () => {
      await expect(
        run(["address", RETURN_42], { CARVE_ENGINE_ADDRESS: "" })
      ).resolves.toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(
        `CARVE_ENGINE_ADDRESS is required for this command\n\n${USAGE}\n`
      );
    });

    it("reports unreadable files as failures", async () => {
      await expect(run(["address", "@missing.hex"])).resolves.toBe(
        EXIT_FAILURE
      );
      expect(stderr).toEqual(["ENOENT: missing.hex\n"]);
    });
  });

  describe("verify", () => {
    it("reports local verification and the engine's view", async () => {
      client.getCode.mockResolvedValue(RETURN_42);
      client.readIsCarved.mockResolvedValue(true);

      await expect(run(["verify", RETURN_42_HANDLE])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({
        handle: RETURN_42_HANDLE,
        carved: true,
        engineReportsCarved: true,
      });
      expect(client.readIsCarved).toHaveBeenCalledWith(
        ENGINE,
        RETURN_42_HANDLE
      );
    });

    it("prints false for code that does not derive to the address", async () => {
      client.getCode.mockResolvedValue(RETURN_42);

      await expect(run(["verify", EMPTY_HANDLE])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({
        handle: EMPTY_HANDLE,
        carved: false,
        engineReportsCarved: false,
      });
    });

    it("requires an address", async () => {
      await expect(run(["verify"])).resolves.toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(`Missing address to verify\n\n${USAGE}\n`);
    });

    it("reports RPC failures", async () => {
      client.getCode.mockRejectedValue(new Error("rpc down"));

      await expect(run(["verify", RETURN_42_HANDLE])).resolves.toBe(
        EXIT_FAILURE
      );
      expect(stderr).toEqual(["rpc down\n"]);
      expect(stdout).toEqual([]);
    });
  });

  describe("parity", () => {
    it("reports a disagreeing engine without failing", async () => {
      client.readAddressOf.mockResolvedValue(EMPTY_HANDLE);

      await expect(run(["parity", RETURN_42])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({
        local: RETURN_42_HANDLE,
        remote: EMPTY_HANDLE,
        match: false,
      });
    });
  });

  describe("carve", () => {
    it("prints the handle and transaction hash", async () => {
      client.submitCarve.mockResolvedValue({
        handle: RETURN_42_HANDLE,
        txHash: TX_HASH,
      });
      client.getCode.mockResolvedValue(RETURN_42);

      await expect(run(["carve", RETURN_42])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({ handle: RETURN_42_HANDLE, txHash: TX_HASH });
      expect(client.submitCarve).toHaveBeenCalledWith(ENGINE, RETURN_42);
    });

    it("fails the empty payload without submitting", async () => {
      await expect(run(["carve", "0x"])).resolves.toBe(EXIT_FAILURE);
      expect(stderr).toEqual(["Deployment failed\n"]);
      expect(client.submitCarve).not.toHaveBeenCalled();
    });

    it("reports an engine revert as a deployment failure", async () => {
      client.submitCarve.mockRejectedValue(new DeploymentFailedError());

      await expect(run(["carve", RETURN_42])).resolves.toBe(EXIT_FAILURE);
      expect(stderr).toEqual(["Deployment failed\n"]);
      expect(stdout).toEqual([]);
    });

    it("needs chain settings without a client override", async () => {
      const code = await runCli(["carve", RETURN_42], {
        config: parseEnv({ CARVE_ENGINE_ADDRESS: ENGINE }),
        logger: makeNoopLogger(),
        io: {
          stdout: (text) => stdout.push(text),
          stderr: (text) => stderr.push(text),
          readText: async () => "",
        },
      });

      expect(code).toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(
        `CARVE_RPC_URL and CARVE_CHAIN_ID are required for chain commands\n\n${USAGE}\n`
      );
    });
  });

  describe("anchor", () => {
    it("predicts the identity through the deterministic deployment proxy", async () => {
      await expect(run(["anchor", "0x6080604052"])).resolves.toBe(EXIT_OK);
      expect(output()).toEqual({
        identity: "0x0E41aa54D633ee06Dc2EE16beEB53478281b096C",
        factory: "0x4e59b44847b379578588920cA78FbF26c0B4956C",
        salt: `0x${"00".repeat(32)}`,
      });
    });

    it("accepts a 32-byte salt", async () => {
      const salt = `0x${"00".repeat(31)}01`;

      await expect(
        run(["anchor", "0x6080604052", "--salt", salt])
      ).resolves.toBe(EXIT_OK);
      expect(output()).toMatchObject({
        identity: "0x05E96fA12b872ff96D73a5a6DDED5010c406712C",
        salt,
      });
    });

    it("rejects a short salt", async () => {
      await expect(
        run(["anchor", "0x6080604052", "--salt", "0x01"])
      ).resolves.toBe(EXIT_USAGE);
      expect(stderr[0]).toBe(
        `--salt must be 32 bytes of 0x-prefixed hex: 0x01\n\n${USAGE}\n`
      );
    });

    it("works without an engine address", async () => {
      await expect(
        run(["anchor", "0x6080604052"], { CARVE_ENGINE_ADDRESS: "" })
      ).resolves.toBe(EXIT_OK);
    });
  });
});
