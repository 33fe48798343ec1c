// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-cli/bootstrap/container`
 * Purpose: Composition root. Wires env config to the engine identity, host rules and the EVM carver.
 * Scope: All adapter construction lives here. Commands depend on the container interface only.
 * Invariants:
 * - Only file that constructs ViemEvmCarverClient
 * - Chain access is built lazily; offline commands never need CARVE_RPC_URL
 * Side-effects: none at construction (RPC clients connect on first use)
 * Links: src/bootstrap/env.ts, src/commands/index.ts
 * @internal
 */

import {
  type EngineIdentity,
  type HostRules,
  resolveHostRules,
  toEngineIdentity,
} from "@bytecarve/carve-core";
import {
  type EvmCarverClient,
  OnchainCarver,
  ViemEvmCarverClient,
} from "@bytecarve/carve-evm";
import { isHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { UsageError } from "../errors.js";
import type { Logger } from "../observability/logger.js";
import type { Env } from "./env.js";

export interface CarveContainer {
  readonly logger: Logger;
  readonly hostRules: HostRules;
  /** @throws UsageError when CARVE_ENGINE_ADDRESS is unset */
  engine(): EngineIdentity;
  /** @throws UsageError when chain settings are missing */
  onchain(): OnchainCarver;
}

export interface ContainerOverrides {
  /** Replaces the viem client (tests) */
  readonly client?: EvmCarverClient;
}

export function createCarveContainer(
  config: Env,
  logger: Logger,
  overrides: ContainerOverrides = {}
): CarveContainer {
  const hostRules = resolveHostRules({
    maxCodeSize: config.CARVE_MAX_CODE_SIZE,
    forbiddenFirstByte: config.CARVE_FORBIDDEN_FIRST_BYTE,
  });

  const engine = (): EngineIdentity => {
    if (!config.CARVE_ENGINE_ADDRESS) {
      throw new UsageError(
        "CARVE_ENGINE_ADDRESS is required for this command"
      );
    }
    return toEngineIdentity(config.CARVE_ENGINE_ADDRESS);
  };

  const client = (): EvmCarverClient => {
    if (overrides.client) {
      return overrides.client;
    }
    if (!config.CARVE_RPC_URL || config.CARVE_CHAIN_ID === undefined) {
      throw new UsageError(
        "CARVE_RPC_URL and CARVE_CHAIN_ID are required for chain commands"
      );
    }
    const key = config.CARVE_PRIVATE_KEY;
    return new ViemEvmCarverClient({
      rpcUrl: config.CARVE_RPC_URL,
      chainId: config.CARVE_CHAIN_ID,
      account: key && isHex(key) ? privateKeyToAccount(key) : undefined,
    });
  };

  let onchain: OnchainCarver | null = null;

  return {
    logger,
    hostRules,
    engine,
    onchain: () => {
      if (!onchain) {
        onchain = new OnchainCarver({
          identity: engine(),
          client: client(),
          hostRules,
          logger: logger.child({ component: "onchain-carver" }),
        });
      }
      return onchain;
    },
  };
}
