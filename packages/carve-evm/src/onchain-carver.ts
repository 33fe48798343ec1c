// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm/onchain-carver`
 * Purpose: Carving operations against an engine contract deployed on an EVM chain, cross-checked locally.
 * Scope: Local preconditions and derivation, remote submission, read-back verification. Does not sign or manage keys.
 * Invariants:
 * - addressOf is the local derivation; it never calls the chain
 * - isCarved reads chain code and re-derives locally; it does not trust the engine's own view
 * - Every carve failure is a DeploymentFailedError; the engine's revert keeps the chain unchanged
 * Side-effects: IO (RPC via EvmCarverClient)
 * Links: packages/carve-core/src/carver.ts, src/evm/evm-carver-client.interface.ts
 * @public
 */

import {
  checkCarvePreconditions,
  DeploymentFailedError,
  deriveHandle,
  type EngineIdentity,
  type HostRules,
  isDeploymentFailedError,
  type LoggerLike,
  NOOP_LOGGER,
  type RuntimeBytecode,
  resolveHostRules,
  toRuntimeHex,
  verifyCarved,
} from "@bytecarve/carve-core";
import {
  type Address,
  type Hex,
  isAddress,
  isAddressEqual,
  size,
} from "viem";

import { ChainCodeReader } from "./evm/chain-code-reader.js";
import type { EvmCarverClient } from "./evm/evm-carver-client.interface.js";

export interface OnchainCarverConfig {
  readonly identity: EngineIdentity;
  readonly client: EvmCarverClient;
  readonly hostRules?: Partial<HostRules>;
  readonly logger?: LoggerLike;
}

export interface OnchainCarveResult {
  readonly handle: Address;
  readonly txHash: Hex;
}

export interface ParityReport {
  readonly local: Address;
  readonly remote: Address;
  readonly match: boolean;
}

export class OnchainCarver {
  readonly identity: EngineIdentity;
  readonly hostRules: HostRules;
  private readonly client: EvmCarverClient;
  private readonly reader: ChainCodeReader;
  private readonly logger: LoggerLike;

  constructor(config: OnchainCarverConfig) {
    this.identity = config.identity;
    this.client = config.client;
    this.reader = new ChainCodeReader(config.client);
    this.hostRules = resolveHostRules(config.hostRules);
    this.logger = config.logger ?? NOOP_LOGGER;
  }

  addressOf(code: RuntimeBytecode): Address {
    return deriveHandle(code, this.identity);
  }

  isCarved(handle: string): Promise<boolean> {
    return verifyCarved(this.reader, this.identity, handle);
  }

  /** The engine contract's own isCarved view; false for non-addresses. */
  async engineReportsCarved(handle: string): Promise<boolean> {
    if (!isAddress(handle, { strict: false })) {
      return false;
    }
    return this.client.readIsCarved(this.identity, handle);
  }

  /**
   * Compare the engine contract's addressOf with the local derivation.
   * A mismatch means the configured identity or the deployed engine is not the expected one.
   */
  async checkParity(code: RuntimeBytecode): Promise<ParityReport> {
    const runtime = toRuntimeHex(code);
    const local = deriveHandle(runtime, this.identity);
    const remote = await this.client.readAddressOf(this.identity, runtime);
    return { local, remote, match: isAddressEqual(local, remote) };
  }

  /**
   * @throws DeploymentFailedError on any precondition, revert, or read-back mismatch
   */
  async carve(code: RuntimeBytecode): Promise<OnchainCarveResult> {
    const checked = checkCarvePreconditions(code, this.hostRules);
    if (!checked.ok) {
      throw this.fail(checked.reason, checked.cause);
    }
    const { runtime, length } = checked;
    const expected = deriveHandle(runtime, this.identity);

    let txHash: Hex;
    try {
      const submission = await this.client.submitCarve(
        this.identity,
        runtime
      );
      if (!isAddressEqual(submission.handle, expected)) {
        throw this.fail("handle_mismatch");
      }
      txHash = submission.txHash;
    } catch (error) {
      if (isDeploymentFailedError(error)) {
        throw error;
      }
      throw this.fail("submission_failed", error);
    }

    const stored = size(await this.reader.readCode(expected));
    if (stored !== length) {
      throw this.fail("size_mismatch");
    }

    this.logger.info({ handle: expected, length, txHash }, "carved onchain");
    return { handle: expected, txHash };
  }

  private fail(reason: string, cause?: unknown): DeploymentFailedError {
    this.logger.debug(
      { reason, engine: this.identity, err: cause },
      "onchain carve failed"
    );
    return new DeploymentFailedError(
      cause === undefined ? undefined : { cause }
    );
  }
}
