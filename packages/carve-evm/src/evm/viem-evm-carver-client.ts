// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-evm/evm/viem-evm-carver-client`
 * Purpose: Production EvmCarverClient using viem for RPC reads and engine transactions.
 * Scope: Implements EvmCarverClient with real RPC calls. Does not implement derivation or validation.
 * Invariants:
 * - Verifies the RPC's chain id against the configured one before the first call
 * - Engine reverts surface as DeploymentFailedError; other RPC failures propagate unchanged
 * - submitCarve requires a signing account
 * Side-effects: IO (RPC calls to EVM node)
 * Links: src/evm/evm-carver-client.interface.ts, src/evm/abi.ts
 * @public
 */

import { DeploymentFailedError } from "@bytecarve/carve-core";
import {
  type Account,
  type Address,
  BaseError,
  type Chain,
  ContractFunctionRevertedError,
  createPublicClient,
  createWalletClient,
  defineChain,
  type Hex,
  http,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";

import { CARVER_ABI } from "./abi.js";
import type {
  CarveSubmission,
  EvmCarverClient,
} from "./evm-carver-client.interface.js";

export interface ViemEvmCarverClientConfig {
  readonly rpcUrl: string;
  readonly chainId: number;
  /** Signer for submitCarve; reads work without one */
  readonly account?: Account;
}

/**
 * Lazily connects on first call so construction never touches the network.
 */
export class ViemEvmCarverClient implements EvmCarverClient {
  private readonly chain: Chain;
  private client: PublicClient<Transport, Chain> | null = null;
  private chainVerified = false;

  constructor(private readonly config: ViemEvmCarverClientConfig) {
    this.chain = defineChain({
      id: config.chainId,
      name: `chain-${config.chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [config.rpcUrl] } },
    });
  }

  private async getClient(): Promise<PublicClient<Transport, Chain>> {
    if (!this.client) {
      this.client = createPublicClient({
        chain: this.chain,
        transport: http(this.config.rpcUrl),
      });
    }
    if (!this.chainVerified) {
      const remote = await this.client.getChainId();
      if (remote !== this.config.chainId) {
        throw new Error(
          `[ViemEvmCarverClient] Chain mismatch: configured ${this.config.chainId}, RPC reports ${remote}`
        );
      }
      this.chainVerified = true;
    }
    return this.client;
  }

  private getWalletClient(): WalletClient<Transport, Chain, Account> {
    if (!this.config.account) {
      throw new Error(
        "[ViemEvmCarverClient] A signing account is required to submit carve transactions."
      );
    }
    return createWalletClient({
      account: this.config.account,
      chain: this.chain,
      transport: http(this.config.rpcUrl),
    });
  }

  async getCode(address: Address): Promise<Hex> {
    const client = await this.getClient();
    const code = await client.getCode({ address });
    return code ?? "0x";
  }

  async readAddressOf(engine: Address, code: Hex): Promise<Address> {
    const client = await this.getClient();
    return client.readContract({
      address: engine,
      abi: CARVER_ABI,
      functionName: "addressOf",
      args: [code],
    });
  }

  async readIsCarved(engine: Address, handle: Address): Promise<boolean> {
    const client = await this.getClient();
    return client.readContract({
      address: engine,
      abi: CARVER_ABI,
      functionName: "isCarved",
      args: [handle],
    });
  }

  async submitCarve(engine: Address, code: Hex): Promise<CarveSubmission> {
    const wallet = this.getWalletClient();
    const client = await this.getClient();

    let handle: Address;
    try {
      const simulation = await client.simulateContract({
        account: wallet.account,
        address: engine,
        abi: CARVER_ABI,
        functionName: "carve",
        args: [code],
      });
      handle = simulation.result;
    } catch (error) {
      if (isDeploymentFailedRevert(error)) {
        throw new DeploymentFailedError({ cause: error });
      }
      throw error;
    }

    const txHash = await wallet.writeContract({
      address: engine,
      abi: CARVER_ABI,
      functionName: "carve",
      args: [code],
    });
    const receipt = await client.waitForTransactionReceipt({ hash: txHash });
    if (receipt.status !== "success") {
      // Lost a race with an identical carve mined between simulation and inclusion
      throw new DeploymentFailedError({
        cause: new Error(`Transaction ${txHash} reverted`),
      });
    }
    return { handle, txHash };
  }
}

/** True when a viem error chain contains the engine's DeploymentFailed() revert. */
export function isDeploymentFailedRevert(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    return false;
  }
  const revert = error.walk(
    (inner) => inner instanceof ContractFunctionRevertedError
  );
  return (
    revert instanceof ContractFunctionRevertedError &&
    revert.data?.errorName === "DeploymentFailed"
  );
}
