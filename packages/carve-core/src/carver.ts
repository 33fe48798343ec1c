// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/carver`
 * Purpose: Deployment orchestrator: validates runtime bytecode, commits it through the placement ledger, and checks the outcome against the derivation.
 * Scope: Stateless engine bound to one identity. Does not store artifacts, retry, or queue.
 * Invariants:
 * - CARVE_ATOMIC: placement and post-commit checks run in one ledger transaction; any failure leaves the ledger unchanged
 * - SINGLE_FAILURE_KIND: every carve failure is a DeploymentFailedError
 * - PREDICTION_MATCHES: a successful carve returns exactly addressOf(code)
 * - CREATE_ONCE: a repeat carve of identical bytes fails at the ledger (designed duplicate prevention)
 * Side-effects: IO (through the injected PlacementLedger)
 * Links: src/derivation.ts, src/verify.ts, src/ports/placement-ledger.port.ts
 * @public
 */

import { type Address, isAddressEqual, zeroAddress } from "viem";

import { composeInitCode } from "./bootstrap-prefix.js";
import { CARVE_SALT, deriveHandle } from "./derivation.js";
import { DeploymentFailedError, isDeploymentFailedError } from "./errors.js";
import { resolveHostRules } from "./host-rules.js";
import { type LoggerLike, NOOP_LOGGER } from "./logger.js";
import type { PlacementLedger } from "./ports/placement-ledger.port.js";
import { checkCarvePreconditions } from "./preconditions.js";
import type { EngineIdentity, HostRules, RuntimeBytecode } from "./types.js";
import { verifyCarved } from "./verify.js";

export interface CarverConfig {
  readonly identity: EngineIdentity;
  readonly ledger: PlacementLedger;
  /** Defaults to EVM_HOST_RULES */
  readonly hostRules?: Partial<HostRules>;
  readonly logger?: LoggerLike;
}

export class Carver {
  readonly identity: EngineIdentity;
  readonly hostRules: HostRules;
  private readonly ledger: PlacementLedger;
  private readonly logger: LoggerLike;

  constructor(config: CarverConfig) {
    this.identity = config.identity;
    this.ledger = config.ledger;
    this.hostRules = resolveHostRules(config.hostRules);
    this.logger = config.logger ?? NOOP_LOGGER;
  }

  /** Handle `code` is (or would be) carved at. Pure; defined for empty input. */
  addressOf(code: RuntimeBytecode): Address {
    return deriveHandle(code, this.identity);
  }

  /** True iff the code stored at `handle` re-derives to `handle` under this engine. */
  isCarved(handle: string): Promise<boolean> {
    return verifyCarved(this.ledger, this.identity, handle);
  }

  /**
   * Store `code` permanently at its derived handle.
   * @throws DeploymentFailedError on any precondition, collision or post-commit failure
   */
  async carve(code: RuntimeBytecode): Promise<Address> {
    const checked = checkCarvePreconditions(code, this.hostRules);
    if (!checked.ok) {
      throw this.fail(checked.reason, checked.cause);
    }
    const { runtime, length } = checked;

    const initCode = composeInitCode(runtime);
    const expected = deriveHandle(runtime, this.identity);

    try {
      const handle = await this.ledger.transaction(async (scope) => {
        const placed = await scope.place({
          deployer: this.identity,
          salt: CARVE_SALT,
          initCode,
        });
        // Throwing here rolls the placement back
        if (isAddressEqual(placed, zeroAddress)) {
          throw this.fail("zero_handle");
        }
        if (!isAddressEqual(placed, expected)) {
          throw this.fail("handle_mismatch");
        }
        const stored = await scope.sizeOf(placed);
        if (stored === 0 || stored !== length) {
          throw this.fail("size_mismatch");
        }
        return expected;
      });
      this.logger.info({ handle, length }, "carved");
      return handle;
    } catch (error) {
      if (isDeploymentFailedError(error)) {
        throw error;
      }
      throw this.fail("placement_rejected", error);
    }
  }

  private fail(reason: string, cause?: unknown): DeploymentFailedError {
    this.logger.debug(
      { reason, engine: this.identity, err: cause },
      "carve failed"
    );
    return new DeploymentFailedError(
      cause === undefined ? undefined : { cause }
    );
  }
}
