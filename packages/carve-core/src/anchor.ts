// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/anchor`
 * Purpose: Predict the engine's own identity when it is placed through a deterministic-deployment factory.
 * Scope: Pure address prediction. Does not deploy the engine or contact a chain.
 * Invariants: Same factory, salt and engine init code -> same identity on every chain that hosts the factory.
 * Side-effects: none
 * Links: src/derivation.ts
 * @public
 */

import type { Hex } from "viem";

import { CARVE_SALT, computeCreate2Address } from "./derivation.js";
import { type EngineIdentity, toEngineIdentity } from "./types.js";

/** Keyless CREATE2 proxy deployed at the same address on most EVM chains. */
export const DETERMINISTIC_DEPLOYMENT_PROXY =
  "0x4e59b44847b379578588920cA78FbF26c0B4956C" as const;

export interface AnchorParams {
  /** Engine creation code, constructor arguments included */
  readonly initCode: Hex;
  /** Defaults to DETERMINISTIC_DEPLOYMENT_PROXY */
  readonly factory?: string;
  /** Defaults to 32 zero bytes */
  readonly salt?: Hex;
}

export function predictAnchoredIdentity(params: AnchorParams): EngineIdentity {
  const factory = toEngineIdentity(
    params.factory ?? DETERMINISTIC_DEPLOYMENT_PROXY
  );
  return toEngineIdentity(
    computeCreate2Address({
      deployer: factory,
      salt: params.salt ?? CARVE_SALT,
      initCode: params.initCode,
    })
  );
}
