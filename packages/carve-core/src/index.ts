// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core`
 * Purpose: Pure carving domain: derivation, bootstrap prefix, orchestrator, verifier, ports.
 * Scope: Re-exports only; does not contain implementation logic.
 * Invariants: No imports from adapters or services. No pino, no RPC.
 * Side-effects: none
 * Links: src/carver.ts
 * @public
 */

// Anchoring
export type { AnchorParams } from "./anchor.js";
export {
  DETERMINISTIC_DEPLOYMENT_PROXY,
  predictAnchoredIdentity,
} from "./anchor.js";
// Bootstrap prefix
export {
  BOOTSTRAP_PREFIX,
  BOOTSTRAP_PREFIX_LENGTH,
  composeInitCode,
} from "./bootstrap-prefix.js";
// Orchestrator
export type { CarverConfig } from "./carver.js";
export { Carver } from "./carver.js";
// Derivation
export type { Create2Params } from "./derivation.js";
export {
  CARVE_SALT,
  computeCreate2Address,
  deriveHandle,
  initCodeHash,
  toRuntimeHex,
} from "./derivation.js";
// Errors
export {
  DeploymentFailedError,
  isDeploymentFailedError,
} from "./errors.js";
export { EVM_HOST_RULES, resolveHostRules } from "./host-rules.js";
export type { LoggerLike } from "./logger.js";
export { NOOP_LOGGER } from "./logger.js";
// Ports
export type {
  CodeReader,
  PlacementLedger,
  PlacementRequest,
  PlacementScope,
} from "./ports/index.js";
export type {
  CarveRejection,
  PreconditionResult,
} from "./preconditions.js";
export { checkCarvePreconditions } from "./preconditions.js";
// Types
export type {
  Address,
  ByteArray,
  EngineIdentity,
  Hex,
  HostRules,
  RuntimeBytecode,
} from "./types.js";
export { toEngineIdentity } from "./types.js";
// Verifier
export { verifyCarved } from "./verify.js";
