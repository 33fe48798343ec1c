// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/host-sim/memory-ledger`
 * Purpose: In-process PlacementLedger modelling CREATE2 placement: create-once handles, executed init code, host rules, atomic transactions.
 * Scope: Owns every artifact it stores. Does not model balances, nonces of EOAs, gas, or destruction.
 * Invariants:
 * - CREATE_ONCE: a handle is occupied once anything (even empty code) was placed or etched there; later placements are refused
 * - ATOMIC_SCOPE: placements made inside a transaction become visible to ledger reads only if its work resolves
 * - SERIALIZED: transactions run one at a time in submission order; concurrent placements of the same handle have exactly one winner
 * - Refusals never mutate state
 * Side-effects: none (in-memory only)
 * Links: packages/carve-core/src/ports/placement-ledger.port.ts, src/init-code.ts
 * @public
 */

import {
  type Address,
  computeCreate2Address,
  type HostRules,
  type PlacementLedger,
  type PlacementRequest,
  type PlacementScope,
  type RuntimeBytecode,
  resolveHostRules,
  toRuntimeHex,
} from "@bytecarve/carve-core";
import { bytesToHex, type Hex, hexToBytes, size } from "viem";

import { HostRuleViolationError, PlacementCollisionError } from "./errors.js";
import { executeInitCode } from "./init-code.js";

export interface InMemoryPlacementLedgerOptions {
  /** Defaults to EVM_HOST_RULES */
  readonly hostRules?: Partial<HostRules>;
}

type Accounts = Map<string, Hex>;

function keyOf(handle: string): string {
  return handle.toLowerCase();
}

export class InMemoryPlacementLedger implements PlacementLedger {
  private readonly accounts: Accounts = new Map();
  private readonly hostRules: HostRules;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: InMemoryPlacementLedgerOptions = {}) {
    this.hostRules = resolveHostRules(options.hostRules);
  }

  sizeOf(handle: Address): Promise<number> {
    return Promise.resolve(size(this.lookup(handle)));
  }

  readCode(handle: Address): Promise<Hex> {
    return Promise.resolve(this.lookup(handle));
  }

  isOccupied(handle: Address): boolean {
    return this.accounts.has(keyOf(handle));
  }

  /**
   * Store bytes at an arbitrary handle, bypassing CREATE2 and host rules.
   * Models artifacts placed by some other mechanism.
   */
  etch(handle: Address, code: RuntimeBytecode): void {
    this.accounts.set(keyOf(handle), toRuntimeHex(code));
  }

  transaction<T>(work: (scope: PlacementScope) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(work));
    // Queue continues after a failure; the caller still observes it via `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runIsolated<T>(
    work: (scope: PlacementScope) => Promise<T>
  ): Promise<T> {
    const staged: Accounts = new Map();
    const scope: PlacementScope = {
      place: async (request) => this.place(request, staged),
      sizeOf: async (handle) => size(this.lookup(handle, staged)),
      readCode: async (handle) => this.lookup(handle, staged),
    };

    const result = await work(scope);
    for (const [key, code] of staged) {
      this.accounts.set(key, code);
    }
    return result;
  }

  private place(request: PlacementRequest, staged: Accounts): Address {
    const handle = computeCreate2Address(request);
    const key = keyOf(handle);
    if (this.accounts.has(key) || staged.has(key)) {
      throw new PlacementCollisionError(handle);
    }

    const code = bytesToHex(executeInitCode(hexToBytes(request.initCode)));
    const length = size(code);
    if (
      length > 0 &&
      hexToBytes(code)[0] === this.hostRules.forbiddenFirstByte
    ) {
      throw new HostRuleViolationError(
        "forbidden_first_byte",
        `code starts with 0x${this.hostRules.forbiddenFirstByte.toString(16)}`
      );
    }
    if (length > this.hostRules.maxCodeSize) {
      throw new HostRuleViolationError(
        "max_code_size",
        `${length} bytes exceeds ${this.hostRules.maxCodeSize}`
      );
    }

    staged.set(key, code);
    return handle;
  }

  private lookup(handle: string, staged?: Accounts): Hex {
    const key = keyOf(handle);
    return staged?.get(key) ?? this.accounts.get(key) ?? "0x";
  }
}
