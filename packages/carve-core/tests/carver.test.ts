// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/carve-core/tests/carver`
 * Purpose: Unit tests for the Carver orchestrator against a scriptable ledger.
 * Scope: Covers success, every failure path, rollback and verification. Does not execute init code.
 * Invariants: Every failure is a DeploymentFailedError and leaves the ledger unchanged.
 * Side-effects: none
 * Links: src/carver.ts, tests/_fakes/fake-placement-ledger.ts
 * @internal
 */

import { hexToBytes, zeroAddress } from "viem";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { Carver } from "../src/carver.js";
import { CARVE_SALT } from "../src/derivation.js";
import {
  DeploymentFailedError,
  isDeploymentFailedError,
} from "../src/errors.js";
import { FakePlacementLedger } from "./_fakes/fake-placement-ledger.js";
import {
  COUNTING_32,
  ENGINE,
  HANDLES,
  OTHER_ENGINE,
  RETURN_42,
} from "./fixtures.js";

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe("Carver", () => {
  let ledger: FakePlacementLedger;
  let logger: ReturnType<typeof createMockLogger>;
  let carver: Carver;

  beforeEach(() => {
    ledger = new FakePlacementLedger();
    logger = createMockLogger();
    carver = new Carver({ identity: ENGINE, ledger, logger });
  });

  describe("addressOf", () => {
    it("returns the derived handle without touching the ledger", () => {
      expect(carver.addressOf(RETURN_42)).toBe(HANDLES.return42);
      expect(carver.addressOf("0x")).toBe(HANDLES.empty);
      expect(ledger.transactions).toBe(0);
    });
  });

  describe("carve", () => {
    it("stores the bytes at the predicted handle", async () => {
      const handle = await carver.carve(RETURN_42);

      expect(handle).toBe(HANDLES.return42);
      expect(await ledger.readCode(handle)).toBe(RETURN_42);
      expect(ledger.requests).toEqual([
        {
          deployer: ENGINE,
          salt: CARVE_SALT,
          initCode: "0x600b5981380380925939f3602a60005260206000f3",
        },
      ]);
      expect(logger.info).toHaveBeenCalledWith(
        { handle: HANDLES.return42, length: 10 },
        "carved"
      );
    });

    it("accepts byte arrays", async () => {
      await expect(carver.carve(hexToBytes(COUNTING_32))).resolves.toBe(
        HANDLES.counting32
      );
    });

    it("fails on empty input before opening a transaction", async () => {
      await expect(carver.carve("0x")).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(ledger.transactions).toBe(0);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "empty", engine: ENGINE }),
        "carve failed"
      );
    });

    it("fails on the forbidden first byte", async () => {
      await expect(carver.carve("0xef00")).rejects.toThrow("Deployment failed");
      expect(ledger.transactions).toBe(0);
    });

    it("fails on oversize input under custom host rules", async () => {
      const strict = new Carver({
        identity: ENGINE,
        ledger,
        hostRules: { maxCodeSize: 4 },
      });
      await expect(strict.carve("0x0102030405")).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      await expect(strict.carve("0x01020304")).resolves.toBe(
        HANDLES.fourBytes
      );
    });

    it("wraps malformed hex with its cause", async () => {
      const error = await carver.carve("0x123").catch((e: unknown) => e);
      expect(isDeploymentFailedError(error)).toBe(true);
      expect(error).toMatchObject({
        code: "DEPLOYMENT_FAILED",
        cause: expect.any(Error),
      });
    });

    it("refuses a second carve of identical bytes and keeps the first", async () => {
      await carver.carve(RETURN_42);

      await expect(carver.carve(RETURN_42)).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(await ledger.readCode(HANDLES.return42)).toBe(RETURN_42);
      expect(ledger.committed.size).toBe(1);
    });

    it("lets another engine carve the same bytes at its own handle", async () => {
      await carver.carve(RETURN_42);
      const other = new Carver({ identity: OTHER_ENGINE, ledger });

      await expect(other.carve(RETURN_42)).resolves.toBe(
        HANDLES.return42OtherEngine
      );
    });

    it("rolls back when the ledger reports an unexpected handle", async () => {
      ledger.behaviour = { placedAt: HANDLES.counting32 };

      await expect(carver.carve(RETURN_42)).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(ledger.rollbacks).toBe(1);
      expect(ledger.committed.size).toBe(0);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "handle_mismatch" }),
        "carve failed"
      );
    });

    it("rolls back when the ledger reports the zero address", async () => {
      ledger.behaviour = { placedAt: zeroAddress };

      await expect(carver.carve(RETURN_42)).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(ledger.committed.size).toBe(0);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "zero_handle" }),
        "carve failed"
      );
    });

    it("rolls back when the stored size differs from the input", async () => {
      ledger.behaviour = { storedCode: "0x602a" };

      await expect(carver.carve(RETURN_42)).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(ledger.rollbacks).toBe(1);
      expect(await ledger.sizeOf(HANDLES.return42)).toBe(0);
    });

    it("rolls back when nothing was stored", async () => {
      ledger.behaviour = { storedCode: "0x" };

      await expect(carver.carve(RETURN_42)).rejects.toBeInstanceOf(
        DeploymentFailedError
      );
      expect(ledger.committed.size).toBe(0);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "size_mismatch" }),
        "carve failed"
      );
    });

    it("converts ledger errors into DeploymentFailedError", async () => {
      const refusal = new Error("host refused");
      ledger.behaviour = { placeError: refusal };

      const error = await carver.carve(RETURN_42).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DeploymentFailedError);
      expect(error).toMatchObject({ cause: refusal });
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "placement_rejected", err: refusal }),
        "carve failed"
      );
    });
  });

  describe("isCarved", () => {
    it("is true for carved handles", async () => {
      const handle = await carver.carve(COUNTING_32);
      await expect(carver.isCarved(handle)).resolves.toBe(true);
      await expect(carver.isCarved(handle.toLowerCase())).resolves.toBe(true);
    });

    it("is false for the same bytes under another engine", async () => {
      const handle = await carver.carve(COUNTING_32);
      const other = new Carver({ identity: OTHER_ENGINE, ledger });
      await expect(other.isCarved(handle)).resolves.toBe(false);
    });

    it("is false for unoccupied handles other than the empty-code handle", async () => {
      await expect(carver.isCarved(HANDLES.return42)).resolves.toBe(false);
    });

    it("treats the empty-code handle as carved when nothing is stored there", async () => {
      await expect(carver.isCarved(HANDLES.empty)).resolves.toBe(true);
    });

    it("is false for input that is not an address", async () => {
      await expect(carver.isCarved("not-an-address")).resolves.toBe(false);
      await expect(carver.isCarved("0x1234")).resolves.toBe(false);
    });
  });
});
