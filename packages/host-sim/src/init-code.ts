// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bytecarve/host-sim/init-code`
 * Purpose: Minimal init-code interpreter: runs creation code and yields the bytes it returns for storage.
 * Scope: Straight-line stack/memory opcodes only (no jumps, storage, calls, or value transfer). Does not meter gas.
 * Invariants:
 * - Terminates: pc strictly increases and there is no jump opcode
 * - Memory grows in 32-byte words; MSIZE reports the grown size
 * - Unsupported opcodes, stack faults and REVERT throw InitCodeExecutionError
 * - Running past the end of code is an implicit STOP (empty output)
 * Side-effects: none
 * Links: packages/carve-core/src/bootstrap-prefix.ts
 * @public
 */

import { InitCodeExecutionError } from "./errors.js";

const WORD = 32;
const STACK_LIMIT = 1024;
const MEMORY_LIMIT = 1 << 20;
const UINT256_MOD = 1n << 256n;

const OP = {
  STOP: 0x00,
  ADD: 0x01,
  SUB: 0x03,
  CODESIZE: 0x38,
  CODECOPY: 0x39,
  MSTORE: 0x52,
  MSIZE: 0x59,
  PUSH1: 0x60,
  PUSH32: 0x7f,
  DUP1: 0x80,
  DUP16: 0x8f,
  SWAP1: 0x90,
  SWAP16: 0x9f,
  RETURN: 0xf3,
  REVERT: 0xfd,
} as const;

class Machine {
  private pc = 0;
  private readonly stack: bigint[] = [];
  private memory = new Uint8Array(0);

  constructor(private readonly code: Uint8Array) {}

  run(): Uint8Array {
    while (this.pc < this.code.length) {
      const op = this.byteAt(this.pc);

      if (op >= OP.PUSH1 && op <= OP.PUSH32) {
        const width = op - OP.PUSH1 + 1;
        let value = 0n;
        for (let i = 1; i <= width; i++) {
          value = (value << 8n) | BigInt(this.byteAt(this.pc + i));
        }
        this.push(value);
        this.pc += width + 1;
        continue;
      }

      if (op >= OP.DUP1 && op <= OP.DUP16) {
        this.push(this.peek(op - OP.DUP1));
        this.pc++;
        continue;
      }

      if (op >= OP.SWAP1 && op <= OP.SWAP16) {
        this.swap(op - OP.SWAP1 + 1);
        this.pc++;
        continue;
      }

      switch (op) {
        case OP.STOP:
          return new Uint8Array(0);
        case OP.ADD: {
          const a = this.pop();
          const b = this.pop();
          this.push((a + b) % UINT256_MOD);
          break;
        }
        case OP.SUB: {
          const a = this.pop();
          const b = this.pop();
          this.push((((a - b) % UINT256_MOD) + UINT256_MOD) % UINT256_MOD);
          break;
        }
        case OP.CODESIZE:
          this.push(BigInt(this.code.length));
          break;
        case OP.CODECOPY: {
          const dest = this.toOffset(this.pop());
          const offset = this.pop();
          const length = this.toOffset(this.pop());
          this.expand(dest, length);
          for (let i = 0; i < length; i++) {
            const src = offset + BigInt(i);
            this.memory[dest + i] =
              src < BigInt(this.code.length) ? this.byteAt(Number(src)) : 0;
          }
          break;
        }
        case OP.MSTORE: {
          const dest = this.toOffset(this.pop());
          let value = this.pop();
          this.expand(dest, WORD);
          for (let i = WORD - 1; i >= 0; i--) {
            this.memory[dest + i] = Number(value & 0xffn);
            value >>= 8n;
          }
          break;
        }
        case OP.MSIZE:
          this.push(BigInt(this.memory.length));
          break;
        case OP.RETURN: {
          const offset = this.toOffset(this.pop());
          const length = this.toOffset(this.pop());
          this.expand(offset, length);
          return this.memory.slice(offset, offset + length);
        }
        case OP.REVERT:
          throw new InitCodeExecutionError("reverted", this.pc);
        default:
          throw new InitCodeExecutionError(
            `unsupported opcode 0x${op.toString(16).padStart(2, "0")}`,
            this.pc
          );
      }
      this.pc++;
    }
    return new Uint8Array(0);
  }

  /** Code bytes past the end read as zero. */
  private byteAt(index: number): number {
    return this.code[index] ?? 0;
  }

  private push(value: bigint): void {
    if (this.stack.length >= STACK_LIMIT) {
      throw new InitCodeExecutionError("stack overflow", this.pc);
    }
    this.stack.push(value);
  }

  private pop(): bigint {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new InitCodeExecutionError("stack underflow", this.pc);
    }
    return value;
  }

  /** depth 0 is the top of the stack */
  private peek(depth: number): bigint {
    const value = this.stack[this.stack.length - 1 - depth];
    if (value === undefined) {
      throw new InitCodeExecutionError("stack underflow", this.pc);
    }
    return value;
  }

  private swap(depth: number): void {
    const top = this.peek(0);
    const other = this.peek(depth);
    this.stack[this.stack.length - 1] = other;
    this.stack[this.stack.length - 1 - depth] = top;
  }

  private toOffset(value: bigint): number {
    if (value > BigInt(MEMORY_LIMIT)) {
      throw new InitCodeExecutionError("memory limit exceeded", this.pc);
    }
    return Number(value);
  }

  private expand(offset: number, length: number): void {
    if (length === 0) return;
    const end = offset + length;
    if (end > MEMORY_LIMIT) {
      throw new InitCodeExecutionError("memory limit exceeded", this.pc);
    }
    if (end <= this.memory.length) return;
    const grown = new Uint8Array(Math.ceil(end / WORD) * WORD);
    grown.set(this.memory);
    this.memory = grown;
  }
}

/**
 * Execute creation code and return the bytes it hands back for storage.
 * @throws InitCodeExecutionError on revert, unsupported opcode, or stack/memory fault
 */
export function executeInitCode(initCode: Uint8Array): Uint8Array {
  return new Machine(initCode).run();
}
