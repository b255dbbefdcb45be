/**
 * Common test utilities for opcode testing
 */

import { Stack } from "../Stack";
import type { ExecCtx, MachineContext } from "./types";

export class MockVM implements MachineContext {
  public stack = new Stack();

  constructor(values: number[] = [], public pc = 0) {
    values.forEach((v) => this.stack.push(v));
  }

  values(): number[] {
    return this.stack.toArray();
  }
}

export interface MockCtx extends ExecCtx {
  jump: jest.Mock<void, [number]>;
  halt: jest.Mock<void, []>;
  output: jest.Mock<Promise<void>, [number]>;
  write: jest.Mock<Promise<void>, [string]>;
}

export function mockCtx(): MockCtx {
  return {
    jump: jest.fn<void, [number]>(),
    halt: jest.fn<void, []>(),
    output: jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined),
    write: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
  };
}
