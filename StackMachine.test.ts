import { Assembler } from "./Assembler";
import {
  DivisionByZeroError,
  StackUnderflowError,
  UnknownOpcodeError,
} from "./errors";
import { createRegistry } from "./opcodes/registry";
import type { Program } from "./opcodes/types";
import type { SMInputOutputDevice, StepSignal, TraceSnapshot } from "./SMInputOutputDevice";
import { StackMachine, TRACE_STACK_LIMIT, formatTraceLine } from "./StackMachine";

class MockDevice implements SMInputOutputDevice {
  print = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  writeLine = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
  trace = jest.fn<Promise<void>, [TraceSnapshot]>().mockResolvedValue(undefined);
  waitForStep = jest.fn<Promise<StepSignal>, []>().mockResolvedValue("continue");
  close = jest.fn<void, []>();
}

const { registry } = createRegistry();

function asm(source: string): Program {
  return new Assembler(registry).assemble(source).program;
}

function machineFor(source: string, device: MockDevice | null = new MockDevice()) {
  const machine = new StackMachine(registry, device);
  machine.load(asm(source));
  return machine;
}

const COUNTDOWN = `
  PUSH 3
loop:
  DUP
  PRINT
  PUSH 1
  SUB
  DUP
  JZ end
  JUMP loop
end:
  HALT
`;

describe("StackMachine", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("execute", () => {
    it("should add two numbers and print the sum", async () => {
      const device = new MockDevice();
      const machine = machineFor("PUSH 5\nPUSH 3\nADD\nPRINT\nHALT", device);

      const result = await machine.execute();

      expect(result).toEqual({
        status: "halted",
        pc: 4,
        output: [8],
        instructions: 5,
        cycles: 9,
      });
      expect(device.print).toHaveBeenCalledWith(8);
      expect(machine.getStack()).toEqual([]);
      expect(machine.isRunning()).toBe(false);
    });

    it("should complete when pc runs past the last instruction", async () => {
      const machine = machineFor("PUSH 1\nPUSH 2");
      const result = await machine.execute();
      expect(result.status).toBe("completed");
      expect(result.pc).toBe(2);
      expect(machine.getStack()).toEqual([1, 2]);
    });

    it("should complete an empty program without executing anything", async () => {
      const machine = machineFor("# nothing here");
      const result = await machine.execute();
      expect(result).toEqual({
        status: "completed",
        pc: 0,
        output: [],
        instructions: 0,
        cycles: 0,
      });
    });

    it("should run a countdown loop through labels", async () => {
      const machine = machineFor(COUNTDOWN);
      const result = await machine.execute();
      expect(result.output).toEqual([3, 2, 1]);
      expect(result.status).toBe("halted");
      expect(result.instructions).toBe(22);
      expect(result.cycles).toBe(39);
      expect(machine.getStack()).toEqual([0]);
    });

    it("should complete when a jump leaves the program", async () => {
      const machine = machineFor("JUMP 100\nHALT");
      const result = await machine.execute();
      expect(result.status).toBe("completed");
      expect(result.pc).toBe(100);
      expect(result.instructions).toBe(1);
    });

    it("should fall through JZ on a nonzero value", async () => {
      const machine = machineFor("PUSH 7\nJZ 3\nPUSH 1\nHALT");
      await machine.execute();
      expect(machine.getStack()).toEqual([1]);
    });

    it("should use floor division", async () => {
      const machine = machineFor("PUSH -7\nPUSH 2\nDIV\nHALT");
      await machine.execute();
      expect(machine.getStack()).toEqual([-4]);
    });

    it("should run extension opcodes through the same dispatch", async () => {
      const machine = machineFor("PUSH 10\nPUSH 3\nMOD\nNEG\nPRINT\nHALT");
      const result = await machine.execute();
      expect(result.output).toEqual([-1]);
      expect(result.cycles).toBe(1 + 1 + 1 + 1 + 5 + 1);
    });

    it("should send extension diagnostics to the device", async () => {
      const device = new MockDevice();
      const machine = machineFor("PUSH 7\nPEEK\nHALT", device);
      await machine.execute();
      expect(device.writeLine).toHaveBeenCalledWith("PEEK: Top item is 7");
      expect(machine.getStack()).toEqual([7]);
    });

    it("should log output to the console without a device", async () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => {});
      const machine = machineFor("PUSH 4\nPRINT", null);
      const result = await machine.execute();
      expect(log).toHaveBeenCalledWith("Output: 4");
      expect(result.output).toEqual([4]);
    });
  });

  describe("errors", () => {
    it("should raise DivisionByZeroError and keep pc on DIV", async () => {
      const machine = machineFor("PUSH 1\nPUSH 0\nDIV\nPRINT");
      await expect(machine.execute()).rejects.toThrow(DivisionByZeroError);
      expect(machine.pc).toBe(2);
      expect(machine.isRunning()).toBe(false);
      expect(machine.getStats().instructions).toBe(3);
    });

    it("should raise StackUnderflowError on an empty stack", async () => {
      const machine = machineFor("PUSH 1\nADD");
      await expect(machine.execute()).rejects.toThrow(StackUnderflowError);
      expect(machine.pc).toBe(1);
    });

    it("should reject an opcode the registry does not know", async () => {
      const machine = new StackMachine(registry);
      machine.load([{ opcode: "ADDD", operand: null }]);
      await expect(machine.execute()).rejects.toThrow(UnknownOpcodeError);
      await expect(machine.execute()).rejects.toThrow(
        "Unknown opcode 'ADDD' (did you mean ADD?)",
      );
      expect(machine.getStats().instructions).toBe(0);
    });

    it("should reject an operand-less PUSH built by hand", async () => {
      const machine = new StackMachine(registry);
      machine.load([{ opcode: "PUSH", operand: null }]);
      await expect(machine.execute()).rejects.toThrow("PUSH at address 0 has no operand");
    });
  });

  describe("trace and step", () => {
    it("should trace a snapshot before each instruction", async () => {
      const device = new MockDevice();
      const machine = machineFor("PUSH 5\nPUSH 3\nADD", device);
      await machine.execute({ trace: true });

      expect(device.trace).toHaveBeenCalledTimes(3);
      expect(device.trace.mock.calls[2][0]).toEqual({
        pc: 2,
        instruction: { opcode: "ADD", operand: null },
        stack: [5, 3],
        depth: 2,
      });
    });

    it("should limit traced stack values", async () => {
      const pushes = Array.from({ length: 12 }, (_, i) => `PUSH ${i}`).join("\n");
      const device = new MockDevice();
      const machine = machineFor(`${pushes}\nHALT`, device);
      await machine.execute({ trace: true });

      const last = device.trace.mock.calls[12][0];
      expect(last.stack).toHaveLength(TRACE_STACK_LIMIT);
      expect(last.stack[0]).toBe(2);
      expect(last.depth).toBe(12);
    });

    it("should trace to the console without a device", async () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => {});
      const machine = machineFor("PUSH 5", null);
      machine.setTrace(true);
      await machine.execute();
      expect(log).toHaveBeenCalledWith(`PC:  0 PUSH 5${" ".repeat(7)}Stack: []`);
    });

    it("should pause before each instruction in step mode", async () => {
      const device = new MockDevice();
      const machine = machineFor("PUSH 1\nPUSH 2\nHALT", device);
      const result = await machine.execute({ step: true });
      expect(device.waitForStep).toHaveBeenCalledTimes(3);
      expect(device.trace).toHaveBeenCalledTimes(3);
      expect(result.status).toBe("halted");
    });

    it("should cancel when the user interrupts a step", async () => {
      const device = new MockDevice();
      device.waitForStep
        .mockResolvedValueOnce("continue")
        .mockResolvedValueOnce("interrupt");
      const machine = machineFor("PUSH 1\nPUSH 2\nHALT", device);

      const result = await machine.execute({ step: true });

      expect(result.status).toBe("cancelled");
      expect(result.instructions).toBe(1);
      expect(result.pc).toBe(1);
    });
  });

  describe("interrupt", () => {
    it("should stop before the next instruction", async () => {
      const device = new MockDevice();
      const machine = machineFor("PUSH 1\nPRINT\nPUSH 2\nPRINT\nHALT", device);
      device.print.mockImplementation(async () => machine.interrupt());

      const result = await machine.execute();

      expect(result.status).toBe("cancelled");
      expect(result.output).toEqual([1]);
      expect(result.pc).toBe(2);
    });

    it("should reach a program that never halts", async () => {
      const machine = machineFor("spin:\nJUMP spin");
      setImmediate(() => machine.interrupt());

      const result = await machine.execute();

      expect(result.status).toBe("cancelled");
      expect(result.instructions).toBe(1024);
    });
  });

  describe("step", () => {
    it("should execute one instruction at a time", async () => {
      const machine = machineFor("PUSH 2\nPUSH 3\nMUL\nHALT");
      expect(await machine.step()).toBe(true);
      expect(machine.getStack()).toEqual([2]);
      expect(await machine.step()).toBe(true);
      expect(await machine.step()).toBe(true);
      expect(machine.getStack()).toEqual([6]);
      expect(await machine.step()).toBe(false);
      expect(await machine.step()).toBe(false);
      expect(machine.getStats()).toEqual({ instructions: 4, cycles: 6 });
    });
  });

  describe("load", () => {
    it("should reset state between programs", async () => {
      const machine = machineFor("PUSH 1\nPRINT\nPUSH 9");
      await machine.execute();
      machine.load(asm("HALT"));

      expect(machine.getStack()).toEqual([]);
      expect(machine.getOutput()).toEqual([]);
      expect(machine.getStats()).toEqual({ instructions: 0, cycles: 0 });
      expect(machine.pc).toBe(0);
    });

    it("should freeze the loaded program", () => {
      const program = [{ opcode: "PUSH", operand: 1 }];
      const machine = new StackMachine(registry);
      machine.load(program);
      program[0].operand = 2;

      expect(machine.getProgram()[0].operand).toBe(1);
      expect(Object.isFrozen(machine.getProgram())).toBe(true);
      expect(Object.isFrozen(machine.getProgram()[0])).toBe(true);
    });
  });
});

describe("formatTraceLine", () => {
  it("should pad pc and instruction into columns", () => {
    expect(
      formatTraceLine({
        pc: 12,
        instruction: { opcode: "JZ", operand: 4 },
        stack: [1, 0],
        depth: 2,
      }),
    ).toBe(`PC: 12 JZ 4${" ".repeat(9)}Stack: [1, 0]`);
  });
});
