import type { Instruction } from "./opcodes/types";

type StepSignal = "continue" | "interrupt";

// Read-only view of the machine taken before each instruction in trace mode
interface TraceSnapshot {
  pc: number;
  instruction: Instruction;
  stack: number[]; // top of stack last
  depth: number;
}

interface SMInputOutputDevice {
  print(value: number): Promise<void>; // PRINT output event
  writeLine(line: string): Promise<void>; // diagnostics from extensions
  trace?(snapshot: TraceSnapshot): Promise<void>;
  // Cooperative pause for step mode; resolves once the user continues or interrupts
  waitForStep?(): Promise<StepSignal>;
  close(): void;
}

export type { SMInputOutputDevice, StepSignal, TraceSnapshot };
