import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { Stack } from "./Stack";
import type { SMInputOutputDevice, TraceSnapshot } from "./SMInputOutputDevice";
import type { OpcodeRegistry } from "./opcodes/registry";
import {
  ExecCtx,
  Instruction,
  MachineContext,
  Program,
  formatInstruction,
} from "./opcodes/types";

export const TRACE_STACK_LIMIT = 10; // max stack items in a trace snapshot
export const YIELD_INTERVAL = 1024; // instructions between event-loop turns

export type MachineState = "idle" | "running";
export type RunStatus = "halted" | "completed" | "cancelled";

export interface ExecuteOptions {
  trace?: boolean;
  step?: boolean; // implies trace
}

export interface ExecutionStats {
  instructions: number;
  cycles: number;
}

export interface RunResult extends ExecutionStats {
  status: RunStatus;
  pc: number;
  output: number[];
}

/**
 * Fetch-decode-execute loop over a loaded program. Every opcode, base or
 * extension, is dispatched through the registry; the stack is the only
 * addressable storage.
 */
class StackMachine implements MachineContext {
  readonly stack = new Stack();
  private program: Program = [];
  private _pc: number = 0; // address of the next instruction to fetch
  private running: boolean = false;
  private halted: boolean = false;
  private interruptRequested: boolean = false;
  private instructionCount: number = 0;
  private cycleCount: number = 0;
  private output: number[] = [];
  private trace: boolean = false;
  private stepMode: boolean = false;

  constructor(
    private registry: OpcodeRegistry,
    private inputOutputDevice: SMInputOutputDevice | null = null,
  ) {}

  get pc(): number {
    return this._pc;
  }

  /**
   * Loads a program and resets all machine state. The program is copied
   * and frozen; it cannot change while it runs.
   */
  load(program: Program): void {
    this.program = Object.freeze(
      program.map((instr) => Object.freeze({ ...instr })),
    );
    this._pc = 0;
    this.running = false;
    this.halted = false;
    this.interruptRequested = false;
    this.instructionCount = 0;
    this.cycleCount = 0;
    this.output = [];
    this.stack.clear();
  }

  getProgram(): Program {
    return this.program;
  }

  getState(): MachineState {
    return this.running ? "running" : "idle";
  }

  isRunning(): boolean {
    return this.running;
  }

  getStack(): number[] {
    return this.stack.toArray();
  }

  getStats(): ExecutionStats {
    return {
      instructions: this.instructionCount,
      cycles: this.cycleCount,
    };
  }

  getOutput(): number[] {
    return [...this.output];
  }

  setTrace(enabled: boolean) {
    this.trace = enabled;
  }

  setStep(enabled: boolean) {
    this.stepMode = enabled;
  }

  /**
   * Asks a running program to stop. Honored before the next instruction is
   * fetched, never in the middle of one.
   */
  interrupt(): void {
    this.interruptRequested = true;
  }

  /**
   * Runs until HALT, until pc leaves the program, or until interrupted.
   * Errors raised by an instruction propagate with pc left on that
   * instruction.
   */
  async execute(options: ExecuteOptions = {}): Promise<RunResult> {
    if (options.trace !== undefined) this.setTrace(options.trace);
    if (options.step !== undefined) this.setStep(options.step);

    this.running = true;
    this.halted = false;
    let status: RunStatus = "completed";

    while (this.running) {
      if (this.interruptRequested) {
        this.interruptRequested = false;
        this.running = false;
        status = "cancelled";
        break;
      }
      if (!this.inBounds()) {
        this.running = false;
        break;
      }

      if (this.trace || this.stepMode) {
        await this.emitTrace();
        if (this.stepMode && (await this.waitForStep()) === "interrupt") {
          this.running = false;
          status = "cancelled";
          break;
        }
      }

      await this.executeCurrent();
      if (this.halted) {
        status = "halted";
      } else if (this.instructionCount % YIELD_INTERVAL === 0) {
        // Lets signal handlers call interrupt() during long loops
        await yieldToEventLoop();
      }
    }

    return { status, pc: this._pc, output: this.getOutput(), ...this.getStats() };
  }

  /**
   * Executes exactly one instruction. Returns false once the machine has
   * halted or pc has left the program.
   */
  async step(): Promise<boolean> {
    if (this.halted || !this.inBounds()) return false;
    this.running = true;
    await this.executeCurrent();
    this.running = false;
    return !this.halted && this.inBounds();
  }

  snapshot(): TraceSnapshot {
    return {
      pc: this._pc,
      instruction: this.program[this._pc],
      stack: this.stack.top(TRACE_STACK_LIMIT),
      depth: this.stack.size(),
    };
  }

  private inBounds(): boolean {
    return this._pc >= 0 && this._pc < this.program.length;
  }

  private async executeCurrent(): Promise<void> {
    try {
      await this.dispatch(this.program[this._pc]);
    } catch (err) {
      // Machine state stays frozen at the failing instruction
      this.running = false;
      throw err;
    }
  }

  private async dispatch(instr: Instruction): Promise<void> {
    const desc = this.registry.lookupByName(instr.opcode);
    this.instructionCount++;
    this.cycleCount += desc.cost;

    // Bind per-instruction ExecCtx helpers
    let nextPc = this._pc + 1;
    const ctx: ExecCtx = {
      jump: (target: number) => {
        nextPc = target;
      },
      halt: () => {
        this.halted = true;
      },
      output: (value: number) => this.emitOutput(value),
      write: (line: string) => this.writeLine(line),
    };

    await desc.handler(this, instr.operand, ctx);

    if (this.halted) {
      this.running = false;
      return;
    }
    this._pc = nextPc;
  }

  private async emitOutput(value: number): Promise<void> {
    this.output.push(value);
    if (this.inputOutputDevice) {
      await this.inputOutputDevice.print(value);
    } else {
      console.log(`Output: ${value}`);
    }
  }

  private async writeLine(line: string): Promise<void> {
    if (this.inputOutputDevice) {
      await this.inputOutputDevice.writeLine(line);
    } else {
      console.log(line);
    }
  }

  private async emitTrace(): Promise<void> {
    const snap = this.snapshot();
    if (this.inputOutputDevice?.trace) {
      await this.inputOutputDevice.trace(snap);
    } else {
      console.log(formatTraceLine(snap));
    }
  }

  private async waitForStep(): Promise<"continue" | "interrupt"> {
    if (!this.inputOutputDevice?.waitForStep) return "continue";
    return this.inputOutputDevice.waitForStep();
  }
}

export function formatTraceLine(snap: TraceSnapshot): string {
  const instruction = formatInstruction(snap.instruction).padEnd(12);
  return `PC:${String(snap.pc).padStart(3)} ${instruction} Stack: [${snap.stack.join(", ")}]`;
}

export { StackMachine };
