import { createInterface, Interface } from "node:readline/promises";
import type {
  SMInputOutputDevice,
  StepSignal,
  TraceSnapshot,
} from "./SMInputOutputDevice";
import { formatTraceLine } from "./StackMachine";

export const STEP_PROMPT = "Press Enter to continue (Ctrl+C to exit)...";

export class SMConsole implements SMInputOutputDevice {
  private rl: Interface | null = null;
  private closed: boolean = false;
  private pendingStep: AbortController | null = null;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {}

  async print(value: number): Promise<void> {
    this.output.write(`Output: ${value}\n`);
  }

  async writeLine(line: string): Promise<void> {
    this.output.write(`${line}\n`);
  }

  async trace(snapshot: TraceSnapshot): Promise<void> {
    this.output.write(`${formatTraceLine(snapshot)}\n`);
  }

  async waitForStep(): Promise<StepSignal> {
    if (this.closed) return "interrupt";
    const rl = this.getInterface();
    const controller = new AbortController();
    this.pendingStep = controller;
    try {
      await rl.question(STEP_PROMPT, { signal: controller.signal });
      return "continue";
    } catch (err) {
      if (controller.signal.aborted) {
        this.output.write("\nExecution interrupted by user\n");
        return "interrupt";
      }
      throw err;
    } finally {
      this.pendingStep = null;
    }
  }

  close(): void {
    this.closed = true;
    this.rl?.close();
    this.rl = null;
  }

  // Created on first use so non-interactive runs never hold stdin open
  private getInterface(): Interface {
    if (!this.rl) {
      const rl = createInterface({
        input: this.input,
        output: this.output,
        historySize: 0,
        prompt: "",
      });
      // Ctrl+C and end of input both count as an interrupt
      rl.on("SIGINT", () => this.pendingStep?.abort());
      rl.on("close", () => {
        this.closed = true;
        this.rl = null;
        this.pendingStep?.abort();
      });
      this.rl = rl;
    }
    return this.rl;
  }
}
