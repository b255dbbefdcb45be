// Entry points the CLI drives: compile, run and disassemble files.

import { readFile } from "node:fs/promises";
import { Assembler } from "./Assembler";
import { BytecodeCodec } from "./Bytecode";
import { AnnotationMode, Disassembler, DisassemblyResult } from "./Disassembler";
import { writeFileAtomic } from "./files";
import type { OpcodeRegistry } from "./opcodes/registry";
import type { Instruction } from "./opcodes/types";
import type { SMInputOutputDevice } from "./SMInputOutputDevice";
import { ExecuteOptions, RunResult, StackMachine } from "./StackMachine";

export interface CompileResult {
  program: Instruction[];
  bytes: Buffer;
  output: string;
}

/**
 * Assembles and encodes entirely in memory before anything is written, so
 * a source error leaves no output file behind.
 */
export async function compileFile(
  source: string,
  output: string,
  registry: OpcodeRegistry,
): Promise<CompileResult> {
  const { program } = await new Assembler(registry).assembleFile(source);
  const bytes = new BytecodeCodec(registry).encode(program);
  await writeFileAtomic(output, bytes);
  return { program, bytes, output };
}

export async function loadBytecodeFile(
  path: string,
  registry: OpcodeRegistry,
): Promise<Instruction[]> {
  const bytes = await readFile(path);
  return new BytecodeCodec(registry).decode(bytes);
}

export interface RunFileResult extends RunResult {
  machine: StackMachine;
}

export async function runFile(
  path: string,
  registry: OpcodeRegistry,
  device: SMInputOutputDevice | null,
  options: ExecuteOptions = {},
  onLoad?: (machine: StackMachine, program: Instruction[]) => void,
): Promise<RunFileResult> {
  // Decode fully before anything executes
  const program = await loadBytecodeFile(path, registry);
  const machine = new StackMachine(registry, device);
  machine.load(program);
  onLoad?.(machine, program);
  const result = await machine.execute(options);
  return { ...result, machine };
}

export async function disassembleFile(
  path: string,
  registry: OpcodeRegistry,
  options: { mode?: AnnotationMode; output?: string } = {},
): Promise<DisassemblyResult> {
  return new Disassembler(registry).disassembleFile(path, options);
}
