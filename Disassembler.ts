import { readFile } from "node:fs/promises";
import { BytecodeCodec, DecodedRecord } from "./Bytecode";
import type { OpcodeRegistry } from "./opcodes/registry";
import { formatInstruction } from "./opcodes/types";
import { writeFileAtomic } from "./files";

export type AnnotationMode = "plain" | "addresses" | "verbose";

export interface DisassembleOptions {
  mode?: AnnotationMode;
  sourceName?: string; // shown in the header comment
}

export interface DisassemblyResult {
  text: string;
  instructions: number;
}

const INSTRUCTION_COLUMN = 20;

function hex(n: number, width: number): string {
  return n.toString(16).padStart(width, "0");
}

export function renderRecord(
  record: DecodedRecord,
  mode: AnnotationMode = "plain",
): string {
  const instruction = formatInstruction(record.instruction);
  if (mode === "verbose") {
    const bytes = [...record.raw].map((b) => hex(b, 2)).join(" ");
    return `${instruction.padEnd(INSTRUCTION_COLUMN)} # @0x${hex(record.offset, 4)}: ${bytes} (op=0x${hex(record.code, 2)})`;
  }
  if (mode === "addresses") {
    return `${instruction.padEnd(INSTRUCTION_COLUMN)} # @0x${hex(record.offset, 4)}`;
  }
  return instruction;
}

/**
 * Turns bytecode back into assembler source. Symbolic names survive;
 * label spellings do not, so jump targets come back as plain addresses.
 */
class Disassembler {
  private codec: BytecodeCodec;

  constructor(registry: OpcodeRegistry) {
    this.codec = new BytecodeCodec(registry);
  }

  disassemble(bytes: Uint8Array, options: DisassembleOptions = {}): string {
    return this.format(this.codec.decodeRecords(bytes), options);
  }

  format(records: readonly DecodedRecord[], options: DisassembleOptions = {}): string {
    const lines: string[] = [];
    if (options.sourceName !== undefined) {
      lines.push(`# Disassembled from ${options.sourceName}`);
    }
    lines.push(`# ${records.length} instructions`, "");
    for (const record of records) {
      lines.push(renderRecord(record, options.mode));
    }
    return `${lines.join("\n")}\n`;
  }

  /**
   * Disassembles a file. With `output` the text is also written there.
   */
  async disassembleFile(
    path: string,
    options: { mode?: AnnotationMode; output?: string } = {},
  ): Promise<DisassemblyResult> {
    const records = this.codec.decodeRecords(await readFile(path));
    const text = this.format(records, { mode: options.mode, sourceName: path });
    if (options.output) {
      await writeFileAtomic(options.output, text);
    }
    return { text, instructions: records.length };
  }
}

export { Disassembler };
