import { readFile } from "node:fs/promises";
import {
  DuplicateLabelError,
  EmptyLabelNameError,
  InvalidOperandError,
  SourceNotFoundError,
  UndefinedLabelError,
  UnknownOpcodeError,
} from "./errors";
import { isInt32 } from "./opcodes/handlers/int32";
import type { OpcodeRegistry } from "./opcodes/registry";
import { LABEL_OPERAND_OPCODES } from "./opcodes/tables";
import type { Instruction } from "./opcodes/types";

// One accepted instruction line from the first pass
export interface SourceLine {
  line: number; // 1-based
  text: string; // trimmed source line, for error reports
  opcode: string;
  operandToken: string | null;
}

export interface ScanResult {
  lines: SourceLine[];
  labels: Map<string, number>;
}

export interface AssemblyResult {
  program: Instruction[];
  labels: Map<string, number>;
}

const INTEGER_LITERAL = /^[+-]?\d+$/;

export function isIntegerLiteral(token: string): boolean {
  return INTEGER_LITERAL.test(token);
}

export function stripComment(raw: string): string {
  const hash = raw.indexOf("#");
  return (hash === -1 ? raw : raw.slice(0, hash)).trim();
}

/**
 * Two-pass assembler. The first pass records label addresses and
 * validates mnemonics; the second turns operand tokens into integers,
 * replacing label references for JUMP and JZ. An integer written after an
 * operand-free mnemonic is kept as its stored operand.
 */
class Assembler {
  constructor(private registry: OpcodeRegistry) {}

  assemble(source: string): AssemblyResult {
    const scanned = this.scan(source);
    return { program: this.resolve(scanned), labels: scanned.labels };
  }

  async assembleFile(path: string): Promise<AssemblyResult> {
    let source: string;
    try {
      source = await readFile(path, "utf8");
    } catch (err) {
      if (isNodeError(err)) {
        throw new SourceNotFoundError(path, err.code);
      }
      throw err;
    }
    return this.assemble(source);
  }

  scan(source: string): ScanResult {
    const labels = new Map<string, number>();
    const lines: SourceLine[] = [];
    let address = 0;

    source.split(/\r?\n/).forEach((raw, index) => {
      const lineNum = index + 1;
      const text = raw.trim();
      const code = stripComment(raw);
      if (!code) return;

      if (code.endsWith(":")) {
        const label = code.slice(0, -1).trim();
        if (!label) {
          throw new EmptyLabelNameError(lineNum, text);
        }
        if (labels.has(label)) {
          throw new DuplicateLabelError(label, lineNum, text);
        }
        // Labels consume no address
        labels.set(label, address);
        return;
      }

      const match = /^(\S+)(?:\s+(.*))?$/.exec(code);
      if (!match) return;
      const opcode = match[1].toUpperCase();
      if (!this.registry.has(opcode)) {
        throw new UnknownOpcodeError(
          opcode,
          this.registry.suggest(opcode),
          lineNum,
          text,
        );
      }

      const operandToken = match[2]?.trim() || null;
      lines.push({ line: lineNum, text, opcode, operandToken });
      address++;
    });

    return { lines, labels };
  }

  resolve({ lines, labels }: ScanResult): Instruction[] {
    return lines.map(({ line, text, opcode, operandToken }) => {
      if (operandToken === null) {
        if (this.registry.operandBearing(opcode)) {
          throw new InvalidOperandError(`${opcode} requires an operand`, line, text);
        }
        return { opcode, operand: null };
      }

      if (LABEL_OPERAND_OPCODES.has(opcode) && !isIntegerLiteral(operandToken)) {
        const address = labels.get(operandToken);
        if (address === undefined) {
          throw new UndefinedLabelError(operandToken, line, text);
        }
        return { opcode, operand: address };
      }

      if (!isIntegerLiteral(operandToken)) {
        throw new InvalidOperandError(
          `Invalid operand '${operandToken}' - must be an integer`,
          line,
          text,
        );
      }
      const value = Number(operandToken);
      if (!isInt32(value)) {
        throw new InvalidOperandError(
          `Operand '${operandToken}' does not fit in a signed 32-bit integer`,
          line,
          text,
        );
      }
      return { opcode, operand: value | 0 }; // folds -0 into 0
    });
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export { Assembler };
