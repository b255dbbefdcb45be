// STKM bytecode format:
//   [0:4]  magic "STKM"
//   [4]    format version
//   [5:9]  instruction count, uint32 little-endian
//   then per instruction: 1 byte opcode + int32 little-endian operand (0 if none)

import {
  BadMagicError,
  BytecodeFormatError,
  InvalidOperandError,
  UnsupportedVersionError,
} from "./errors";
import { isInt32 } from "./opcodes/handlers/int32";
import type { OpcodeRegistry } from "./opcodes/registry";
import type { Instruction, Program } from "./opcodes/types";

export const MAGIC = Buffer.from("STKM", "ascii");
export const VERSION = 1;
export const HEADER_SIZE = 9;
export const RECORD_SIZE = 5;

export function instructionOffset(index: number): number {
  return HEADER_SIZE + index * RECORD_SIZE;
}

export interface DecodedRecord {
  index: number;
  offset: number; // byte offset of the record in the file
  code: number;
  raw: Buffer; // the 5 encoded bytes
  instruction: Instruction;
}

class BytecodeCodec {
  constructor(private registry: OpcodeRegistry) {}

  encode(program: Program): Buffer {
    const out = Buffer.alloc(instructionOffset(program.length));
    MAGIC.copy(out, 0);
    out.writeUInt8(VERSION, 4);
    out.writeUInt32LE(program.length, 5);

    program.forEach(({ opcode, operand }, index) => {
      const desc = this.registry.lookupByName(opcode);
      const value = operand ?? 0;
      if (!isInt32(value)) {
        throw new InvalidOperandError(
          `Operand ${value} of ${opcode} at address ${index} does not fit in a signed 32-bit integer`,
        );
      }
      const offset = instructionOffset(index);
      out.writeUInt8(desc.code, offset);
      out.writeInt32LE(value, offset + 1);
    });
    return out;
  }

  decode(bytes: Uint8Array): Instruction[] {
    return this.decodeRecords(bytes).map((record) => record.instruction);
  }

  /**
   * Decodes every record along with its position and raw bytes. The
   * buffer must hold exactly the number of records the header declares.
   */
  decodeRecords(bytes: Uint8Array): DecodedRecord[] {
    const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    const magic = buf.subarray(0, MAGIC.length);
    if (!MAGIC.subarray(0, magic.length).equals(magic)) {
      throw new BadMagicError(magic);
    }
    if (buf.length < HEADER_SIZE) {
      throw new BytecodeFormatError(
        `Truncated header: ${buf.length} bytes, expected ${HEADER_SIZE}`,
        { length: buf.length },
      );
    }

    const version = buf.readUInt8(4);
    if (version !== VERSION) {
      throw new UnsupportedVersionError(version, VERSION);
    }

    const count = buf.readUInt32LE(5);
    const expected = instructionOffset(count);
    if (buf.length < expected) {
      throw new BytecodeFormatError(
        `Truncated bytecode: header declares ${count} instructions (${expected} bytes) but only ${buf.length} bytes are present`,
        { count, expected, length: buf.length },
      );
    }
    if (buf.length > expected) {
      throw new BytecodeFormatError(
        `Trailing data: ${buf.length - expected} bytes after ${count} instructions`,
        { count, expected, length: buf.length },
      );
    }

    const records: DecodedRecord[] = [];
    for (let index = 0; index < count; index++) {
      const offset = instructionOffset(index);
      const code = buf.readUInt8(offset);
      const stored = buf.readInt32LE(offset + 1);
      const desc = this.registry.lookupByCode(code);
      // "No operand" is re-derived from the opcode, never from the zero alone
      const operand = !desc.operandBearing && stored === 0 ? null : stored;
      records.push({
        index,
        offset,
        code,
        raw: Buffer.from(buf.subarray(offset, offset + RECORD_SIZE)),
        instruction: { opcode: desc.name, operand },
      });
    }
    return records;
  }
}

export { BytecodeCodec };
