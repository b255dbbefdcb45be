import { OpcodeDescriptor, base } from "./types";
import { h_add, h_sub, h_mul, h_div } from "./handlers/arithmetic";
import { h_push, h_pop, h_dup, h_swap } from "./handlers/stack";
import { h_jump, h_jz, h_halt } from "./handlers/flow";
import { h_print } from "./handlers/io";

// Fixed base instruction set. Codes and names here can never be taken by
// an extension.
export const BASE_OPCODES: readonly OpcodeDescriptor[] = Object.freeze([
  base("PUSH", 0x01, { operandBearing: true, cost: 1, handler: h_push }),
  base("POP", 0x02, { operandBearing: false, cost: 1, handler: h_pop }),
  base("ADD", 0x03, { operandBearing: false, cost: 1, handler: h_add }),
  base("SUB", 0x04, { operandBearing: false, cost: 1, handler: h_sub }),
  base("MUL", 0x05, { operandBearing: false, cost: 3, handler: h_mul }),
  base("DIV", 0x06, { operandBearing: false, cost: 10, handler: h_div }),
  base("DUP", 0x07, { operandBearing: false, cost: 1, handler: h_dup }),
  base("SWAP", 0x08, { operandBearing: false, cost: 1, handler: h_swap }),
  base("PRINT", 0x09, { operandBearing: false, cost: 5, handler: h_print }),
  base("JUMP", 0x0a, { operandBearing: true, cost: 2, handler: h_jump }),
  base("JZ", 0x0b, { operandBearing: true, cost: 2, handler: h_jz }),
  base("HALT", 0xff, { operandBearing: false, cost: 1, handler: h_halt }),
]);

// Opcodes whose operand may be written as a label in source text
export const LABEL_OPERAND_OPCODES: ReadonlySet<string> = new Set(["JUMP", "JZ"]);
