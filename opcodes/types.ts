// Strongly-typed, table-driven opcode metadata for the stack machine

import type { Stack } from "../Stack";

export type Operand = number | null;

export interface Instruction {
  opcode: string; // uppercase mnemonic, e.g. "PUSH"
  operand: Operand; // null when the instruction carries none
}

export type Program = readonly Instruction[];

// What a handler may touch on the running machine
export interface MachineContext {
  readonly stack: Stack;
  readonly pc: number;
}

export interface ExecCtx {
  // Helpers are bound by the dispatcher for the *current* instruction
  jump: (target: number) => void;
  halt: () => void;
  output: (value: number) => Promise<void>;
  write: (line: string) => Promise<void>;
}

export type OpcodeHandler = (
  vm: MachineContext,
  operand: Operand,
  ctx: ExecCtx,
) => void | Promise<void>;

export interface OpcodeDescriptor {
  name: string; // uppercase mnemonic
  code: number; // 0x00-0xFF, written as the record's first byte
  operandBearing: boolean;
  cost: number; // simulated cycles, purely observational
  extension: boolean;
  handler: OpcodeHandler;
}

/**
 * Shape of an extension declaration, whether bundled or loaded from a
 * directory of modules.
 */
export interface ExtensionDefinition {
  name: string;
  code: number;
  operandBearing: boolean;
  cost?: number;
  execute: OpcodeHandler;
}

const MNEMONIC = /^[A-Z][A-Z0-9_]*$/;

export function isValidMnemonic(name: string): boolean {
  return MNEMONIC.test(name);
}

export function isOpcodeNumber(code: number): boolean {
  return Number.isInteger(code) && code >= 0x00 && code <= 0xff;
}

// Tiny helper to build base descriptors with range checks
export function base(
  name: string,
  code: number,
  init: Omit<OpcodeDescriptor, "name" | "code" | "extension">,
): OpcodeDescriptor {
  if (!isOpcodeNumber(code))
    throw new Error(`opcode out of range: ${code}`);
  if (!isValidMnemonic(name))
    throw new Error(`malformed mnemonic: ${name}`);
  return { name, code, extension: false, ...init };
}

export function formatInstruction({ opcode, operand }: Instruction): string {
  return operand === null ? opcode : `${opcode} ${operand}`;
}
