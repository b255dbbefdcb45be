import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

export const LTE: ExtensionDefinition = {
  name: "LTE",
  code: 0x16,
  operandBearing: false,
  execute: compare((a, b) => a <= b),
};
