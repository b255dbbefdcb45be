import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

export const GTE: ExtensionDefinition = {
  name: "GTE",
  code: 0x17,
  operandBearing: false,
  execute: compare((a, b) => a >= b),
};
