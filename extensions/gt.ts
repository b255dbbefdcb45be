import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

export const GT: ExtensionDefinition = {
  name: "GT",
  code: 0x15,
  operandBearing: false,
  execute: compare((a, b) => a > b),
};
