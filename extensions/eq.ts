import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

// [a b] -> [1] if a == b, else [0]
export const EQ: ExtensionDefinition = {
  name: "EQ",
  code: 0x12,
  operandBearing: false,
  execute: compare((a, b) => a === b),
};
