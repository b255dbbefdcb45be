import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

export const LT: ExtensionDefinition = {
  name: "LT",
  code: 0x14,
  operandBearing: false,
  execute: compare((a, b) => a < b),
};
