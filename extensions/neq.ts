import type { ExtensionDefinition } from "../opcodes/types";
import { compare } from "./comparison";

export const NEQ: ExtensionDefinition = {
  name: "NEQ",
  code: 0x13,
  operandBearing: false,
  execute: compare((a, b) => a !== b),
};
