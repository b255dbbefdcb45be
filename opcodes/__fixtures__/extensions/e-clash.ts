import type { ExtensionDefinition } from "../../types";

export const PUSHX: ExtensionDefinition = {
  name: "PUSHX",
  code: 0x01,
  operandBearing: true,
  execute: () => {},
};
