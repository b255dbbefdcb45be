import type { ExtensionDefinition } from "../../types";

export const SQUARE: ExtensionDefinition = {
  name: "SQUARE",
  code: 0x41,
  operandBearing: false,
  execute: (vm) => {
    const v = vm.stack.pop();
    vm.stack.push(v * v);
  },
};
