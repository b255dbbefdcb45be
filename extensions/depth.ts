import type { ExtensionDefinition } from "../opcodes/types";

// [a b c] -> [a b c 3]
export const DEPTH: ExtensionDefinition = {
  name: "DEPTH",
  code: 0x18,
  operandBearing: false,
  execute: (vm) => {
    vm.stack.push(vm.stack.size());
  },
};
