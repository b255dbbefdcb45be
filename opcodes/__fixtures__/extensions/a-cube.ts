import type { ExtensionDefinition } from "../../types";

const CUBE: ExtensionDefinition = {
  name: "CUBE",
  code: 0x40,
  operandBearing: false,
  cost: 2,
  execute: (vm) => {
    const v = vm.stack.pop();
    vm.stack.push(v * v * v);
  },
};

export default CUBE;
