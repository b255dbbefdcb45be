import { StackUnderflowError } from "../errors";
import type { ExtensionDefinition } from "../opcodes/types";

// [a b] -> [a b a]
export const OVER: ExtensionDefinition = {
  name: "OVER",
  code: 0x19,
  operandBearing: false,
  execute: (vm) => {
    if (vm.stack.size() < 2) {
      throw new StackUnderflowError("OVER requires at least 2 items on stack");
    }
    const b = vm.stack.pop();
    const a = vm.stack.peek();
    vm.stack.push(b);
    vm.stack.push(a);
  },
};
