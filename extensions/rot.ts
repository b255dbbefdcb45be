import { StackUnderflowError } from "../errors";
import type { ExtensionDefinition } from "../opcodes/types";

// [a b c] -> [b c a]
export const ROT: ExtensionDefinition = {
  name: "ROT",
  code: 0x1a,
  operandBearing: false,
  execute: (vm) => {
    if (vm.stack.size() < 3) {
      throw new StackUnderflowError("ROT requires at least 3 items on stack");
    }
    const c = vm.stack.pop();
    const b = vm.stack.pop();
    const a = vm.stack.pop();
    vm.stack.push(b);
    vm.stack.push(c);
    vm.stack.push(a);
  },
};
