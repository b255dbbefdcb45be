// Shared shape of the two-operand comparison extensions.

import type { MachineContext } from "../opcodes/types";

export function compare(predicate: (a: number, b: number) => boolean) {
  return (vm: MachineContext) => {
    const b = vm.stack.pop();
    const a = vm.stack.pop();
    vm.stack.push(predicate(a, b) ? 1 : 0);
  };
}
