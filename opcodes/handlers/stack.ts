// Stack manipulation handlers

import { InvalidOperandError } from "../../errors";
import type { MachineContext, Operand } from "../types";

export function h_push(vm: MachineContext, operand: Operand) {
  if (operand === null) {
    throw new InvalidOperandError(`PUSH at address ${vm.pc} has no operand`);
  }
  vm.stack.push(operand);
}

export function h_pop(vm: MachineContext) {
  vm.stack.pop();
}

export function h_dup(vm: MachineContext) {
  vm.stack.push(vm.stack.peek());
}

export function h_swap(vm: MachineContext) {
  const b = vm.stack.pop();
  const a = vm.stack.pop();
  vm.stack.push(b);
  vm.stack.push(a);
}
