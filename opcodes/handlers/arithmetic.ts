// Arithmetic instruction handlers. Operands come off the stack as b, then a.

import { DivisionByZeroError } from "../../errors";
import type { MachineContext } from "../types";
import { floorDiv, toInt32 } from "./int32";

function popPair(vm: MachineContext): [number, number] {
  const b = vm.stack.pop();
  const a = vm.stack.pop();
  return [a, b];
}

export function h_add(vm: MachineContext) {
  const [a, b] = popPair(vm);
  vm.stack.push(toInt32(a + b));
}

export function h_sub(vm: MachineContext) {
  const [a, b] = popPair(vm);
  vm.stack.push(toInt32(a - b));
}

export function h_mul(vm: MachineContext) {
  const [a, b] = popPair(vm);
  vm.stack.push(Math.imul(a, b));
}

export function h_div(vm: MachineContext) {
  const [a, b] = popPair(vm);
  if (b === 0) {
    throw new DivisionByZeroError();
  }
  vm.stack.push(floorDiv(a, b));
}
