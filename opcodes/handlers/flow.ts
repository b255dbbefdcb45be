// Flow control handlers. A taken transfer sets the next pc directly.

import { InvalidOperandError } from "../../errors";
import type { ExecCtx, MachineContext, Operand } from "../types";

function target(vm: MachineContext, name: string, operand: Operand): number {
  if (operand === null) {
    throw new InvalidOperandError(`${name} at address ${vm.pc} has no target`);
  }
  return operand;
}

export function h_jump(vm: MachineContext, operand: Operand, ctx: ExecCtx) {
  ctx.jump(target(vm, "JUMP", operand));
}

export function h_jz(vm: MachineContext, operand: Operand, ctx: ExecCtx) {
  const address = target(vm, "JZ", operand);
  if (vm.stack.pop() === 0) {
    ctx.jump(address);
  }
}

export function h_halt(_vm: MachineContext, _operand: Operand, ctx: ExecCtx) {
  ctx.halt();
}
