// Output handlers

import type { ExecCtx, MachineContext, Operand } from "../types";

export async function h_print(
  vm: MachineContext,
  _operand: Operand,
  ctx: ExecCtx,
) {
  await ctx.output(vm.stack.pop());
}
