import { StackUnderflowError } from "../errors";
import type { ExtensionDefinition } from "../opcodes/types";

// Reports the top value on the output device and leaves the stack alone.
export const PEEK: ExtensionDefinition = {
  name: "PEEK",
  code: 0x1b,
  operandBearing: false,
  execute: async (vm, _operand, ctx) => {
    if (vm.stack.isEmpty()) {
      throw new StackUnderflowError("PEEK requires at least 1 item on stack");
    }
    await ctx.write(`PEEK: Top item is ${vm.stack.peek()}`);
  },
};
