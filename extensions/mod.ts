import { DivisionByZeroError } from "../errors";
import { floorMod } from "../opcodes/handlers/int32";
import type { ExtensionDefinition } from "../opcodes/types";

/**
 * MOD: pops b, then a, pushes a mod b. The result takes the sign of the
 * divisor, so `PUSH -7; PUSH 3; MOD` leaves 2.
 */
export const MOD: ExtensionDefinition = {
  name: "MOD",
  code: 0x10,
  operandBearing: false,
  execute: (vm) => {
    const b = vm.stack.pop();
    const a = vm.stack.pop();
    if (b === 0) {
      throw new DivisionByZeroError("Modulo by zero");
    }
    vm.stack.push(floorMod(a, b));
  },
};
