import { toInt32 } from "../opcodes/handlers/int32";
import type { ExtensionDefinition } from "../opcodes/types";

export const NEG: ExtensionDefinition = {
  name: "NEG",
  code: 0x11,
  operandBearing: false,
  execute: (vm) => {
    vm.stack.push(toInt32(-vm.stack.pop()));
  },
};
